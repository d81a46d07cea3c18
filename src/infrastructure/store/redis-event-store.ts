import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import type { Stamped } from '../../domain/index.js';
import type { Appendable, EventStore, RecordSchema } from './event-store.js';
import { decodeLine, stamp } from './event-store.js';
import { WriteQueue } from './write-queue.js';

/** Field holding the JSON line inside each stream entry. */
const RECORD_FIELD = 'record';
const PAGE_SIZE = 500;

export type StreamEntry = [id: string, fields: string[]];

/** The subset of Redis Stream commands the store needs. */
export interface StreamClient {
  xadd(key: string, field: string, value: string): Promise<string | null>;
  xrange(key: string, start: string, end: string, count: number): Promise<StreamEntry[]>;
  xrevrange(key: string, end: string, start: string, count: number): Promise<StreamEntry[]>;
}

/** Adapts an ioredis connection. Entry IDs are auto-generated (`*`). */
export function ioredisStreamClient(redis: Redis): StreamClient {
  return {
    xadd: (key, field, value) => redis.xadd(key, '*', field, value),
    xrange: (key, start, end, count) => redis.xrange(key, start, end, 'COUNT', count),
    xrevrange: (key, end, start, count) => redis.xrevrange(key, end, start, 'COUNT', count),
  };
}

/**
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 * Returns the stored line, or undefined when the entry has no record field.
 */
function recordField(fields: string[]): string | undefined {
  for (let i = 0; i < fields.length; i += 2) {
    if (fields[i] === RECORD_FIELD) return fields[i + 1];
  }
  return undefined;
}

export interface RedisEventStoreOptions<D> {
  client: StreamClient;
  key: string;
  schema: RecordSchema<D>;
  log: BaseLogger;
}

/**
 * Event store backed by a Redis Stream.
 *
 * Each record is one `XADD` entry carrying the same JSON line the file
 * store writes, so `readRaw()` reproduces a JSONL log. Reads page through
 * the stream with exclusive ranges (`(id`), requiring Redis 6.2+.
 */
export class RedisEventStore<D> implements EventStore<D> {
  readonly key: string;
  private readonly client: StreamClient;
  private readonly schema: RecordSchema<D>;
  private readonly log: BaseLogger;
  private readonly queue = new WriteQueue();

  constructor(options: RedisEventStoreOptions<D>) {
    this.client = options.client;
    this.key = options.key;
    this.schema = options.schema;
    this.log = options.log;
  }

  append<R extends D>(draft: Appendable<R>): Promise<Stamped<R>> {
    return this.queue.run(async () => {
      const record = stamp<R>(draft);
      this.schema.parse(record);
      await this.client.xadd(this.key, RECORD_FIELD, JSON.stringify(record));
      return record;
    });
  }

  async readAll(): Promise<Stamped<D>[]> {
    const records: Stamped<D>[] = [];
    for await (const line of this.scanForward()) {
      const result = decodeLine(line, this.schema);
      if (result.ok) records.push(result.record);
    }
    return records;
  }

  async *readReverse(): AsyncGenerator<Stamped<D>> {
    let end = '+';

    for (;;) {
      const page = await this.client.xrevrange(this.key, end, '-', PAGE_SIZE);

      for (const [, fields] of page) {
        const line = recordField(fields);
        if (line === undefined) continue;
        const result = decodeLine(line, this.schema);
        if (result.ok) {
          yield result.record;
        } else if (result.reason !== 'blank') {
          this.log.debug({ key: this.key, reason: result.reason }, 'Skipped malformed stream entry');
        }
      }

      const last = page.at(-1);
      if (page.length < PAGE_SIZE || last === undefined) return;
      end = `(${last[0]}`;
    }
  }

  async readRaw(): Promise<Buffer> {
    let raw = '';
    for await (const line of this.scanForward()) {
      raw += `${line}\n`;
    }
    return Buffer.from(raw, 'utf8');
  }

  private async *scanForward(): AsyncGenerator<string> {
    let start = '-';

    for (;;) {
      const page = await this.client.xrange(this.key, start, '+', PAGE_SIZE);

      for (const [, fields] of page) {
        const line = recordField(fields);
        if (line !== undefined) yield line;
      }

      const last = page.at(-1);
      if (page.length < PAGE_SIZE || last === undefined) return;
      start = `(${last[0]}`;
    }
  }
}
