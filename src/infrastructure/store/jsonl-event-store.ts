import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { BaseLogger } from 'pino';
import type { Stamped } from '../../domain/index.js';
import type { Appendable, EventStore, RecordSchema } from './event-store.js';
import { decodeLine, encodeLine, stamp } from './event-store.js';
import { readLinesReverse } from './reverse-lines.js';
import { WriteQueue } from './write-queue.js';

export interface JsonlEventStoreOptions<D> {
  path: string;
  schema: RecordSchema<D>;
  log: BaseLogger;
  /** Bytes read per step when scanning backwards. */
  chunkSize?: number;
}

/**
 * Line-delimited JSON log on the local file system.
 *
 * Every append is a single O_APPEND write of one complete line, so
 * concurrent writers never interleave partial lines and a crash cannot
 * damage lines already written. The file and its directory are created
 * lazily on first access.
 */
export class JsonlEventStore<D> implements EventStore<D> {
  readonly path: string;
  private readonly schema: RecordSchema<D>;
  private readonly log: BaseLogger;
  private readonly chunkSize: number | undefined;
  private readonly queue = new WriteQueue();
  private ready = false;

  constructor(options: JsonlEventStoreOptions<D>) {
    this.path = options.path;
    this.schema = options.schema;
    this.log = options.log;
    this.chunkSize = options.chunkSize;
  }

  append<R extends D>(draft: Appendable<R>): Promise<Stamped<R>> {
    return this.queue.run(async () => {
      const record = stamp<R>(draft);
      this.schema.parse(record);

      await this.ensureFile();
      await appendFile(this.path, encodeLine(record), { encoding: 'utf8', flag: 'a' });

      return record;
    });
  }

  async readAll(): Promise<Stamped<D>[]> {
    await this.ensureFile();
    const content = await readFile(this.path, 'utf8');

    const records: Stamped<D>[] = [];
    let skipped = 0;

    for (const line of content.split('\n')) {
      const result = decodeLine(line, this.schema);
      if (result.ok) {
        records.push(result.record);
      } else if (result.reason !== 'blank') {
        skipped++;
      }
    }

    if (skipped > 0) {
      this.log.debug({ path: this.path, skipped }, 'Skipped malformed log lines');
    }

    return records;
  }

  async *readReverse(): AsyncGenerator<Stamped<D>> {
    await this.ensureFile();

    for await (const line of readLinesReverse(this.path, this.chunkSize)) {
      const result = decodeLine(line, this.schema);
      if (result.ok) {
        yield result.record;
      } else if (result.reason !== 'blank') {
        this.log.debug({ path: this.path, reason: result.reason }, 'Skipped malformed log line');
      }
    }
  }

  async readRaw(): Promise<Buffer> {
    await this.ensureFile();
    return readFile(this.path);
  }

  /** Creates the directory and an empty log if either is missing. Never truncates. */
  private async ensureFile(): Promise<void> {
    if (this.ready) return;
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, '', { encoding: 'utf8', flag: 'a' });
    this.ready = true;
  }
}
