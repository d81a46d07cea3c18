import type { Stamped } from '../../domain/index.js';
import type { Appendable, EventStore, RecordSchema } from './event-store.js';
import { decodeLine, encodeLine, stamp } from './event-store.js';

/**
 * In-process event store.
 *
 * Keeps the encoded lines exactly as the file store would write them, so
 * decoding (and skipping of malformed lines) behaves identically.
 */
export class MemoryEventStore<D> implements EventStore<D> {
  private readonly schema: RecordSchema<D>;
  private readonly lines: string[] = [];

  constructor(schema: RecordSchema<D>) {
    this.schema = schema;
  }

  async append<R extends D>(draft: Appendable<R>): Promise<Stamped<R>> {
    const record = stamp<R>(draft);
    this.schema.parse(record);
    this.lines.push(encodeLine(record));
    return record;
  }

  async readAll(): Promise<Stamped<D>[]> {
    const records: Stamped<D>[] = [];
    for (const line of this.lines) {
      const result = decodeLine(line, this.schema);
      if (result.ok) records.push(result.record);
    }
    return records;
  }

  async *readReverse(): AsyncGenerator<Stamped<D>> {
    for (let i = this.lines.length - 1; i >= 0; i--) {
      const line = this.lines[i];
      if (line === undefined) continue;
      const result = decodeLine(line, this.schema);
      if (result.ok) yield result.record;
    }
  }

  async readRaw(): Promise<Buffer> {
    return Buffer.from(this.lines.join(''), 'utf8');
  }

  /** Appends a line verbatim, bypassing validation. A trailing newline is added. */
  injectRawLine(line: string): void {
    this.lines.push(`${line}\n`);
  }
}
