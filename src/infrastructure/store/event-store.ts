import type { z } from 'zod';
import type { Stamped } from '../../domain/index.js';

/** Schema a store decodes its lines with. Output is always a stamped record. */
export type RecordSchema<D> = z.ZodType<Stamped<D>, z.ZodTypeDef, unknown>;

/** A draft may carry its own `time`; otherwise the store assigns one. */
export type Appendable<D> = D & { readonly time?: string };

/**
 * Append-only log of immutable records.
 *
 * Implementations: JsonlEventStore (file), RedisEventStore (Redis Stream),
 * MemoryEventStore (in-process).
 *
 * Reads are not synchronized with in-flight appends: a reader may or may not
 * observe a record that is being written concurrently.
 */
export interface EventStore<D> {
  /** Stamp (if needed), validate and append one record. */
  append<R extends D>(draft: Appendable<R>): Promise<Stamped<R>>;

  /** All decodable records, oldest first. Malformed lines are skipped. */
  readAll(): Promise<Stamped<D>[]>;

  /** Decodable records newest first, read incrementally. */
  readReverse(): AsyncIterable<Stamped<D>>;

  /** The log exactly as stored, one JSON document per line. */
  readRaw(): Promise<Buffer>;
}

/** Current UTC instant as ISO-8601 with a trailing `Z`. */
export function utcNow(): string {
  return new Date().toISOString();
}

/** Attaches `time` unless the draft already has one. */
export function stamp<D>(draft: Appendable<D>): Stamped<D> {
  return { ...draft, time: draft.time ?? utcNow() };
}

export type DecodeResult<T> =
  | { readonly ok: true; readonly record: T }
  | { readonly ok: false; readonly reason: 'blank' | 'invalid_json' | 'invalid_shape' };

/**
 * Decodes one stored line. Never throws: the caller decides whether
 * a failure is skipped or reported.
 */
export function decodeLine<D>(line: string, schema: RecordSchema<D>): DecodeResult<Stamped<D>> {
  const trimmed = line.trim();
  if (trimmed === '') return { ok: false, reason: 'blank' };

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) return { ok: false, reason: 'invalid_shape' };

  return { ok: true, record: parsed.data };
}

/** Serializes a record as one self-contained line, newline included. */
export function encodeLine(record: object): string {
  return `${JSON.stringify(record)}\n`;
}
