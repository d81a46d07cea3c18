import { isPixelOpen } from '../domain/index.js';
import type { TrackingEventDraft } from '../domain/index.js';
import type { EventStore } from '../infrastructure/store/index.js';

export const DEFAULT_DEDUP_WINDOW_MINUTES = 10;

const TIMEZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

export interface DedupOptions {
  windowMinutes?: number;
  /** Reference instant; defaults to the current time. */
  now?: Date;
}

/**
 * Parses a stored `time` value to epoch milliseconds.
 * Timestamps without a zone designator are read as UTC.
 * Returns null when the value is not a usable timestamp.
 */
export function parseEventTime(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;

  const ms = Date.parse(TIMEZONE_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`);
  return Number.isFinite(ms) ? ms : null;
}

/**
 * Decides whether a new `pixel_open` for (email, messageId) should be
 * dropped because an equivalent one was logged within the window.
 *
 * Scans newest first and stops only on a match. `message_id` is compared
 * exactly, so an unscoped open (null) only matches other unscoped opens.
 * Records whose `time` cannot be parsed are skipped. Stored times are not
 * assumed to be ordered: writers on other hosts or a clock step can put an
 * older stamp after a newer one.
 *
 * Not an idempotency guarantee: no lock spans this check and the append
 * that follows it, so two simultaneous requests can both pass.
 */
export async function shouldSuppress(
  events: EventStore<TrackingEventDraft>,
  email: string,
  messageId: string | null,
  options: DedupOptions = {},
): Promise<boolean> {
  const windowMinutes = options.windowMinutes ?? DEFAULT_DEDUP_WINDOW_MINUTES;
  const now = (options.now ?? new Date()).getTime();
  const cutoff = now - windowMinutes * 60_000;

  for await (const event of events.readReverse()) {
    if (!isPixelOpen(event) || event.email !== email || event.message_id !== messageId) continue;

    const time = parseEventTime(event.time);
    if (time !== null && time >= cutoff) return true;
  }

  return false;
}
