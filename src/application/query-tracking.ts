import { isClick, isPixelOpen } from '../domain/index.js';
import type {
  ClickEvent,
  ImageReadDraft,
  ImageReadEvent,
  PixelOpenEvent,
  TrackingEvent,
  TrackingEventDraft,
} from '../domain/index.js';
import type { EventStore } from '../infrastructure/store/index.js';

export const DEFAULT_LATEST = 200;

export interface TrackingStores {
  events: EventStore<TrackingEventDraft>;
  imageReads: EventStore<ImageReadDraft>;
}

export interface IdentityReport {
  opens: PixelOpenEvent[];
  clicks: ClickEvent[];
  img_reads: ImageReadEvent[];
}

export interface LatestReport {
  events: TrackingEvent[];
  img_reads: ImageReadEvent[];
}

/** Collects up to `n` items from an iterable, stopping as soon as it has them. */
async function take<T>(source: AsyncIterable<T>, n: number): Promise<T[]> {
  const out: T[] = [];
  if (n <= 0) return out;

  for await (const item of source) {
    out.push(item);
    if (out.length >= n) break;
  }
  return out;
}

/**
 * Use case: everything recorded for one recipient, oldest first.
 * Three independent filtered projections; nothing is joined.
 */
export async function byIdentity(stores: TrackingStores, email: string): Promise<IdentityReport> {
  const [events, reads] = await Promise.all([
    stores.events.readAll(),
    stores.imageReads.readAll(),
  ]);

  return {
    opens: events.filter(isPixelOpen).filter((e) => e.email === email),
    clicks: events.filter(isClick).filter((e) => e.email === email),
    img_reads: reads.filter((r) => r.email === email),
  };
}

/**
 * Use case: the `n` most recently appended records of each log,
 * newest first. No upper bound is applied to `n`.
 */
export async function latest(stores: TrackingStores, n: number = DEFAULT_LATEST): Promise<LatestReport> {
  const [events, img_reads] = await Promise.all([
    take(stores.events.readReverse(), n),
    take(stores.imageReads.readReverse(), n),
  ]);

  return { events, img_reads };
}

/** Use case: the raw log file, byte for byte. */
export function download(store: Pick<EventStore<unknown>, 'readRaw'>): Promise<Buffer> {
  return store.readRaw();
}
