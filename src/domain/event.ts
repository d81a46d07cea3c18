/**
 * Core domain types for tracked email engagement.
 *
 * Two append-only logs exist: the primary tracking log (opens and clicks)
 * and the image-read log (one entry per image resolution attempt).
 * These types carry no framework dependencies.
 */

export const PIXEL_OPEN = 'pixel_open';
export const CLICK = 'click';

export type TrackingEventType = typeof PIXEL_OPEN | typeof CLICK;

/** Where an image-read attempt was served from. */
export type ServedFrom = 'local' | 'remote';

/**
 * A record as persisted: the draft plus the UTC ISO-8601 `time`
 * assigned at append time.
 */
export type Stamped<D> = D & { readonly time: string };

export interface PixelOpenDraft {
  readonly type: typeof PIXEL_OPEN;
  readonly email: string;
  readonly message_id: string | null;
  readonly image_param: string | null;
  readonly user_agent: string | null;
  readonly remote_addr: string | null;
}

export interface ClickDraft {
  readonly type: typeof CLICK;
  readonly email: string;
  readonly message_id: string | null;
  readonly redirect: string;
  readonly user_agent: string | null;
  readonly remote_addr: string | null;
}

export type TrackingEventDraft = PixelOpenDraft | ClickDraft;

export type PixelOpenEvent = Stamped<PixelOpenDraft>;
export type ClickEvent = Stamped<ClickDraft>;

/** Canonical entry of the primary tracking log. */
export type TrackingEvent = Stamped<TrackingEventDraft>;

/**
 * Outcome of one image resolution attempt.
 *
 * `filename` is set for local references, `url` for remote ones.
 * `error` is present only when the attempt fell back to the placeholder.
 */
export interface ImageReadDraft {
  readonly email: string;
  readonly message_id: string | null;
  readonly served: ServedFrom;
  readonly filename?: string;
  readonly url?: string;
  readonly error?: string;
}

export type ImageReadEvent = Stamped<ImageReadDraft>;

export function isPixelOpen(event: TrackingEvent): event is PixelOpenEvent {
  return event.type === PIXEL_OPEN;
}

export function isClick(event: TrackingEvent): event is ClickEvent {
  return event.type === CLICK;
}
