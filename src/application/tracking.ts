import { PIXEL_OPEN, CLICK } from '../domain/index.js';
import type {
  ClickDraft,
  ClickEvent,
  PixelOpenDraft,
  PixelOpenEvent,
  TrackingEventDraft,
} from '../domain/index.js';
import type { EventStore } from '../infrastructure/store/index.js';
import { shouldSuppress } from './dedup-guard.js';
import type { DedupOptions } from './dedup-guard.js';

/** Request metadata recorded with every tracking event. */
export interface RequestMeta {
  userAgent: string | null;
  remoteAddr: string | null;
}

export interface PixelOpenInput extends RequestMeta {
  email: string;
  messageId: string | null;
  imageParam: string | null;
}

export interface ClickInput extends RequestMeta {
  email: string;
  messageId: string | null;
  redirect: string;
}

export type PixelOpenOutcome =
  | { readonly suppressed: true }
  | { readonly suppressed: false; readonly event: PixelOpenEvent };

/**
 * Use case: a tracking pixel was requested.
 *
 * Runs the dedup guard, then appends a `pixel_open` unless an equivalent
 * open is already inside the window.
 */
export async function trackPixelOpen(
  events: EventStore<TrackingEventDraft>,
  input: PixelOpenInput,
  options: DedupOptions = {},
): Promise<PixelOpenOutcome> {
  if (await shouldSuppress(events, input.email, input.messageId, options)) {
    return { suppressed: true };
  }

  const draft: PixelOpenDraft = {
    type: PIXEL_OPEN,
    email: input.email,
    message_id: input.messageId,
    image_param: input.imageParam,
    user_agent: input.userAgent,
    remote_addr: input.remoteAddr,
  };

  const event = await events.append(draft);
  return { suppressed: false, event };
}

/** Use case: a tracked link was followed. Every click is recorded. */
export async function trackClick(
  events: EventStore<TrackingEventDraft>,
  input: ClickInput,
): Promise<ClickEvent> {
  const draft: ClickDraft = {
    type: CLICK,
    email: input.email,
    message_id: input.messageId,
    redirect: input.redirect,
    user_agent: input.userAgent,
    remote_addr: input.remoteAddr,
  };

  return events.append(draft);
}
