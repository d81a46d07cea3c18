import { z } from 'zod';
import { PIXEL_OPEN, CLICK } from '../domain/index.js';
import type { Stamped, TrackingEventDraft, ImageReadDraft } from '../domain/index.js';

/**
 * Zod schemas for lines of the two append-only logs.
 *
 * Stored lines are decoded through these on every read; a line that parses
 * as JSON but does not fit one of these shapes counts as malformed.
 * Unknown extra keys are preserved (`passthrough`) so records written by
 * other tools survive a round trip through the query API.
 */

const nullableString = z.string().nullable().default(null);

/**
 * A missing or non-string `time` reads as `''`. The record stays listed by
 * the queries; the dedup scan cannot parse it and skips it.
 */
const storedTime = z.string().catch('');

export const pixelOpenRecordSchema = z
  .object({
    type: z.literal(PIXEL_OPEN),
    email: z.string(),
    message_id: nullableString,
    image_param: nullableString,
    user_agent: nullableString,
    remote_addr: nullableString,
    time: storedTime,
  })
  .passthrough();

export const clickRecordSchema = z
  .object({
    type: z.literal(CLICK),
    email: z.string(),
    message_id: nullableString,
    redirect: z.string(),
    user_agent: nullableString,
    remote_addr: nullableString,
    time: storedTime,
  })
  .passthrough();

export const trackingRecordSchema: z.ZodType<Stamped<TrackingEventDraft>, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('type', [pixelOpenRecordSchema, clickRecordSchema]);

export const imageReadRecordSchema: z.ZodType<Stamped<ImageReadDraft>, z.ZodTypeDef, unknown> = z
  .object({
    email: z.string(),
    message_id: nullableString,
    served: z.enum(['local', 'remote']),
    filename: z.string().optional(),
    url: z.string().optional(),
    error: z.string().optional(),
    time: storedTime,
  })
  .passthrough();
