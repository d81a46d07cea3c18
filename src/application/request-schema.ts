import { z } from 'zod';
import { DEFAULT_LATEST } from './query-tracking.js';

/**
 * Zod schemas for the tracking endpoints' query strings.
 *
 * Repeated parameters arrive as arrays and are rejected; `email` is an
 * opaque identity and is not checked for address syntax.
 */

export const pixelQuerySchema = z.object({
  email: z.string().min(1),
  image: z.string().optional(),
  message_id: z.string().optional(),
});

export const clickQuerySchema = z.object({
  email: z.string().min(1),
  redirect: z.string().min(1),
  message_id: z.string().optional(),
});

export const byEmailQuerySchema = z.object({
  email: z.string().min(1),
});

export const latestQuerySchema = z.object({
  n: z.coerce
    .number()
    .int({ message: 'n must be an integer' })
    .min(0, { message: 'n must not be negative' })
    .default(DEFAULT_LATEST),
});

export type PixelQuery = z.infer<typeof pixelQuerySchema>;
export type ClickQuery = z.infer<typeof clickQuerySchema>;
export type LatestQuery = z.infer<typeof latestQuerySchema>;

const ESCAPE_RUN = /(?:%[0-9a-fA-F]{2})+/g;

/**
 * Decodes the `image` parameter once more, reading `+` as a space.
 * Senders often double-encode the proxied URL.
 *
 * Each run of `%XX` escapes is decoded on its own as UTF-8, so a broken
 * escape such as `%zz` stays literal without blocking the others, and
 * bytes that are not valid UTF-8 become U+FFFD.
 */
export function decodeImageParam(raw: string | undefined): string | null {
  if (raw === undefined || raw === '') return null;

  return raw
    .replace(/\+/g, ' ')
    .replace(ESCAPE_RUN, (run) => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'));
}
