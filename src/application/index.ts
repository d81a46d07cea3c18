export { trackingRecordSchema, imageReadRecordSchema } from './record-schema.js';
export {
  pixelQuerySchema,
  clickQuerySchema,
  byEmailQuerySchema,
  latestQuerySchema,
  decodeImageParam,
} from './request-schema.js';
export type { PixelQuery, ClickQuery, LatestQuery } from './request-schema.js';
export { shouldSuppress, parseEventTime, DEFAULT_DEDUP_WINDOW_MINUTES } from './dedup-guard.js';
export type { DedupOptions } from './dedup-guard.js';
export { trackPixelOpen, trackClick } from './tracking.js';
export type { RequestMeta, PixelOpenInput, ClickInput, PixelOpenOutcome } from './tracking.js';
export { ImageResolver } from './image-resolver.js';
export type { ImageSource, ImageRequest, ResolvedImage, ImageResolverOptions } from './image-resolver.js';
export { byIdentity, latest, download, DEFAULT_LATEST } from './query-tracking.js';
export type { TrackingStores, IdentityReport, LatestReport } from './query-tracking.js';
