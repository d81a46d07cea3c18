export { PLACEHOLDER_GIF, PLACEHOLDER_CONTENT_TYPE } from './placeholder.js';
export { contentTypeFor } from './content-type.js';
export { readUpload, referenceName } from './local-images.js';
export type { LocalReadResult } from './local-images.js';
export {
  fetchRemoteImage,
  isRemoteReference,
  DEFAULT_REMOTE_CONTENT_TYPE,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_REMOTE_BYTES,
} from './remote-images.js';
export type { RemoteFetchResult } from './remote-images.js';
