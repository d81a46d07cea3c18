import type { BaseLogger } from 'pino';
import type { ImageReadDraft } from '../domain/index.js';
import type { EventStore } from '../infrastructure/store/index.js';
import {
  PLACEHOLDER_GIF,
  PLACEHOLDER_CONTENT_TYPE,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_REMOTE_BYTES,
  fetchRemoteImage,
  isRemoteReference,
  readUpload,
} from '../infrastructure/images/index.js';

export type ImageSource = 'placeholder' | 'local' | 'remote';

export interface ImageRequest {
  imageParam: string | null;
  email: string;
  messageId: string | null;
}

export interface ResolvedImage {
  readonly body: Buffer;
  readonly contentType: string;
  readonly source: ImageSource;
}

export interface ImageResolverOptions {
  imageReads: EventStore<ImageReadDraft>;
  uploadDir: string;
  log: BaseLogger;
  fetchTimeoutMs?: number;
  /** Largest remote body proxied; bigger ones fall back to the placeholder. */
  maxRemoteBytes?: number;
}

const PLACEHOLDER: ResolvedImage = {
  body: PLACEHOLDER_GIF,
  contentType: PLACEHOLDER_CONTENT_TYPE,
  source: 'placeholder',
};

/**
 * Decides what image a tracking request gets back.
 *
 * - no reference: the placeholder, nothing logged
 * - http(s) URL: proxied with a bounded wait and size
 * - anything else: a file from the upload directory, by final path segment
 *
 * Every attempt with a reference appends exactly one image-read record.
 * Failures never surface to the caller; they degrade to the placeholder.
 */
export class ImageResolver {
  private readonly imageReads: EventStore<ImageReadDraft>;
  private readonly uploadDir: string;
  private readonly log: BaseLogger;
  private readonly fetchTimeoutMs: number;
  private readonly maxRemoteBytes: number;

  constructor(options: ImageResolverOptions) {
    this.imageReads = options.imageReads;
    this.uploadDir = options.uploadDir;
    this.log = options.log;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.maxRemoteBytes = options.maxRemoteBytes ?? DEFAULT_MAX_REMOTE_BYTES;
  }

  async resolve(request: ImageRequest): Promise<ResolvedImage> {
    const { imageParam } = request;
    if (imageParam === null || imageParam === '') return PLACEHOLDER;

    return isRemoteReference(imageParam)
      ? this.resolveRemote(request, imageParam)
      : this.resolveLocal(request, imageParam);
  }

  private async resolveLocal(request: ImageRequest, reference: string): Promise<ResolvedImage> {
    const result = await readUpload(this.uploadDir, reference);

    if (!result.ok) {
      this.log.warn({ reference, error: result.error }, 'Local image unavailable, serving placeholder');
      await this.record({
        email: request.email,
        message_id: request.messageId,
        served: 'local',
        filename: reference,
        error: result.error,
      });
      return PLACEHOLDER;
    }

    await this.record({
      email: request.email,
      message_id: request.messageId,
      served: 'local',
      filename: reference,
    });

    return { body: result.body, contentType: result.contentType, source: 'local' };
  }

  private async resolveRemote(request: ImageRequest, url: string): Promise<ResolvedImage> {
    const result = await fetchRemoteImage(url, this.fetchTimeoutMs, this.maxRemoteBytes);

    if (!result.ok) {
      this.log.warn({ url, error: result.error }, 'Remote image fetch failed, serving placeholder');
      await this.record({
        email: request.email,
        message_id: request.messageId,
        served: 'remote',
        url,
        error: result.error,
      });
      return PLACEHOLDER;
    }

    await this.record({
      email: request.email,
      message_id: request.messageId,
      served: 'remote',
      url,
    });

    return { body: result.body, contentType: result.contentType, source: 'remote' };
  }

  /** A failed image-read append is logged; the image is still served. */
  private async record(draft: ImageReadDraft): Promise<void> {
    try {
      await this.imageReads.append(draft);
    } catch (err: unknown) {
      this.log.error({ err, email: draft.email, served: draft.served }, 'Failed to record image read');
    }
  }
}
