import { errorMessage } from '../errors.js';

export const DEFAULT_REMOTE_CONTENT_TYPE = 'image/jpeg';
export const DEFAULT_FETCH_TIMEOUT_MS = 8000;
export const DEFAULT_MAX_REMOTE_BYTES = 10 * 1024 * 1024;

const REMOTE_SCHEMES = ['http://', 'https://'] as const;

export type RemoteFetchResult =
  | { readonly ok: true; readonly body: Buffer; readonly contentType: string; readonly status: number }
  | { readonly ok: false; readonly error: string };

/** True when the reference is an absolute http(s) URL to be proxied. */
export function isRemoteReference(reference: string): boolean {
  return REMOTE_SCHEMES.some((scheme) => reference.startsWith(scheme));
}

/**
 * Reads a response body, giving up once it grows past `maxBytes`.
 * A declared `content-length` over the limit fails before any read.
 */
async function readCapped(response: Response, maxBytes: number): Promise<Buffer> {
  const declared = Number.parseInt(response.headers.get('content-length') ?? '', 10);
  if (declared > maxBytes) {
    await response.body?.cancel();
    throw new Error(`Remote image exceeds ${maxBytes} bytes`);
  }

  if (response.body === null) return Buffer.alloc(0);

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;

    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new Error(`Remote image exceeds ${maxBytes} bytes`);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}

/**
 * Fetches a remote image with a bounded wait and a bounded size.
 *
 * The timeout covers the whole exchange including the body. The HTTP status
 * is not inspected: any response that arrives in time is passed through.
 * Every thrown error (timeout, DNS, refused connection, invalid URL, body
 * over `maxBytes`) is returned as `{ ok: false }`.
 */
export async function fetchRemoteImage(
  url: string,
  timeoutMs: number = DEFAULT_FETCH_TIMEOUT_MS,
  maxBytes: number = DEFAULT_MAX_REMOTE_BYTES,
): Promise<RemoteFetchResult> {
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    const body = await readCapped(response, maxBytes);

    return {
      ok: true,
      body,
      contentType: response.headers.get('content-type') ?? DEFAULT_REMOTE_CONTENT_TYPE,
      status: response.status,
    };
  } catch (err: unknown) {
    return { ok: false, error: errorMessage(err) };
  }
}
