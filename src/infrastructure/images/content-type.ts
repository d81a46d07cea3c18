import { extname } from 'node:path';

const FALLBACK = 'application/octet-stream';

const MIME: Record<string, string> = {
  '.gif':  'image/gif',
  '.png':  'image/png',
  '.jpg':  'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.jpe':  'image/jpeg',
  '.webp': 'image/webp',
  '.svg':  'image/svg+xml',
  '.ico':  'image/vnd.microsoft.icon',
  '.bmp':  'image/bmp',
  '.tif':  'image/tiff',
  '.tiff': 'image/tiff',
  '.avif': 'image/avif',
  '.heic': 'image/heic',
  '.pdf':  'application/pdf',
  '.txt':  'text/plain',
  '.html': 'text/html',
  '.css':  'text/css',
  '.js':   'text/javascript',
  '.json': 'application/json',
};

/** Guesses a content type from a file name's extension (case-insensitive). */
export function contentTypeFor(filename: string): string {
  return MIME[extname(filename).toLowerCase()] ?? FALLBACK;
}
