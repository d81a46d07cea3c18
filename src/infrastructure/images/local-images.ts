import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { contentTypeFor } from './content-type.js';
import { errorMessage, isNotFound } from '../errors.js';

export type LocalReadResult =
  | { readonly ok: true; readonly body: Buffer; readonly contentType: string; readonly name: string }
  | { readonly ok: false; readonly name: string; readonly error: string };

/**
 * Final path segment of a caller-supplied reference. Both `/` and `\`
 * count as separators, so `../../etc/passwd` and `..\\x.png` keep only
 * `passwd` and `x.png`.
 */
export function referenceName(reference: string): string {
  return reference.split(/[\\/]/).at(-1) ?? '';
}

/**
 * Reads an uploaded file by reference, confined to `uploadDir`.
 *
 * Directory components of the reference are discarded. A name that would
 * still point outside the file level (`''`, `.`, `..`) is reported as
 * not found.
 */
export async function readUpload(uploadDir: string, reference: string): Promise<LocalReadResult> {
  const name = referenceName(reference);

  if (name === '' || name === '.' || name === '..') {
    return { ok: false, name, error: `File not found: ${name}` };
  }

  try {
    const body = await readFile(join(uploadDir, name));
    return { ok: true, body, contentType: contentTypeFor(name), name };
  } catch (err: unknown) {
    if (isNotFound(err)) return { ok: false, name, error: `File not found: ${name}` };
    return { ok: false, name, error: errorMessage(err) };
  }
}
