import { open } from 'node:fs/promises';
import { isNotFound } from '../errors.js';

const NEWLINE = 0x0a;
const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Yields the lines of a file last-to-first without loading it whole.
 *
 * The file is read backwards in fixed-size chunks. Lines are split on raw
 * bytes and decoded only once complete, so multi-byte UTF-8 sequences that
 * straddle a chunk boundary decode correctly. Empty lines are not yielded.
 *
 * The file size is captured when iteration starts; bytes appended later
 * are not observed. A missing file yields nothing.
 */
export async function* readLinesReverse(
  path: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
): AsyncGenerator<string> {
  const handle = await open(path, 'r').catch((err: unknown) => {
    if (isNotFound(err)) return null;
    throw err;
  });
  if (handle === null) return;

  try {
    const { size } = await handle.stat();
    let position = size;
    let carry: Buffer = Buffer.alloc(0);

    while (position > 0) {
      const length = Math.min(chunkSize, position);
      position -= length;

      const chunk = Buffer.alloc(length);
      const { bytesRead } = await handle.read(chunk, 0, length, position);
      const buffer = Buffer.concat([chunk.subarray(0, bytesRead), carry]);

      let end = buffer.length;
      for (let i = buffer.length - 1; i >= 0; i--) {
        if (buffer[i] !== NEWLINE) continue;
        if (i + 1 < end) yield buffer.toString('utf8', i + 1, end);
        end = i;
      }
      carry = buffer.subarray(0, end);
    }

    if (carry.length > 0) yield carry.toString('utf8');
  } finally {
    await handle.close();
  }
}
