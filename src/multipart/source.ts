/**
 * Byte sources for uploads
 */

import { open, stat } from 'node:fs/promises';
import { ValidationError } from '../errors/index.js';

/**
 * A source of known size that can be read at any offset, so parts can be
 * read independently and in any order.
 */
export interface UploadSource {
  readonly size: number;
  /** Bytes in [start, end) */
  read(start: number, end: number): Promise<Uint8Array>;
  close?(): Promise<void>;
}

export type UploadBody = Uint8Array | string | UploadSource;

export function bytesSource(data: Uint8Array | string): UploadSource {
  const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  return {
    size: bytes.length,
    read: async (start, end) => bytes.subarray(start, end),
  };
}

/**
 * Positioned reads from a file, opened once and closed by `close()`
 */
export async function fileSource(path: string): Promise<UploadSource> {
  const info = await stat(path);
  if (!info.isFile()) {
    throw new ValidationError({
      message: `Not a regular file: ${path}`,
      code: 'NOT_A_FILE',
      details: { path },
    });
  }

  const handle = await open(path, 'r');

  return {
    size: info.size,
    async read(start, end) {
      const buffer = new Uint8Array(end - start);
      let offset = 0;
      while (offset < buffer.length) {
        const { bytesRead } = await handle.read(buffer, offset, buffer.length - offset, start + offset);
        if (bytesRead === 0) {
          throw new ValidationError({
            message: `File ${path} ended at ${start + offset} bytes, expected ${info.size}`,
            code: 'SOURCE_TRUNCATED',
            details: { path },
          });
        }
        offset += bytesRead;
      }
      return buffer;
    },
    close: () => handle.close(),
  };
}

export function isUploadSource(body: UploadBody): body is UploadSource {
  return typeof body === 'object' && !(body instanceof Uint8Array);
}

export function toUploadSource(body: UploadBody): UploadSource {
  return isUploadSource(body) ? body : bytesSource(body);
}
