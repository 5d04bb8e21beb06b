/**
 * Decompression helpers with scoped temporary files
 *
 * Decompressed artifacts land beside their archive under a name carrying the
 * process id, e.g. `MRMS_..._20240601-120000.grib2.4821.tmp`, and are removed
 * once the callback settles, whatever the outcome.
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { unlink } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { createGunzip, gunzipSync } from 'node:zlib';
import { createLogger, errorMessage } from '../core/utils/logger.js';

const log = createLogger({ module: 'gzip' });

/**
 * Detect gzip by magic bytes (0x1F 0x8B)
 */
export function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

/**
 * Return the payload decompressed when gzip, unchanged otherwise
 */
export function maybeGunzip(data: Uint8Array): Uint8Array {
  if (!isGzip(data)) {
    return data;
  }
  try {
    return gunzipSync(data);
  } catch (error) {
    throw new Error(`Failed to decompress gzip: ${errorMessage(error)}`);
  }
}

/**
 * Temporary path for the decompressed form of `archivePath`
 */
export function tempPathFor(archivePath: string, pid: number = process.pid): string {
  const stem = archivePath.endsWith('.gz') ? archivePath.slice(0, -3) : archivePath;
  return `${stem}.${pid}.tmp`;
}

/**
 * Gunzip `archivePath` to a temporary file, run `fn` on it, then remove it
 */
export async function withDecompressedFile<T>(
  archivePath: string,
  fn: (decompressedPath: string) => Promise<T>
): Promise<T> {
  const tempPath = tempPathFor(archivePath);

  try {
    await pipeline(createReadStream(archivePath), createGunzip(), createWriteStream(tempPath));
    return await fn(tempPath);
  } finally {
    try {
      await unlink(tempPath);
    } catch (error) {
      // ENOENT when decompression failed before the file was created
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        log.warn('Failed to remove temporary file', { tempPath, error: errorMessage(error) });
      }
    }
  }
}
