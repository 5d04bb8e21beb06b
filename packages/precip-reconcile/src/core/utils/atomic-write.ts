/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so that a crash mid-write never leaves a
 * truncated artifact or report behind. Downloads are skipped when the
 * destination exists, so a partial file would otherwise be trusted forever.
 *
 * Temp names carry the PID and a timestamp to keep concurrent writers apart.
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger, errorMessage } from './logger.js';

const log = createLogger({ module: 'atomic-write' });

/**
 * Atomically write bytes or text to a file, creating parent directories
 *
 * @example
 * ```typescript
 * await atomicWriteFile('data/grib2/MRMS_PrecipRate_00.00_20240601-120000.grib2.gz', bytes);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      log.debug('Temp file already gone', { tempPath, error: errorMessage(cleanupError) });
    });
    throw error;
  }
}

type NumericTypedArray =
  | Float64Array
  | Float32Array
  | Int32Array
  | Int16Array
  | Int8Array
  | Uint32Array
  | Uint16Array
  | Uint8Array;

function isNumericTypedArray(value: unknown): value is NumericTypedArray {
  return (
    value instanceof Float64Array ||
    value instanceof Float32Array ||
    value instanceof Int32Array ||
    value instanceof Int16Array ||
    value instanceof Int8Array ||
    value instanceof Uint32Array ||
    value instanceof Uint16Array ||
    value instanceof Uint8Array
  );
}

/**
 * JSON replacer for values JSON.stringify cannot represent natively
 *
 * bigint becomes a string, numeric typed arrays and Maps become plain
 * arrays and objects, NaN and Infinity become null.
 */
export function jsonFallbackReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return null;
  }
  if (isNumericTypedArray(value)) {
    return Array.from(value);
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

/**
 * Atomically write JSON data to file
 *
 * @param space - JSON.stringify indentation (reports use 4)
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 4
): Promise<void> {
  const json = JSON.stringify(data, jsonFallbackReplacer, space);
  await atomicWriteFile(filePath, json);
}
