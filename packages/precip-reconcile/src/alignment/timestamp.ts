/**
 * Timestamp Alignment
 *
 * Canonicalizes heterogeneous source timestamps into even-minute UTC buckets.
 * Both MRMS products are published on a 2-minute cadence, so the bucket is
 * the join key between incidents and downloaded artifacts.
 *
 * Accepted string forms:
 *   2024-06-01 12:03:45
 *   2024-06-01 12:03:45.123456 UTC
 *   2024-06-01T12:03:45Z
 *   2024-06-01T07:03:45-05:00
 *
 * @module alignment/timestamp
 */

import { TimestampError } from '../core/errors.js';

/** Bucket width: two minutes */
export const BUCKET_MS = 2 * 60 * 1000;

/**
 * Canonical even-minute UTC instant
 */
export interface AlignedBucket {
  /** Milliseconds since epoch, a multiple of BUCKET_MS */
  readonly epochMs: number;
  /** ISO-8601 UTC form, e.g. 2024-06-01T12:02:00Z */
  readonly key: string;
}

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?\s*(Z|UTC|[+-]\d{2}(?::?\d{2})?)?$/i;

function parseOffsetMinutes(zone: string): number {
  const upper = zone.toUpperCase();
  if (upper === 'Z' || upper === 'UTC') {
    return 0;
  }

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse a source timestamp into epoch milliseconds (UTC)
 *
 * @throws TimestampError when the string is not a recognized timestamp
 */
export function parseSourceTimestamp(value: string | Date): number {
  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      throw new TimestampError(String(value), 'invalid Date');
    }
    return ms;
  }

  const input = value.trim();
  const match = TIMESTAMP_PATTERN.exec(input);
  if (!match) {
    throw new TimestampError(value, 'unrecognized format');
  }

  const [, y, mo, d, h, mi, s, , zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = s === undefined ? 0 : Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    throw new TimestampError(value, 'field out of range');
  }

  const local = Date.UTC(year, month - 1, day, hour, minute, second);
  if (new Date(local).getUTCDate() !== day) {
    throw new TimestampError(value, 'day out of range for month');
  }

  const offset = zone === undefined ? 0 : parseOffsetMinutes(zone);
  return local - offset * 60 * 1000;
}

/**
 * Floor an instant to its even-minute bucket
 */
export function bucketFromEpoch(epochMs: number): AlignedBucket {
  const remainder = ((epochMs % BUCKET_MS) + BUCKET_MS) % BUCKET_MS;
  const floored = epochMs - remainder;
  return {
    epochMs: floored,
    key: new Date(floored).toISOString().replace('.000Z', 'Z'),
  };
}

/**
 * Align a source timestamp: attach UTC when zone-less, convert when zoned,
 * drop seconds and sub-seconds, floor the minute to an even number
 *
 * @throws TimestampError when the value cannot be parsed
 */
export function alignTimestamp(value: string | Date): AlignedBucket {
  return bucketFromEpoch(parseSourceTimestamp(value));
}

// ============================================================================
// Formatters (UTC)
// ============================================================================

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** YYYYMMDD */
export function formatPathDate(epochMs: number): string {
  const d = new Date(epochMs);
  return `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
}

/** YYYYMMDDHHMM, the NetCDF service key */
export function formatCompactStamp(epochMs: number): string {
  const d = new Date(epochMs);
  return `${formatPathDate(epochMs)}${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}`;
}

/** YYYYMMDD-HHMMSS, as used in GRIB2 object names */
export function formatFileStamp(epochMs: number): string {
  const d = new Date(epochMs);
  return `${formatPathDate(epochMs)}-${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
}

/** YYYY-MM-DDTHH:MM:SS+00:00 */
export function formatIsoUtc(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 19) + '+00:00';
}
