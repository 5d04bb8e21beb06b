/**
 * Timestamp Alignment Tests
 *
 * Validates parsing of source timestamps and even-minute bucketing.
 */

import { describe, it, expect } from 'vitest';
import { TimestampError } from '../../../core/errors.js';
import {
  BUCKET_MS,
  alignTimestamp,
  bucketFromEpoch,
  formatCompactStamp,
  formatFileStamp,
  formatIsoUtc,
  formatPathDate,
  parseSourceTimestamp,
} from '../../../alignment/timestamp.js';

describe('alignTimestamp', () => {
  it('should floor odd minutes to the previous even minute', () => {
    expect(alignTimestamp('2024-06-01 12:03:45').key).toBe('2024-06-01T12:02:00Z');
  });

  it('should keep even minutes and drop seconds', () => {
    expect(alignTimestamp('2024-06-01 12:04:59.999').key).toBe('2024-06-01T12:04:00Z');
    expect(alignTimestamp('2024-06-01T12:04').key).toBe('2024-06-01T12:04:00Z');
  });

  it('should treat zone-less values as UTC', () => {
    const bucket = alignTimestamp('2024-06-01 00:01:00');
    expect(bucket.epochMs).toBe(Date.UTC(2024, 5, 1, 0, 0, 0));
  });

  it('should accept UTC and Z suffixes', () => {
    expect(alignTimestamp('2024-06-01 12:03:45.123456 UTC').key).toBe('2024-06-01T12:02:00Z');
    expect(alignTimestamp('2024-06-01T12:03:45Z').key).toBe('2024-06-01T12:02:00Z');
  });

  it('should convert offsets to UTC', () => {
    expect(alignTimestamp('2024-06-01T07:03:45-05:00').key).toBe('2024-06-01T12:02:00Z');
    expect(alignTimestamp('2024-06-01 17:33:00+0530').key).toBe('2024-06-01T12:02:00Z');
  });

  it('should cross the day boundary when converting', () => {
    expect(alignTimestamp('2024-06-01T23:59:59-01:00').key).toBe('2024-06-02T00:58:00Z');
  });

  it('should accept Date values', () => {
    expect(alignTimestamp(new Date(Date.UTC(2024, 0, 31, 23, 59, 30))).key).toBe(
      '2024-01-31T23:58:00Z'
    );
  });

  it('should reject malformed input', () => {
    expect(() => alignTimestamp('yesterday')).toThrow(TimestampError);
    expect(() => alignTimestamp('2024-13-01 00:00:00')).toThrow(TimestampError);
    expect(() => alignTimestamp('2023-02-29 00:00:00')).toThrow(TimestampError);
    expect(() => alignTimestamp(new Date(NaN))).toThrow(TimestampError);
  });
});

describe('bucketFromEpoch', () => {
  it('should produce multiples of the bucket width', () => {
    const epoch = Date.UTC(2024, 5, 1, 12, 3, 45, 500);
    const bucket = bucketFromEpoch(epoch);
    expect(bucket.epochMs % BUCKET_MS).toBe(0);
    expect(epoch - bucket.epochMs).toBe(105_500);
  });
});

describe('parseSourceTimestamp', () => {
  it('should ignore fractional seconds', () => {
    expect(parseSourceTimestamp('2024-06-01 12:03:45.9')).toBe(Date.UTC(2024, 5, 1, 12, 3, 45));
  });
});

describe('formatters', () => {
  const epoch = Date.UTC(2024, 5, 1, 9, 4, 0);

  it('should format path, compact, file and ISO stamps', () => {
    expect(formatPathDate(epoch)).toBe('20240601');
    expect(formatCompactStamp(epoch)).toBe('202406010904');
    expect(formatFileStamp(epoch)).toBe('20240601-090400');
    expect(formatIsoUtc(epoch)).toBe('2024-06-01T09:04:00+00:00');
  });
});
