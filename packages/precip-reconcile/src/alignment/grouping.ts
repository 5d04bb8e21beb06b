/**
 * Incident grouping by aligned bucket
 *
 * Each unique bucket triggers one artifact fetch per source and one
 * extraction per source, shared by all incidents in it. Groups keep the
 * order in which buckets were first seen.
 */

import type { Incident } from '../core/types.js';
import { TimestampError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { alignTimestamp, formatIsoUtc, type AlignedBucket } from './timestamp.js';

const log = createLogger({ module: 'alignment' });

export interface BucketGroup {
  readonly bucket: AlignedBucket;
  readonly incidents: readonly Incident[];
}

export interface SkippedIncident {
  readonly incident: Incident;
  readonly reason: string;
}

export interface GroupingResult {
  /** Keyed by bucket key, in first-seen order */
  readonly groups: ReadonlyMap<string, BucketGroup>;
  readonly skipped: readonly SkippedIncident[];
}

export interface GroupingOptions {
  /** How many leading alignments to log for spot checks (default 5) */
  readonly logSampleSize?: number;
}

export function groupIncidentsByBucket(
  incidents: readonly Incident[],
  options: GroupingOptions = {}
): GroupingResult {
  const sampleSize = options.logSampleSize ?? 5;
  const buckets = new Map<string, { bucket: AlignedBucket; incidents: Incident[] }>();
  const skipped: SkippedIncident[] = [];
  let logged = 0;

  for (const incident of incidents) {
    let bucket: AlignedBucket;
    try {
      bucket = alignTimestamp(incident.timestamp);
    } catch (error) {
      if (!(error instanceof TimestampError)) {
        throw error;
      }
      log.warn('Skipping incident with unparseable timestamp', {
        incidentId: incident.id,
        timestamp: String(incident.timestamp),
      });
      skipped.push({ incident, reason: error.message });
      continue;
    }

    if (logged < sampleSize) {
      log.info('Aligned incident timestamp', {
        incidentId: incident.id,
        source: String(incident.timestamp),
        aligned: formatIsoUtc(bucket.epochMs),
      });
      logged++;
    }

    const existing = buckets.get(bucket.key);
    if (existing) {
      existing.incidents.push(incident);
    } else {
      buckets.set(bucket.key, { bucket, incidents: [incident] });
    }
  }

  return { groups: buckets, skipped };
}
