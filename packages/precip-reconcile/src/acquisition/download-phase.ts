/**
 * Download Phase
 *
 * Starts every GRIB2 download and every NetCDF fetch for every bucket at
 * once, all behind a single shared bulkhead, and waits for the whole batch
 * before extraction begins.
 *
 * @module acquisition/download-phase
 */

import {
  formatCompactStamp,
  formatFileStamp,
  type AlignedBucket,
} from '../alignment/timestamp.js';
import type { Bulkhead } from '../resilience/bulkhead.js';
import type { RetryConfig, SleepFn } from '../resilience/types.js';
import { createLogger } from '../core/utils/logger.js';
import {
  fetchArtifact,
  type FetchFn,
  type FetcherContext,
  type PayloadValidator,
  type TerminalFetchOutcome,
} from './artifact-fetcher.js';
import { downloadToFile, type StoredArtifact } from './artifact-store.js';
import { FetchDiagnostics, type FetchDiagnosticsSnapshot } from './fetch-diagnostics.js';
import {
  grib2LocalPath,
  grib2Url,
  netcdfUrl,
  type Grib2SourceConfig,
  type NetcdfSourceConfig,
} from './sources.js';

const log = createLogger({ module: 'download-phase' });

export interface DownloadPhaseOptions {
  readonly bulkhead: Bulkhead;
  readonly retry: RetryConfig;
  readonly netcdf: NetcdfSourceConfig;
  readonly grib2: Grib2SourceConfig;
  readonly gribDirectory: string;
  readonly validateNetcdf: PayloadValidator;
  readonly requestTimeoutMs: number;
  readonly downloadTimeoutMs: number;
  readonly fetchImpl?: FetchFn;
  readonly sleep?: SleepFn;
}

export interface DownloadPhaseResult {
  /** NetCDF outcomes keyed by bucket key */
  readonly netcdf: ReadonlyMap<string, TerminalFetchOutcome>;
  /** GRIB2 files keyed by bucket key */
  readonly grib2: ReadonlyMap<string, StoredArtifact>;
  readonly diagnostics: FetchDiagnosticsSnapshot;
}

export async function runDownloadPhase(
  buckets: readonly AlignedBucket[],
  options: DownloadPhaseOptions
): Promise<DownloadPhaseResult> {
  const diagnostics = new FetchDiagnostics();
  const shared = {
    bulkhead: options.bulkhead,
    diagnostics,
    retry: options.retry,
    fetchImpl: options.fetchImpl,
    sleep: options.sleep,
  };
  const netcdfContext: FetcherContext = { ...shared, timeoutMs: options.requestTimeoutMs };
  const grib2Context: FetcherContext = { ...shared, timeoutMs: options.downloadTimeoutMs };

  log.info('Starting downloads', {
    buckets: buckets.length,
    bulkhead: options.bulkhead.getStats().name,
  });

  const grib2Tasks = buckets.map(async (bucket) => {
    const stored = await downloadToFile(
      { url: grib2Url(options.grib2, bucket.epochMs), key: formatFileStamp(bucket.epochMs) },
      grib2LocalPath(options.gribDirectory, options.grib2, bucket.epochMs),
      grib2Context
    );
    return [bucket.key, stored] as const;
  });

  const netcdfTasks = buckets.map(async (bucket) => {
    const outcome = await fetchArtifact(
      {
        url: netcdfUrl(options.netcdf, bucket.epochMs),
        key: formatCompactStamp(bucket.epochMs),
        validate: options.validateNetcdf,
      },
      netcdfContext
    );
    return [bucket.key, outcome] as const;
  });

  const [grib2Results, netcdfResults] = await Promise.all([
    Promise.all(grib2Tasks),
    Promise.all(netcdfTasks),
  ]);

  const result: DownloadPhaseResult = {
    grib2: new Map(grib2Results),
    netcdf: new Map(netcdfResults),
    diagnostics: diagnostics.snapshot(),
  };

  log.info('Downloads complete', {
    grib2Available: grib2Results.filter(([, s]) => s.status !== 'failed').length,
    netcdfValid: netcdfResults.filter(([, o]) => o.status === 'success').length,
    buckets: buckets.length,
    ...result.diagnostics,
  });

  return result;
}
