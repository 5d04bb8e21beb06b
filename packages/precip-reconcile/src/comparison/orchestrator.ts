/**
 * Comparison Orchestrator
 *
 * Drives one run: incidents → buckets → downloads → grid bootstrap →
 * per-bucket extraction and matching → merged records.
 *
 * Each bucket moves through pending → downloaded → extracted → matched →
 * merged. Extraction and matching run bucket by bucket in first-seen order.
 * A source that is missing or fails for a bucket only removes that source's
 * fields from the bucket's records; run-level failures (incident query,
 * grid bootstrap) abort the run. The incident source is closed on every
 * exit path.
 *
 * @module comparison/orchestrator
 */

import type { FetchFn, PayloadValidator } from '../acquisition/artifact-fetcher.js';
import { fileExists } from '../acquisition/artifact-store.js';
import { runDownloadPhase } from '../acquisition/download-phase.js';
import type { FetchDiagnosticsSnapshot } from '../acquisition/fetch-diagnostics.js';
import {
  grib2LocalPath,
  grib2Url,
  netcdfUrl,
  type Grib2SourceConfig,
  type NetcdfSourceConfig,
} from '../acquisition/sources.js';
import { groupIncidentsByBucket, type BucketGroup } from '../alignment/grouping.js';
import { formatCompactStamp, formatIsoUtc } from '../alignment/timestamp.js';
import type {
  Grib2MatchFields,
  MergedRecord,
  NetcdfMatchFields,
  ValuePredicate,
} from '../core/types.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import {
  extractGrib2Values,
  type Grib2Extraction,
  type Grib2Metadata,
} from '../extractors/grib2-extractor.js';
import {
  extractNetcdf,
  isValidNetcdf,
  type NetcdfExtraction,
  type NetcdfMetadata,
} from '../extractors/netcdf-extractor.js';
import type { IncidentSource } from '../incidents/incident-source.js';
import { Bulkhead } from '../resilience/bulkhead.js';
import type { RetryConfig, SleepFn } from '../resilience/types.js';
import { CurvilinearResolver } from '../spatial/curvilinear-index.js';
import { RegularGridResolver } from '../spatial/regular-grid.js';
import type { GeoPoint } from '../spatial/types.js';
import type { DownloadPhaseResult } from '../acquisition/download-phase.js';
import { bootstrapCurvilinearIndex, bootstrapRegularGrid } from './grid-bootstrap.js';
import { grib2Fields, mergeIncident, netcdfFields } from './merge.js';

const log = createLogger({ module: 'orchestrator' });

// ============================================================================
// Types
// ============================================================================

export interface ComparisonSettings {
  readonly predicate: ValuePredicate;
  /** Maximum incidents read from the source */
  readonly limit: number;
  /** Shared download concurrency across both sources */
  readonly concurrency: number;
  readonly retry: RetryConfig;
  readonly requestTimeoutMs: number;
  readonly downloadTimeoutMs: number;
  readonly netcdf: NetcdfSourceConfig;
  readonly grib2: Grib2SourceConfig;
  readonly gribDirectory: string;
  /** Timestamp of the artifacts used to build both grids */
  readonly sampleEpochMs: number;
}

export interface ComparisonDependencies {
  readonly incidentSource: IncidentSource;
  readonly fetchImpl?: FetchFn;
  readonly sleep?: SleepFn;
  readonly validateNetcdf?: PayloadValidator;
}

export type BucketState = 'pending' | 'downloaded' | 'extracted' | 'matched' | 'merged';

export type SourceStatus =
  | 'matched'
  | 'not-downloaded'
  | 'invalid-payload'
  | 'missing-file'
  | 'extract-failed'
  | 'match-failed';

export interface BucketReport {
  readonly key: string;
  readonly incidents: number;
  readonly state: BucketState;
  readonly netcdf: SourceStatus;
  readonly grib2: SourceStatus;
}

export interface CompletedComparison {
  readonly status: 'completed';
  readonly records: readonly MergedRecord[];
  /** GRIB2 metadata keyed by file name */
  readonly grib2Metadata: Readonly<Record<string, Grib2Metadata>>;
  /** NetCDF metadata keyed by YYYYMMDDHHMM */
  readonly netcdfMetadata: Readonly<Record<string, NetcdfMetadata>>;
  readonly buckets: readonly BucketReport[];
  readonly diagnostics: FetchDiagnosticsSnapshot;
  /** Incidents dropped before bucketing (bad rows, bad timestamps) */
  readonly skippedIncidents: number;
}

export type ComparisonResult =
  | { readonly status: 'no-incidents'; readonly rejectedRows: number }
  | CompletedComparison;

// ============================================================================
// Bucket processing
// ============================================================================

interface BucketContext {
  readonly settings: ComparisonSettings;
  readonly downloads: DownloadPhaseResult;
  readonly netcdfResolver: RegularGridResolver;
  readonly grib2Resolver: CurvilinearResolver;
  readonly grib2Metadata: Record<string, Grib2Metadata>;
  readonly netcdfMetadata: Record<string, NetcdfMetadata>;
}

interface SourceMatches<T> {
  readonly status: SourceStatus;
  readonly fields: readonly T[] | null;
}

type SourceExtraction<T> =
  | { readonly ok: true; readonly extraction: T }
  | { readonly ok: false; readonly status: SourceStatus };

async function extractNetcdfSource(
  group: BucketGroup,
  key: string,
  ctx: BucketContext
): Promise<SourceExtraction<NetcdfExtraction>> {
  const outcome = ctx.downloads.netcdf.get(group.bucket.key);

  if (!outcome || outcome.status !== 'success') {
    const status = outcome?.status === 'invalid-payload' ? 'invalid-payload' : 'not-downloaded';
    log.warn('NetCDF payload not available', { key, status, reason: outcome?.reason });
    return { ok: false, status };
  }

  const extraction = await extractNetcdf(outcome.payload, ctx.settings.netcdf.productCode, key);
  return extraction ? { ok: true, extraction } : { ok: false, status: 'extract-failed' };
}

async function extractGrib2Source(
  group: BucketGroup,
  ctx: BucketContext
): Promise<SourceExtraction<Grib2Extraction>> {
  const path = grib2LocalPath(ctx.settings.gribDirectory, ctx.settings.grib2, group.bucket.epochMs);

  if (!(await fileExists(path))) {
    log.warn('GRIB2 file not found', { path });
    return { ok: false, status: 'missing-file' };
  }

  const extraction = await extractGrib2Values(path, ctx.settings.grib2.parameter);
  return extraction ? { ok: true, extraction } : { ok: false, status: 'extract-failed' };
}

function matchNetcdf(
  source: SourceExtraction<NetcdfExtraction>,
  points: readonly GeoPoint[],
  key: string,
  ctx: BucketContext
): SourceMatches<NetcdfMatchFields> {
  if (!source.ok) {
    return { status: source.status, fields: null };
  }
  const { extraction } = source;

  try {
    const matches = ctx.netcdfResolver.resolve(points, {
      rows: extraction.rows,
      cols: extraction.cols,
      data: extraction.values,
    });
    ctx.netcdfMetadata[key] = extraction.metadata;
    const metadata = { ...extraction.metadata };
    return {
      status: 'matched',
      fields: matches.map((m) => netcdfFields(m, ctx.settings.netcdf.productCode, metadata)),
    };
  } catch (error) {
    log.error('Failed to match NetCDF grid', { key, error: errorMessage(error) });
    return { status: 'match-failed', fields: null };
  }
}

function matchGrib2(
  source: SourceExtraction<Grib2Extraction>,
  points: readonly GeoPoint[],
  ctx: BucketContext
): SourceMatches<Grib2MatchFields> {
  if (!source.ok) {
    return { status: source.status, fields: null };
  }
  const { extraction } = source;

  try {
    const matches = ctx.grib2Resolver.resolve(points, {
      rows: extraction.rows,
      cols: extraction.cols,
      data: extraction.values,
    });
    ctx.grib2Metadata[extraction.fileName] = extraction.metadata;
    const metadata = { ...extraction.metadata };
    return {
      status: 'matched',
      fields: matches.map((m) =>
        grib2Fields(
          m,
          extraction.rawValues[m.row * extraction.cols + m.col],
          extraction.metadata.units,
          metadata
        )
      ),
    };
  } catch (error) {
    log.error('Failed to match GRIB2 grid', { file: extraction.fileName, error: errorMessage(error) });
    return { status: 'match-failed', fields: null };
  }
}

async function processBucket(
  group: BucketGroup,
  ctx: BucketContext
): Promise<{ report: BucketReport; records: MergedRecord[] }> {
  const key = group.bucket.key;
  const stamp = formatCompactStamp(group.bucket.epochMs);
  const transition = (state: BucketState, detail: Record<string, unknown> = {}): BucketState => {
    log.debug('Bucket state', { key, state, ...detail });
    return state;
  };

  let state = transition('downloaded');

  const netcdfSource = await extractNetcdfSource(group, stamp, ctx);
  const grib2Source = await extractGrib2Source(group, ctx);
  state = transition('extracted', { netcdf: netcdfSource.ok, grib2: grib2Source.ok });

  const points: GeoPoint[] = group.incidents.map((i) => ({ lat: i.lat, lon: i.lon }));
  const netcdf = matchNetcdf(netcdfSource, points, stamp, ctx);
  const grib2 = matchGrib2(grib2Source, points, ctx);
  state = transition('matched', { netcdf: netcdf.status, grib2: grib2.status });

  const provenance = {
    alignedUtcTimestamp: formatIsoUtc(group.bucket.epochMs),
    grib2SourceUrl: grib2Url(ctx.settings.grib2, group.bucket.epochMs),
    netcdfSourceUrl: netcdfUrl(ctx.settings.netcdf, group.bucket.epochMs),
  };

  const records = group.incidents.map((incident, i) =>
    mergeIncident(incident, provenance, netcdf.fields?.[i], grib2.fields?.[i])
  );
  state = transition('merged', { records: records.length });

  return {
    report: { key, incidents: group.incidents.length, state, netcdf: netcdf.status, grib2: grib2.status },
    records,
  };
}

// ============================================================================
// Run
// ============================================================================

export async function runComparison(
  settings: ComparisonSettings,
  deps: ComparisonDependencies
): Promise<ComparisonResult> {
  try {
    log.info('Fetching incidents', { predicate: settings.predicate, limit: settings.limit });
    const batch = await deps.incidentSource.fetchIncidents({
      predicate: settings.predicate,
      limit: settings.limit,
    });

    if (batch.incidents.length === 0) {
      log.warn('No incidents found for the requested subset', { predicate: settings.predicate });
      return { status: 'no-incidents', rejectedRows: batch.rejected.length };
    }

    const grouping = groupIncidentsByBucket(batch.incidents);
    const groups = [...grouping.groups.values()];
    log.info('Grouped incidents by aligned timestamp', {
      incidents: batch.incidents.length,
      buckets: groups.length,
      skipped: grouping.skipped.length,
    });

    const validateNetcdf = deps.validateNetcdf ?? isValidNetcdf;
    const transport = {
      retry: settings.retry,
      requestTimeoutMs: settings.requestTimeoutMs,
      downloadTimeoutMs: settings.downloadTimeoutMs,
      fetchImpl: deps.fetchImpl,
      sleep: deps.sleep,
    };

    const downloads = await runDownloadPhase(
      groups.map((g) => g.bucket),
      {
        ...transport,
        bulkhead: new Bulkhead({ name: 'artifact-downloads', maxConcurrent: settings.concurrency }),
        netcdf: settings.netcdf,
        grib2: settings.grib2,
        gribDirectory: settings.gribDirectory,
        validateNetcdf,
      }
    );

    const bootstrap = {
      ...transport,
      sampleEpochMs: settings.sampleEpochMs,
      grib2: settings.grib2,
      gribDirectory: settings.gribDirectory,
      netcdf: settings.netcdf,
      validateNetcdf,
    };
    const grib2Index = await bootstrapCurvilinearIndex(bootstrap);
    const netcdfGrid = await bootstrapRegularGrid(bootstrap);

    const ctx: BucketContext = {
      settings,
      downloads,
      netcdfResolver: new RegularGridResolver(netcdfGrid),
      grib2Resolver: new CurvilinearResolver(grib2Index),
      grib2Metadata: {},
      netcdfMetadata: {},
    };

    log.info('Processing buckets', { buckets: groups.length });
    const records: MergedRecord[] = [];
    const reports: BucketReport[] = [];

    for (const [i, group] of groups.entries()) {
      if ((i + 1) % 10 === 0) {
        log.info('Processing bucket', { index: i + 1, total: groups.length });
      }
      const processed = await processBucket(group, ctx);
      records.push(...processed.records);
      reports.push(processed.report);
    }

    log.info('Comparison complete', {
      records: records.length,
      netcdfMatchedBuckets: reports.filter((r) => r.netcdf === 'matched').length,
      grib2MatchedBuckets: reports.filter((r) => r.grib2 === 'matched').length,
      ...downloads.diagnostics,
    });

    return {
      status: 'completed',
      records,
      grib2Metadata: ctx.grib2Metadata,
      netcdfMetadata: ctx.netcdfMetadata,
      buckets: reports,
      diagnostics: downloads.diagnostics,
      skippedIncidents: batch.rejected.length + grouping.skipped.length,
    };
  } finally {
    await deps.incidentSource.close();
  }
}
