/**
 * Grid Bootstrap
 *
 * Both grid geometries are fixed for the products compared, so each is
 * built once per run from a sample artifact at a known-good timestamp:
 * the GRIB2 mesh becomes a KD-tree index, the NetCDF axes a regular grid.
 * Failing to obtain either aborts the run before any bucket is processed.
 */

import { fetchArtifact, type FetchFn, type PayloadValidator } from '../acquisition/artifact-fetcher.js';
import { downloadToFile } from '../acquisition/artifact-store.js';
import { FetchDiagnostics } from '../acquisition/fetch-diagnostics.js';
import {
  grib2LocalPath,
  grib2Url,
  netcdfUrl,
  type Grib2SourceConfig,
  type NetcdfSourceConfig,
} from '../acquisition/sources.js';
import { formatCompactStamp, formatFileStamp } from '../alignment/timestamp.js';
import { GridUnavailableError } from '../core/errors.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import { extractGrib2Grid } from '../extractors/grib2-extractor.js';
import { decodeNetcdf } from '../extractors/netcdf-extractor.js';
import { Bulkhead } from '../resilience/bulkhead.js';
import type { RetryConfig, SleepFn } from '../resilience/types.js';
import { CurvilinearIndex, meshFromAxes } from '../spatial/curvilinear-index.js';
import { buildRegularGrid } from '../spatial/regular-grid.js';
import type { RegularGrid } from '../spatial/types.js';

const log = createLogger({ module: 'grid-bootstrap' });

export interface GridBootstrapOptions {
  readonly sampleEpochMs: number;
  readonly grib2: Grib2SourceConfig;
  readonly gribDirectory: string;
  readonly netcdf: NetcdfSourceConfig;
  readonly validateNetcdf: PayloadValidator;
  readonly retry: RetryConfig;
  readonly requestTimeoutMs: number;
  readonly downloadTimeoutMs: number;
  readonly fetchImpl?: FetchFn;
  readonly sleep?: SleepFn;
}

/**
 * Download the sample GRIB2 file (reusing a local copy) and index its mesh
 *
 * @throws GridUnavailableError
 */
export async function bootstrapCurvilinearIndex(
  options: GridBootstrapOptions
): Promise<CurvilinearIndex> {
  const path = grib2LocalPath(options.gribDirectory, options.grib2, options.sampleEpochMs);
  const stored = await downloadToFile(
    { url: grib2Url(options.grib2, options.sampleEpochMs), key: formatFileStamp(options.sampleEpochMs) },
    path,
    {
      bulkhead: new Bulkhead({ name: 'grib2-sample', maxConcurrent: 1 }),
      diagnostics: new FetchDiagnostics(),
      retry: options.retry,
      timeoutMs: options.downloadTimeoutMs,
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
    }
  );

  if (stored.status === 'failed') {
    throw new GridUnavailableError('grib2', `sample download failed (${stored.reason})`);
  }

  const grid = await extractGrib2Grid(path, options.grib2.parameter);
  if (!grid) {
    throw new GridUnavailableError('grib2', `sample ${path} has no usable field`);
  }

  const index = new CurvilinearIndex(meshFromAxes(grid.lat, grid.lon));
  log.info('Built GRIB2 grid index', {
    rows: index.grid.rows,
    cols: index.grid.cols,
    points: index.size,
  });
  return index;
}

/**
 * Fetch the sample NetCDF payload and read its coordinate axes
 *
 * @throws GridUnavailableError
 */
export async function bootstrapRegularGrid(options: GridBootstrapOptions): Promise<RegularGrid> {
  const outcome = await fetchArtifact(
    {
      url: netcdfUrl(options.netcdf, options.sampleEpochMs),
      key: formatCompactStamp(options.sampleEpochMs),
      validate: options.validateNetcdf,
    },
    {
      bulkhead: new Bulkhead({ name: 'netcdf-sample', maxConcurrent: 1 }),
      diagnostics: new FetchDiagnostics(),
      retry: options.retry,
      timeoutMs: options.requestTimeoutMs,
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
    }
  );

  if (outcome.status !== 'success') {
    throw new GridUnavailableError('netcdf', `sample fetch ended as ${outcome.status} (${outcome.reason})`);
  }

  try {
    const decoded = await decodeNetcdf(outcome.payload, options.netcdf.productCode);
    const grid = buildRegularGrid(decoded.lat, decoded.lon);
    log.info('Read NetCDF grid axes', {
      lat: grid.lat.values.length,
      lon: grid.lon.values.length,
      lonConvention: grid.lonConvention,
    });
    return grid;
  } catch (error) {
    throw new GridUnavailableError('netcdf', errorMessage(error));
  }
}
