/**
 * precip-reconcile
 *
 * Nearest-cell reconciliation of a curvilinear GRIB2 precipitation grid and
 * a regular NetCDF grid against geolocated, timestamped incident records.
 *
 * @packageDocumentation
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export { Logger, logger, createLogger, configureLogger, type LogLevel } from './core/utils/logger.js';
export { atomicWriteFile, atomicWriteJSON } from './core/utils/atomic-write.js';

// Spatial
export * from './spatial/types.js';
export { haversineDistance, normalizeLon180, toLon180, toLon360, EARTH_RADIUS_M } from './spatial/geodesy.js';
export { KDTree } from './spatial/kd-tree.js';
export {
  RegularGridResolver,
  buildMonotonicAxis,
  buildRegularGrid,
  nearestAxisIndices,
  vectorizedNearestIndices,
} from './spatial/regular-grid.js';
export {
  CurvilinearIndex,
  CurvilinearResolver,
  meshFrom2D,
  meshFromAxes,
} from './spatial/curvilinear-index.js';
export { classifyCellValue } from './spatial/validity.js';

// Alignment
export * from './alignment/timestamp.js';
export { groupIncidentsByBucket, type BucketGroup, type GroupingResult } from './alignment/grouping.js';

// Resilience
export * from './resilience/types.js';
export { Bulkhead, createBulkhead } from './resilience/bulkhead.js';
export { RetryExecutor, computeRetryDelayMs, parseRetryAfter } from './resilience/retry.js';

// Acquisition
export * from './acquisition/artifact-fetcher.js';
export * from './acquisition/artifact-store.js';
export * from './acquisition/download-phase.js';
export * from './acquisition/fetch-diagnostics.js';
export * from './acquisition/sources.js';

// Extractors
export * from './extractors/grib2-extractor.js';
export * from './extractors/netcdf-extractor.js';
export { fieldFromMessage, parseGrib2, gridAxes, type Grib2Field } from './extractors/grib2/decoder.js';

// Incidents
export * from './incidents/incident-source.js';
export * from './incidents/postgres-incident-source.js';

// Comparison
export * from './comparison/merge.js';
export * from './comparison/grid-bootstrap.js';
export * from './comparison/orchestrator.js';
export * from './comparison/output.js';

// CLI library
export * from './cli/lib/config.js';
export { EXIT_CODES, exitCodeForError, type ExitCode } from './cli/lib/exit-codes.js';
