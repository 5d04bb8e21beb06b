/**
 * Domain error types
 *
 * Run-level failures throw one of these; per-bucket and per-source failures
 * are logged and reported as absent data instead.
 *
 * @module core/errors
 */

/**
 * Source timestamp could not be parsed into an aligned bucket
 */
export class TimestampError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Cannot align timestamp '${input}': ${reason}`);
    this.name = 'TimestampError';
    this.input = input;
  }
}

/**
 * Malformed or unsupported GRIB2 content
 */
export class Grib2FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Grib2FormatError';
  }
}

/**
 * Malformed NetCDF content or missing data variable
 */
export class NetcdfFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NetcdfFormatError';
  }
}

/**
 * A grid geometry could not be obtained from its sample artifact
 */
export class GridUnavailableError extends Error {
  readonly source: 'grib2' | 'netcdf';

  constructor(source: 'grib2' | 'netcdf', reason: string) {
    super(`${source} grid unavailable: ${reason}`);
    this.name = 'GridUnavailableError';
    this.source = source;
  }
}

/**
 * Incident query failed or returned rows that do not match the expected shape
 */
export class IncidentSourceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'IncidentSourceError';
  }
}

/**
 * Invalid or incomplete configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
