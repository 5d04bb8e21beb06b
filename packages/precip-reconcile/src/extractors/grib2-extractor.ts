/**
 * GRIB2 Extractor
 *
 * gunzip → parse (vgrib2) → select the (discipline, category, number) field →
 * values + metadata, with the temporary decompressed file removed on every
 * path. A missing field or a decoding failure is logged and yields null.
 *
 * MRMS PrecipRate is an instantaneous rate in mm/hr; values are converted
 * here to a 2-minute accumulation (× 2/60) to line up with the NetCDF
 * 2-minute product.
 *
 * @module extractors/grib2-extractor
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Grib2ParameterId } from '../acquisition/sources.js';
import { formatPathDate } from '../alignment/timestamp.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import { withDecompressedFile } from './gzip.js';
import { gridAxes, parseGrib2, type Grib2Field } from './grib2/decoder.js';

const log = createLogger({ module: 'grib2-extractor' });

/** mm/hr → mm per 2 minutes */
export const TWO_MINUTE_FACTOR = 2 / 60;

interface ParameterNames {
  readonly name: string;
  readonly shortName: string;
  readonly units: string;
}

const PARAMETER_NAMES: Record<string, ParameterNames> = {
  '209-6-1': { name: 'Radar Precipitation Rate', shortName: 'PrecipRate', units: 'mm/hr' },
};

const TYPE_OF_LEVEL: Record<number, string> = {
  1: 'surface',
  100: 'isobaricInhPa',
  101: 'meanSea',
  102: 'heightAboveSea',
  103: 'heightAboveGround',
  200: 'entireAtmosphere',
};

/** Seconds per unit, code table 4.4 */
const TIME_UNIT_SECONDS: Record<number, number> = {
  0: 60,
  1: 3600,
  2: 86400,
  10: 3 * 3600,
  11: 6 * 3600,
  12: 12 * 3600,
  13: 1,
};

export interface Grib2GridSummary {
  readonly La1: number;
  readonly Lo1: number;
  readonly La2: number;
  readonly Lo2: number;
  readonly Ni: number;
  readonly Nj: number;
  readonly Di: number;
  readonly Dj: number;
  readonly iScansNegatively: boolean;
  readonly jScansPositively: boolean;
}

export interface Grib2Metadata {
  readonly discipline: number;
  readonly parameterCategory: number;
  readonly parameterNumber: number;
  readonly level: number | null;
  readonly typeOfLevel: string;
  readonly stepRange: string;
  readonly dataDate: number;
  readonly dataTime: number;
  readonly validityDate: number;
  readonly validityTime: number;
  readonly Ni: number;
  readonly Nj: number;
  readonly name: string;
  readonly shortName: string;
  readonly units: string;
  readonly packingType: string;
  readonly gridDefinition: Grib2GridSummary;
}

export interface Grib2Extraction {
  readonly fileName: string;
  readonly rows: number;
  readonly cols: number;
  /** Source values in mm/hr, NaN where masked */
  readonly rawValues: Float64Array;
  /** 2-minute accumulation in mm */
  readonly values: Float64Array;
  readonly metadata: Grib2Metadata;
}

export interface Grib2GridExtraction {
  readonly lat: Float64Array;
  readonly lon: Float64Array;
  readonly definition: Grib2GridSummary;
}

// ============================================================================
// Metadata
// ============================================================================

function dateNumber(epochMs: number): number {
  return Number(formatPathDate(epochMs));
}

function timeNumber(epochMs: number): number {
  const d = new Date(epochMs);
  return d.getUTCHours() * 100 + d.getUTCMinutes();
}

function forecastSeconds(field: Grib2Field): number {
  const { forecastTime, indicatorOfUnitOfTimeRange } = field.product;
  if (forecastTime === null || indicatorOfUnitOfTimeRange === null) {
    return 0;
  }
  return forecastTime * (TIME_UNIT_SECONDS[indicatorOfUnitOfTimeRange] ?? 3600);
}

function stepRange(seconds: number): string {
  if (seconds % 3600 === 0) return String(seconds / 3600);
  if (seconds % 60 === 0) return `${seconds / 60}m`;
  return `${seconds}s`;
}

export function summarizeGrid(field: Grib2Field): Grib2GridSummary {
  const { La1, Lo1, La2, Lo2, Ni, Nj, Di, Dj, iScansNegatively, jScansPositively } = field.grid;
  return { La1, Lo1, La2, Lo2, Ni, Nj, Di, Dj, iScansNegatively, jScansPositively };
}

export function describeField(field: Grib2Field): Grib2Metadata {
  const key = `${field.discipline}-${field.product.parameterCategory}-${field.product.parameterNumber}`;
  const names = PARAMETER_NAMES[key] ?? { name: 'unknown', shortName: 'unknown', units: 'unknown' };
  const reference = field.referenceTime;
  const step = forecastSeconds(field);
  const validity = reference + step * 1000;
  const surface = field.product.typeOfFirstFixedSurface;

  return {
    discipline: field.discipline,
    parameterCategory: field.product.parameterCategory,
    parameterNumber: field.product.parameterNumber,
    level: field.product.level,
    typeOfLevel: surface === null ? 'unknown' : TYPE_OF_LEVEL[surface] ?? `unknown_${surface}`,
    stepRange: stepRange(step),
    dataDate: dateNumber(reference),
    dataTime: timeNumber(reference),
    validityDate: dateNumber(validity),
    validityTime: timeNumber(validity),
    Ni: field.grid.Ni,
    Nj: field.grid.Nj,
    ...names,
    packingType: field.packing.template === 41 ? 'grid_png' : 'grid_simple',
    gridDefinition: summarizeGrid(field),
  };
}

export function findField(fields: readonly Grib2Field[], parameter: Grib2ParameterId): Grib2Field | null {
  return (
    fields.find(
      (f) =>
        f.discipline === parameter.discipline &&
        f.product.parameterCategory === parameter.category &&
        f.product.parameterNumber === parameter.number
    ) ?? null
  );
}

// ============================================================================
// Extraction
// ============================================================================

async function withField<T>(
  archivePath: string,
  parameter: Grib2ParameterId,
  fn: (field: Grib2Field) => T
): Promise<T | null> {
  try {
    return await withDecompressedFile(archivePath, async (decompressedPath) => {
      const fields = parseGrib2(await readFile(decompressedPath));
      const field = findField(fields, parameter);
      if (!field) {
        log.warn('Parameter not found in GRIB2 file', {
          file: basename(archivePath),
          parameter,
          fieldsSeen: fields.length,
        });
        return null;
      }
      return fn(field);
    });
  } catch (error) {
    log.error('Failed to decode GRIB2 file', {
      file: basename(archivePath),
      error: errorMessage(error),
    });
    return null;
  }
}

/**
 * Values and metadata of the requested parameter, or null
 */
export async function extractGrib2Values(
  archivePath: string,
  parameter: Grib2ParameterId
): Promise<Grib2Extraction | null> {
  return withField(archivePath, parameter, (field) => {
    const rawValues = field.decodeValues();
    return {
      fileName: basename(archivePath),
      rows: field.grid.Nj,
      cols: field.grid.Ni,
      rawValues,
      values: rawValues.map((v) => v * TWO_MINUTE_FACTOR),
      metadata: describeField(field),
    };
  });
}

/**
 * Grid axes of the requested parameter's field, or null
 */
export async function extractGrib2Grid(
  archivePath: string,
  parameter: Grib2ParameterId
): Promise<Grib2GridExtraction | null> {
  return withField(archivePath, parameter, (field) => ({
    ...gridAxes(field.grid),
    definition: summarizeGrid(field),
  }));
}
