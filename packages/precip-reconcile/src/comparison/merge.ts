/**
 * Per-incident record merging
 *
 * Builds a new record from the source row, provenance, and whichever
 * sources produced a match. Database fields that would collide with the
 * generated ones are renamed with a `db_` prefix; the three known MRMS
 * columns get explicit names.
 */

import type {
  Grib2MatchFields,
  Incident,
  MergedRecord,
  NetcdfMatchFields,
} from '../core/types.js';
import type { MatchResult } from '../spatial/types.js';
import { classifyCellValue } from '../spatial/validity.js';

/** Source columns with fixed replacement names */
export const DB_FIELD_RENAMES: ReadonlyMap<string, string> = new Map([
  ['data_value', 'db_netcdf_precip_mm'],
  ['mrms2_lat', 'db_netcdf_lat'],
  ['mrms2_lon', 'db_netcdf_lon'],
]);

const GENERATED_FIELDS = new Set<string>([
  'aligned_utc_timestamp',
  'grib2_source_url',
  'netcdf_source_url',
  'netcdf_nearest_lat',
  'netcdf_nearest_lon',
  'netcdf_nearest_dist_m',
  'netcdf_precip_mm',
  'netcdf_product_code',
  'netcdf_file_metadata',
  'grib2_nearest_lat',
  'grib2_nearest_lon',
  'grib2_nearest_dist_m',
  'grib2_precip_raw_value_mm_hr',
  'grib2_precip_unit',
  'grib2_precip_mm_2min',
  'grib2_file_metadata',
  ...DB_FIELD_RENAMES.values(),
]);

export interface MergeProvenance {
  readonly alignedUtcTimestamp: string;
  readonly grib2SourceUrl: string;
  readonly netcdfSourceUrl: string;
}

export function netcdfFields(
  match: MatchResult,
  productCode: string,
  metadata: Readonly<Record<string, unknown>>
): NetcdfMatchFields {
  return {
    netcdf_nearest_lat: match.lat,
    netcdf_nearest_lon: match.lon,
    netcdf_nearest_dist_m: match.distanceM,
    netcdf_precip_mm: match.value,
    netcdf_product_code: productCode,
    netcdf_file_metadata: metadata,
  };
}

/**
 * @param match - Match against the 2-minute accumulation grid
 * @param rawValue - Source rate (mm/hr) at the same cell
 */
export function grib2Fields(
  match: MatchResult,
  rawValue: number | undefined,
  unit: string,
  metadata: Readonly<Record<string, unknown>>
): Grib2MatchFields {
  const raw = classifyCellValue(rawValue);
  return {
    grib2_nearest_lat: match.lat,
    grib2_nearest_lon: match.lon,
    grib2_nearest_dist_m: match.distanceM,
    grib2_precip_raw_value_mm_hr: raw,
    grib2_precip_unit: unit,
    grib2_precip_mm_2min: match.value,
    grib2_file_metadata: metadata,
  };
}

function ownValue(row: Readonly<Record<string, unknown>>, key: string): unknown {
  return Object.hasOwn(row, key) ? row[key] : null;
}

/**
 * Source columns under their output names
 *
 * A column that collides with a generated field takes `db_` prefixes until
 * its name is free of both the generated fields and the other columns.
 */
function passthroughEntries(row: Readonly<Record<string, unknown>>): Array<[string, unknown]> {
  const taken = new Set<string>(GENERATED_FIELDS);
  for (const key of Object.keys(row)) {
    if (!DB_FIELD_RENAMES.has(key) && !GENERATED_FIELDS.has(key)) taken.add(key);
  }

  const entries: Array<[string, unknown]> = [];
  for (const [key, value] of Object.entries(row)) {
    if (DB_FIELD_RENAMES.has(key)) continue;
    if (!GENERATED_FIELDS.has(key)) {
      entries.push([key, value]);
      continue;
    }
    let target = `db_${key}`;
    while (taken.has(target)) target = `db_${target}`;
    taken.add(target);
    entries.push([target, value]);
  }
  return entries;
}

export function mergeIncident(
  incident: Incident,
  provenance: MergeProvenance,
  netcdf?: NetcdfMatchFields,
  grib2?: Grib2MatchFields
): MergedRecord {
  const { row } = incident;

  return {
    ...Object.fromEntries(passthroughEntries(row)),
    aligned_utc_timestamp: provenance.alignedUtcTimestamp,
    grib2_source_url: provenance.grib2SourceUrl,
    netcdf_source_url: provenance.netcdfSourceUrl,
    ...netcdf,
    ...grib2,
    db_netcdf_precip_mm: ownValue(row, 'data_value') ?? null,
    db_netcdf_lat: ownValue(row, 'mrms2_lat') ?? null,
    db_netcdf_lon: ownValue(row, 'mrms2_lon') ?? null,
  };
}
