/**
 * Core Types for precip-reconcile
 *
 * Incidents as read from the incident source, and the per-incident merged
 * record a comparison run produces.
 *
 * TYPE SAFETY: Incidents are immutable. The orchestrator builds a new
 * MergedRecord per incident and never writes back into the source row.
 */

/**
 * Ground-truth incident row
 */
export interface Incident {
  readonly id: string;
  readonly lat: number;
  readonly lon: number;
  /** Source timestamp, zone-less strings are taken as UTC */
  readonly timestamp: string | Date;
  /** Full source row, passed through verbatim into the merged record */
  readonly row: Readonly<Record<string, unknown>>;
}

/**
 * Which incident subset a run compares
 */
export type ValuePredicate = 'non-zero' | 'zero';

/**
 * Fields contributed by the NetCDF (regular grid) match
 */
export interface NetcdfMatchFields {
  readonly netcdf_nearest_lat: number;
  readonly netcdf_nearest_lon: number;
  readonly netcdf_nearest_dist_m: number;
  readonly netcdf_precip_mm: number | null;
  readonly netcdf_product_code: string;
  readonly netcdf_file_metadata: Readonly<Record<string, unknown>>;
}

/**
 * Fields contributed by the GRIB2 (curvilinear grid) match
 */
export interface Grib2MatchFields {
  readonly grib2_nearest_lat: number;
  readonly grib2_nearest_lon: number;
  readonly grib2_nearest_dist_m: number;
  readonly grib2_precip_raw_value_mm_hr: number | null;
  readonly grib2_precip_unit: string;
  readonly grib2_precip_mm_2min: number | null;
  readonly grib2_file_metadata: Readonly<Record<string, unknown>>;
}

/**
 * Provenance and renamed database fields present on every merged record
 */
export interface MergedBaseFields {
  readonly aligned_utc_timestamp: string;
  readonly grib2_source_url: string;
  readonly netcdf_source_url: string;
  readonly db_netcdf_precip_mm: unknown;
  readonly db_netcdf_lat: unknown;
  readonly db_netcdf_lon: unknown;
}

/**
 * Enriched incident: source row fields plus whichever sources matched.
 * A source that was unavailable contributes no fields at all.
 */
export type MergedRecord = Readonly<Record<string, unknown>> &
  MergedBaseFields &
  Partial<NetcdfMatchFields> &
  Partial<Grib2MatchFields>;
