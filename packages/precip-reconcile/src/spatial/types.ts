/**
 * Spatial Matching Types
 *
 * Grid geometries, match results, and the resolver capability shared by the
 * curvilinear (KD-tree) and regular (per-axis binary search) strategies.
 *
 * @module spatial/types
 */

/**
 * Incident or grid coordinate in decimal degrees, longitude in (-180, 180]
 */
export interface GeoPoint {
  readonly lat: number;
  readonly lon: number;
}

/**
 * 2D mesh where latitude and longitude vary jointly per cell.
 * Arrays are flattened row-major with length rows * cols.
 */
export interface CurvilinearGrid {
  readonly kind: 'curvilinear';
  readonly rows: number;
  readonly cols: number;
  readonly lat: Float64Array;
  /** Longitudes normalized to [0, 360) */
  readonly lon360: Float64Array;
}

/**
 * Cartesian product of two independently monotonic axes
 */
export interface RegularGrid {
  readonly kind: 'regular';
  readonly lat: MonotonicAxis;
  readonly lon: MonotonicAxis;
  /** Longitude convention the lon axis is stored in */
  readonly lonConvention: '180' | '360';
}

export type GridDescriptor = CurvilinearGrid | RegularGrid;

/**
 * One coordinate axis, kept in ascending order for searching
 */
export interface MonotonicAxis {
  /** Axis values as stored in the source (ascending or descending) */
  readonly values: Float64Array;
  /** Ascending copy used for binary search */
  readonly ascending: Float64Array;
  readonly descending: boolean;
}

/**
 * Nearest grid cell for one query coordinate
 */
export interface MatchResult {
  /** Matched grid latitude */
  readonly lat: number;
  /** Matched grid longitude in (-180, 180] */
  readonly lon: number;
  /** Haversine distance from the query point, meters */
  readonly distanceM: number;
  readonly row: number;
  readonly col: number;
  /** Cell value, null when NaN or negative (no-data) */
  readonly value: number | null;
}

/**
 * Grid values for one timestamp, flattened row-major to match the descriptor
 */
export interface GridValues {
  readonly rows: number;
  readonly cols: number;
  readonly data: ArrayLike<number>;
}

/**
 * Matches query coordinates to the nearest grid cell and reads its value
 */
export interface NearestPointResolver {
  readonly kind: GridDescriptor['kind'];
  resolve(points: readonly GeoPoint[], values: GridValues): MatchResult[];
}
