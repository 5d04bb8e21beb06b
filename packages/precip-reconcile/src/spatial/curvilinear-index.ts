/**
 * Curvilinear Grid Index
 *
 * A curvilinear mesh has no separable sort order, so nearest-cell lookup goes
 * through a KD-tree over flattened (lat, lon360) pairs. The tree is built once
 * per run from the sample grid and shared by every bucket.
 *
 * @module spatial/curvilinear-index
 */

import { haversineDistance, toLon180, toLon360 } from './geodesy.js';
import { KDTree } from './kd-tree.js';
import type {
  CurvilinearGrid,
  GeoPoint,
  GridValues,
  MatchResult,
  NearestPointResolver,
} from './types.js';
import { classifyCellValue } from './validity.js';

/**
 * Expand 1D axes into a 2D mesh (rows follow latitude, columns longitude)
 */
export function meshFromAxes(lat: ArrayLike<number>, lon: ArrayLike<number>): CurvilinearGrid {
  const rows = lat.length;
  const cols = lon.length;
  const meshLat = new Float64Array(rows * cols);
  const meshLon = new Float64Array(rows * cols);

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      meshLat[r * cols + c] = lat[r];
      meshLon[r * cols + c] = toLon360(lon[c]);
    }
  }

  return { kind: 'curvilinear', rows, cols, lat: meshLat, lon360: meshLon };
}

/**
 * Wrap row-major 2D latitude/longitude arrays of identical shape
 *
 * @throws RangeError when either array does not hold rows * cols values
 */
export function meshFrom2D(
  lat: ArrayLike<number>,
  lon: ArrayLike<number>,
  rows: number,
  cols: number
): CurvilinearGrid {
  const expected = rows * cols;
  if (lat.length !== expected || lon.length !== expected) {
    throw new RangeError(
      `Mesh arrays must hold ${rows}x${cols}=${expected} values (lat ${lat.length}, lon ${lon.length})`
    );
  }

  const lon360 = new Float64Array(expected);
  for (let i = 0; i < expected; i++) {
    lon360[i] = toLon360(lon[i]);
  }

  return { kind: 'curvilinear', rows, cols, lat: Float64Array.from(lat), lon360 };
}

/**
 * Nearest grid point located by the index
 */
export interface IndexedPoint {
  readonly flatIndex: number;
  readonly row: number;
  readonly col: number;
  readonly lat: number;
  /** Longitude in (-180, 180] */
  readonly lon: number;
}

export class CurvilinearIndex {
  readonly grid: CurvilinearGrid;
  private readonly tree: KDTree;

  constructor(grid: CurvilinearGrid) {
    this.grid = grid;
    this.tree = new KDTree(grid.lat, grid.lon360);
  }

  get size(): number {
    return this.tree.size;
  }

  /**
   * Nearest grid point to a coordinate, or null for an empty grid
   */
  nearest(lat: number, lon: number): IndexedPoint | null {
    const hit = this.tree.nearest(lat, toLon360(lon));
    if (!hit) {
      return null;
    }

    const flatIndex = hit.index;
    return {
      flatIndex,
      row: Math.floor(flatIndex / this.grid.cols),
      col: flatIndex % this.grid.cols,
      lat: this.grid.lat[flatIndex],
      lon: toLon180(this.grid.lon360[flatIndex]),
    };
  }
}

/**
 * Resolver for curvilinear grids: one index query per coordinate
 */
export class CurvilinearResolver implements NearestPointResolver {
  readonly kind = 'curvilinear' as const;
  private readonly index: CurvilinearIndex;

  constructor(index: CurvilinearIndex) {
    this.index = index;
  }

  resolve(points: readonly GeoPoint[], values: GridValues): MatchResult[] {
    const { rows, cols } = this.index.grid;
    if (values.rows !== rows || values.cols !== cols) {
      throw new RangeError(
        `Value grid ${values.rows}x${values.cols} does not match mesh ${rows}x${cols}`
      );
    }

    const results: MatchResult[] = [];
    for (const point of points) {
      const hit = this.index.nearest(point.lat, point.lon);
      if (!hit) {
        throw new RangeError(`No grid point found for (${point.lat}, ${point.lon})`);
      }

      results.push({
        lat: hit.lat,
        lon: hit.lon,
        distanceM: haversineDistance(point.lat, point.lon, hit.lat, hit.lon),
        row: hit.row,
        col: hit.col,
        value: classifyCellValue(values.data[hit.flatIndex]),
      });
    }
    return results;
  }
}
