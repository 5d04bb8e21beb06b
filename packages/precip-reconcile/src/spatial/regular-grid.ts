/**
 * Regular Grid Lookup
 *
 * A regular grid needs no index: each axis is monotonic, so the nearest
 * cell along it is a binary search plus one neighbor comparison. Lookups
 * take and return whole batches because every incident in every timestamp
 * bucket goes through here.
 *
 * @module spatial/regular-grid
 */

import { haversineDistance, normalizeLon180, toLon360 } from './geodesy.js';
import type {
  GeoPoint,
  GridValues,
  MatchResult,
  MonotonicAxis,
  NearestPointResolver,
  RegularGrid,
} from './types.js';
import { classifyCellValue } from './validity.js';

/**
 * First index i with axis[i] >= target (axis.length when none)
 */
function lowerBound(axis: ArrayLike<number>, target: number): number {
  let lo = 0;
  let hi = axis.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (axis[mid] < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Nearest index into an ascending axis for every target value
 *
 * The insertion point is clamped to [1, M-1] and compared against its left
 * neighbor; equidistant targets resolve to the lower index. A single-element
 * axis resolves everything to 0.
 *
 * @throws RangeError for an empty axis
 */
export function vectorizedNearestIndices(
  axis: ArrayLike<number>,
  targets: ArrayLike<number>
): Int32Array {
  const m = axis.length;
  if (m === 0) {
    throw new RangeError('Cannot search an empty axis');
  }

  const result = new Int32Array(targets.length);
  if (m === 1) {
    return result;
  }

  for (let i = 0; i < targets.length; i++) {
    const target = targets[i];
    const idx = Math.min(Math.max(lowerBound(axis, target), 1), m - 1);
    const left = axis[idx - 1];
    const right = axis[idx];
    result[i] = Math.abs(target - left) <= Math.abs(right - target) ? idx - 1 : idx;
  }

  return result;
}

/**
 * Wrap source axis values, keeping an ascending view for searching
 *
 * @throws RangeError when the axis is empty or not monotonic
 */
export function buildMonotonicAxis(values: ArrayLike<number>, name: string): MonotonicAxis {
  const stored = Float64Array.from(values);
  if (stored.length === 0) {
    throw new RangeError(`Axis '${name}' is empty`);
  }

  const descending = stored.length > 1 && stored[0] > stored[stored.length - 1];
  const ascending = descending ? stored.slice().reverse() : stored;

  for (let i = 1; i < ascending.length; i++) {
    if (!(ascending[i] >= ascending[i - 1])) {
      throw new RangeError(`Axis '${name}' is not monotonic at index ${i}`);
    }
  }

  return { values: stored, ascending, descending };
}

/**
 * Nearest indices into an axis in its stored order
 */
export function nearestAxisIndices(axis: MonotonicAxis, targets: ArrayLike<number>): Int32Array {
  const indices = vectorizedNearestIndices(axis.ascending, targets);
  if (axis.descending) {
    const last = axis.values.length - 1;
    for (let i = 0; i < indices.length; i++) {
      indices[i] = last - indices[i];
    }
  }
  return indices;
}

/**
 * Describe a regular grid from its 1D latitude and longitude axes
 *
 * Longitudes may be stored in either convention; targets are converted to
 * match at lookup time.
 */
export function buildRegularGrid(lat: ArrayLike<number>, lon: ArrayLike<number>): RegularGrid {
  const latAxis = buildMonotonicAxis(lat, 'lat');
  const lonAxis = buildMonotonicAxis(lon, 'lon');
  const lonConvention = lonAxis.ascending[lonAxis.ascending.length - 1] > 180 ? '360' : '180';

  return { kind: 'regular', lat: latAxis, lon: lonAxis, lonConvention };
}

/**
 * Resolver for regular grids: one vectorized search per axis per batch
 */
export class RegularGridResolver implements NearestPointResolver {
  readonly kind = 'regular' as const;
  private readonly grid: RegularGrid;

  constructor(grid: RegularGrid) {
    this.grid = grid;
  }

  get rows(): number {
    return this.grid.lat.values.length;
  }

  get cols(): number {
    return this.grid.lon.values.length;
  }

  resolve(points: readonly GeoPoint[], values: GridValues): MatchResult[] {
    if (values.rows !== this.rows || values.cols !== this.cols) {
      throw new RangeError(
        `Value grid ${values.rows}x${values.cols} does not match axes ${this.rows}x${this.cols}`
      );
    }

    const toGridLon = this.grid.lonConvention === '360' ? toLon360 : (lon: number) => lon;
    const rowIdx = nearestAxisIndices(
      this.grid.lat,
      points.map((p) => p.lat)
    );
    const colIdx = nearestAxisIndices(
      this.grid.lon,
      points.map((p) => toGridLon(p.lon))
    );

    return points.map((point, i) => {
      const row = rowIdx[i];
      const col = colIdx[i];
      const lat = this.grid.lat.values[row];
      const lon = normalizeLon180(this.grid.lon.values[col]);

      return {
        lat,
        lon,
        distanceM: haversineDistance(point.lat, point.lon, lat, lon),
        row,
        col,
        value: classifyCellValue(values.data[row * values.cols + col]),
      };
    });
  }
}
