/**
 * Nearest-neighbor lookup over a static kdbush index
 *
 * kdbush answers radius queries; `nearest` widens the radius from a
 * density-based first guess until a query returns points, then picks the
 * closest of those. Every point inside the radius is returned, so the
 * closest candidate is the closest point overall.
 *
 * Distances are Euclidean in the coordinate space the index was built in
 * (degrees for grid meshes); callers compute physical distance afterwards.
 *
 * @module spatial/kd-tree
 */

import KDBush from 'kdbush';

export interface NearestNeighbor {
  /** Index of the point in the arrays the tree was built from */
  readonly index: number;
  /** Squared Euclidean distance in tree coordinates */
  readonly distanceSq: number;
}

interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

const DEFAULT_NODE_SIZE = 64;

function boundsOf(xs: ArrayLike<number>, ys: ArrayLike<number>): Bounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (let i = 0; i < xs.length; i++) {
    minX = Math.min(minX, xs[i]);
    minY = Math.min(minY, ys[i]);
    maxX = Math.max(maxX, xs[i]);
    maxY = Math.max(maxY, ys[i]);
  }
  return { minX, minY, maxX, maxY };
}

export class KDTree {
  readonly size: number;
  private readonly xs: ArrayLike<number>;
  private readonly ys: ArrayLike<number>;
  private readonly index: KDBush | null;
  private readonly bounds: Bounds;
  private readonly initialRadius: number;

  constructor(xs: ArrayLike<number>, ys: ArrayLike<number>, nodeSize = DEFAULT_NODE_SIZE) {
    if (xs.length !== ys.length) {
      throw new RangeError(`Coordinate arrays differ in length: ${xs.length} vs ${ys.length}`);
    }
    if (nodeSize < 1) {
      throw new RangeError(`nodeSize must be >= 1, got ${nodeSize}`);
    }

    this.size = xs.length;
    this.xs = xs;
    this.ys = ys;
    this.bounds = boundsOf(xs, ys);

    if (this.size === 0) {
      this.index = null;
      this.initialRadius = 0;
      return;
    }

    const index = new KDBush(this.size, nodeSize);
    for (let i = 0; i < this.size; i++) {
      index.add(xs[i], ys[i]);
    }
    index.finish();
    this.index = index;

    // Roughly one point spacing
    const spanX = this.bounds.maxX - this.bounds.minX;
    const spanY = this.bounds.maxY - this.bounds.minY;
    this.initialRadius = Math.max(
      Math.sqrt((spanX * spanY) / this.size),
      Math.max(spanX, spanY) / this.size,
      Number.EPSILON
    );
  }

  /**
   * Nearest stored point to (x, y); ties resolve to the lowest point index.
   * Returns null for an empty tree or a non-finite query.
   */
  nearest(x: number, y: number): NearestNeighbor | null {
    if (!this.index || !Number.isFinite(x) || !Number.isFinite(y)) {
      return null;
    }

    const { minX, minY, maxX, maxY } = this.bounds;
    // Farthest any point can be from the query
    const reach = Math.hypot(
      Math.max(Math.abs(x - minX), Math.abs(x - maxX)),
      Math.max(Math.abs(y - minY), Math.abs(y - maxY))
    );

    for (let radius = this.initialRadius; radius < reach; radius *= 2) {
      const candidates = this.index.within(x, y, radius);
      if (candidates.length > 0) {
        return this.closest(candidates, x, y);
      }
    }
    return this.closest(null, x, y);
  }

  /**
   * Closest of `candidates`, or of every point when null
   */
  private closest(candidates: readonly number[] | null, x: number, y: number): NearestNeighbor {
    let index = -1;
    let distanceSq = Infinity;
    const count = candidates ? candidates.length : this.size;

    for (let k = 0; k < count; k++) {
      const i = candidates ? candidates[k] : k;
      const dx = this.xs[i] - x;
      const dy = this.ys[i] - y;
      const d = dx * dx + dy * dy;
      if (d < distanceSq || (d === distanceSq && i < index)) {
        distanceSq = d;
        index = i;
      }
    }
    return { index, distanceSq };
  }
}
