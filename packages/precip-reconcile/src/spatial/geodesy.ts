/**
 * Great-circle distance and longitude convention helpers
 *
 * Grid indexing works in [0, 360) longitudes so the CONUS domain never
 * straddles a seam; everything reported back uses (-180, 180].
 *
 * @module spatial/geodesy
 */

/** Mean Earth radius in meters */
export const EARTH_RADIUS_M = 6371000;

/**
 * Haversine distance between two points in decimal degrees, in meters
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const dLat = ((lat2 - lat1) * Math.PI) / 180;
  const dLon = ((lon2 - lon1) * Math.PI) / 180;
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos((lat1 * Math.PI) / 180) *
      Math.cos((lat2 * Math.PI) / 180) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);
  // Rounding can push a a hair outside [0, 1] for antipodal points
  const clamped = Math.min(1, Math.max(0, a));
  const c = 2 * Math.atan2(Math.sqrt(clamped), Math.sqrt(1 - clamped));
  return EARTH_RADIUS_M * c;
}

/**
 * Normalize a longitude to [0, 360)
 */
export function toLon360(lon: number): number {
  const wrapped = lon % 360;
  const shifted = wrapped < 0 ? wrapped + 360 : wrapped;
  // -1e-20 + 360 rounds to 360; also folds -0 into 0
  return shifted >= 360 ? 0 : shifted + 0;
}

/**
 * Convert a [0, 360) longitude back to (-180, 180]
 *
 * Exact for every input: the subtraction only happens on (180, 360), where
 * `lon360 - 360` is representable. Both 180 and -180 come back as 180.
 */
export function toLon180(lon360: number): number {
  return lon360 > 180 ? lon360 - 360 : lon360;
}

/**
 * Report a longitude in (-180, 180], leaving in-range values untouched
 */
export function normalizeLon180(lon: number): number {
  return lon > -180 && lon <= 180 ? lon : toLon180(toLon360(lon));
}
