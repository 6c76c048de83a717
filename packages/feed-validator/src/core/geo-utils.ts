/**
 * Geographic Utilities - Distance and Speed Primitives
 *
 * Great-circle distances between stops and shape points, and the derived
 * speeds used by the kinematic checks.
 *
 * USAGE: Import these functions instead of computing distances locally.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Geographic point (latitude/longitude, WGS84 degrees)
 */
export interface GeoPoint {
  readonly lat: number;
  readonly lon: number;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Mean earth radius in meters (IUGG)
 */
export const EARTH_RADIUS_METERS = 6_371_008.8;

const DEG_TO_RAD = Math.PI / 180;

// ============================================================================
// Distance
// ============================================================================

/**
 * Haversine distance between two points, in meters
 *
 * The haversine term is clamped to [0, 1] before asin: rounding can push it
 * slightly outside the domain for coincident or antipodal points.
 *
 * @param a - First point
 * @param b - Second point
 * @returns Distance in meters
 */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const phi1 = a.lat * DEG_TO_RAD;
  const phi2 = b.lat * DEG_TO_RAD;
  const deltaPhi = (b.lat - a.lat) * DEG_TO_RAD;
  const deltaLambda = (b.lon - a.lon) * DEG_TO_RAD;

  const sinPhi = Math.sin(deltaPhi / 2);
  const sinLambda = Math.sin(deltaLambda / 2);
  const h = sinPhi * sinPhi + Math.cos(phi1) * Math.cos(phi2) * sinLambda * sinLambda;
  const clamped = Math.min(1, Math.max(0, h));

  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(clamped));
}

/**
 * Cumulative haversine distance along a polyline, in meters
 *
 * @returns One entry per point; the first is always 0
 */
export function cumulativeDistances(points: readonly GeoPoint[]): number[] {
  const result: number[] = [];
  let total = 0;

  for (let i = 0; i < points.length; i++) {
    if (i > 0) {
      total += haversineDistance(points[i - 1], points[i]);
    }
    result.push(total);
  }

  return result;
}

// ============================================================================
// Speed
// ============================================================================

/**
 * Speed in km/h for a distance (meters) covered in a duration (seconds)
 *
 * Callers handle zero and negative durations before asking for a speed.
 */
export function speedKmh(distanceMeters: number, durationSeconds: number): number {
  return (distanceMeters / durationSeconds) * 3.6;
}

// ============================================================================
// Coordinate Validation
// ============================================================================

/**
 * Whether a latitude/longitude pair lies within WGS84 bounds
 */
export function isValidCoordinate(lat: number, lon: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lon) &&
    lat >= -90 &&
    lat <= 90 &&
    lon >= -180 &&
    lon <= 180
  );
}
