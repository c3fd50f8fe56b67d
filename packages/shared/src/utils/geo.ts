import type { LatLon } from '../types/track.js';

export const EARTH_RADIUS_NM = 3440.065;
const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

/** Convert degrees to radians */
export function toRadians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/** Convert radians to degrees */
export function toDegrees(radians: number): number {
  return radians * RAD_TO_DEG;
}

/**
 * Haversine distance between two positions in nautical miles
 */
export function haversineDistance(a: LatLon, b: LatLon): number {
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);
  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);

  // Rounding can push h just past 1 for near-antipodal pairs
  const h = Math.min(
    1,
    Math.max(
      0,
      Math.sin(dLat / 2) * Math.sin(dLat / 2) +
        Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) * Math.sin(dLon / 2)
    )
  );

  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_NM * c;
}

/**
 * Initial bearing from position A to position B (degrees true, 0-360)
 */
export function initialBearing(from: LatLon, to: LatLon): number {
  const lat1 = toRadians(from.lat);
  const lat2 = toRadians(to.lat);
  const dLon = toRadians(to.lon - from.lon);

  const y = Math.sin(dLon) * Math.cos(lat2);
  const x =
    Math.cos(lat1) * Math.sin(lat2) -
    Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);

  return normalizeHeading(toDegrees(Math.atan2(y, x)));
}

/**
 * Destination point given start, bearing (degrees true), and distance (nm)
 */
export function destinationPoint(
  start: LatLon,
  bearingDeg: number,
  distanceNm: number
): LatLon {
  const lat1 = toRadians(start.lat);
  const lon1 = toRadians(start.lon);
  const bearing = toRadians(bearingDeg);
  const angularDist = distanceNm / EARTH_RADIUS_NM;

  const lat2 = Math.asin(
    Math.sin(lat1) * Math.cos(angularDist) +
      Math.cos(lat1) * Math.sin(angularDist) * Math.cos(bearing)
  );

  const lon2 =
    lon1 +
    Math.atan2(
      Math.sin(bearing) * Math.sin(angularDist) * Math.cos(lat1),
      Math.cos(angularDist) - Math.sin(lat1) * Math.sin(lat2)
    );

  return {
    lat: toDegrees(lat2),
    lon: ((toDegrees(lon2) + 540) % 360) - 180, // Normalize to [-180, 180]
  };
}

/**
 * Normalize heading to 0-360 range
 */
export function normalizeHeading(heading: number): number {
  return ((heading % 360) + 360) % 360;
}

/**
 * Signed difference from one heading to another, in (-180, 180].
 * Positive = clockwise.
 */
export function headingDifference(from: number, to: number): number {
  const diff = normalizeHeading(to) - normalizeHeading(from);
  if (diff > 180) return diff - 360;
  if (diff < -180) return diff + 360;
  return diff;
}
