/** Convert meters per second to knots */
export function mpsToKnots(mps: number): number {
  return mps / 0.514444;
}

/** Convert feet to meters */
export function feetToMeters(feet: number): number {
  return feet * 0.3048;
}

/** Convert meters to feet */
export function metersToFeet(meters: number): number {
  return meters / 0.3048;
}

/** Convert knots to nautical miles per second */
export function knotsToNmPerSecond(knots: number): number {
  return knots / 3600;
}

/**
 * Format an altitude block given in thousands of feet
 * e.g., 15 → "15,000", 0 → "0"
 */
export function formatAltitudeBlock(thousands: number): string {
  return (thousands * 1000).toLocaleString('en-US');
}

/**
 * Format heading as three digits
 * e.g., 5 → "005", 90 → "090", 0 → "360"
 */
export function formatHeading(degrees: number): string {
  return String(Math.round(degrees) % 360 || 360).padStart(3, '0');
}

/**
 * Format frequency (Hz) in MHz for logs
 * e.g., 251000000 → "251.000"
 */
export function formatFrequency(hz: number): string {
  return (hz / 1e6).toFixed(3);
}
