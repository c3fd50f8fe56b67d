/**
 * Relative geometry between an observer and a target.
 *
 * Convention: ranges and bearings are great-circle (haversine) on a spherical
 * Earth of radius EARTH_RADIUS_NM. Aspect is bucketed from the angle-off
 * between the target's heading and the bearing reciprocal (target → observer).
 */
import type { Aspect, CardinalDirection } from '../types/call.js';
import type { Position, Velocity } from '../types/track.js';
import {
  destinationPoint,
  haversineDistance,
  headingDifference,
  initialBearing,
  normalizeHeading,
  toDegrees,
} from './geo.js';
import { feetToMeters, knotsToNmPerSecond, metersToFeet } from './units.js';

/** Below this range the two positions are treated as co-located */
export const COLOCATED_RANGE_NM = 0.01;

/** Angle-off upper bounds (exclusive) for each aspect bucket; anything above BEAM is cold */
export const ASPECT_HOT_MAX_DEG = 25;
export const ASPECT_FLANK_MAX_DEG = 65;
export const ASPECT_BEAM_MAX_DEG = 115;

/** Rounding granularity for spoken calls */
export const BEARING_ROUNDING_DEG = 10;
export const ALTITUDE_ROUNDING_FT = 1000;

export type RelativeGeometry =
  | {
      kind: 'colocated';
      altitudeDeltaFt: number;
    }
  | {
      kind: 'relative';
      /** Bearing observer → target (degrees true, [0, 360)) */
      bearingDeg: number;
      rangeNm: number;
      /** Target altitude minus observer altitude (ft) */
      altitudeDeltaFt: number;
      /** Angle between target heading and the bearing reciprocal, [0, 180] */
      angleOffDeg: number;
      aspect: Aspect;
    };

/** Bucket an angle-off into an aspect */
export function aspectFromAngleOff(angleOffDeg: number): Aspect {
  const off = Math.abs(angleOffDeg);
  if (off < ASPECT_HOT_MAX_DEG) return 'hot';
  if (off < ASPECT_FLANK_MAX_DEG) return 'flanking';
  if (off < ASPECT_BEAM_MAX_DEG) return 'beaming';
  return 'cold';
}

/**
 * Angle-off of a target heading relative to the line back to the observer.
 * 0 = pointing straight at the observer, 180 = pointing straight away.
 */
export function angleOff(bearingDeg: number, targetHeading: number): number {
  const reciprocal = normalizeHeading(bearingDeg + 180);
  return Math.abs(headingDifference(reciprocal, targetHeading));
}

export function relativeGeometry(observer: Position, target: Position): RelativeGeometry {
  const altitudeDeltaFt = metersToFeet(target.altitudeM - observer.altitudeM);
  const rangeNm = haversineDistance(observer, target);

  if (rangeNm < COLOCATED_RANGE_NM) {
    return { kind: 'colocated', altitudeDeltaFt };
  }

  const bearingDeg = initialBearing(observer, target);
  const off = angleOff(bearingDeg, target.heading);

  return {
    kind: 'relative',
    bearingDeg,
    rangeNm,
    altitudeDeltaFt,
    angleOffDeg: off,
    aspect: aspectFromAngleOff(off),
  };
}

/** Round a bearing to controller convention: nearest 10°, 360 folds to 0 */
export function roundBearing(bearingDeg: number): number {
  return (Math.round(normalizeHeading(bearingDeg) / BEARING_ROUNDING_DEG) * BEARING_ROUNDING_DEG) % 360;
}

/** Round a range to whole nautical miles */
export function roundRange(rangeNm: number): number {
  return Math.round(rangeNm);
}

/** Altitude (meters) → thousands of feet, rounded */
export function altitudeThousands(altitudeM: number): number {
  return Math.round(metersToFeet(altitudeM) / ALTITUDE_ROUNDING_FT);
}

const CARDINALS: CardinalDirection[] = [
  'north',
  'north east',
  'east',
  'south east',
  'south',
  'south west',
  'west',
  'north west',
];

/** Eight-point compass sector of a heading (45° sectors centred on each point) */
export function cardinalDirection(heading: number): CardinalDirection {
  const index = Math.round(normalizeHeading(heading) / 45) % CARDINALS.length;
  return CARDINALS[index];
}

/** Derive a velocity vector from heading and ground speed */
export function velocityFromHeading(heading: number, groundSpeed: number, verticalFpm = 0): Velocity {
  const rad = (normalizeHeading(heading) * Math.PI) / 180;
  return {
    northKts: groundSpeed * Math.cos(rad),
    eastKts: groundSpeed * Math.sin(rad),
    verticalFpm,
  };
}

/**
 * Project a position forward by `elapsedMs` along a velocity vector.
 * Non-positive elapsed time returns the input unchanged.
 */
export function deadReckon(position: Position, velocity: Velocity, elapsedMs: number): Position {
  if (elapsedMs <= 0) return position;
  const seconds = elapsedMs / 1000;
  const speed = Math.hypot(velocity.northKts, velocity.eastKts);
  const altitudeM = position.altitudeM + feetToMeters((velocity.verticalFpm * seconds) / 60);
  if (speed === 0) {
    return { ...position, altitudeM };
  }
  const track = normalizeHeading(toDegrees(Math.atan2(velocity.eastKts, velocity.northKts)));
  const next = destinationPoint(position, track, knotsToNmPerSecond(speed) * seconds);
  return { ...position, lat: next.lat, lon: next.lon, altitudeM };
}
