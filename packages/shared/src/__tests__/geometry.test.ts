/**
 * Geometry kernel tests
 *
 * Covers: great-circle range/bearing, the 0N 0E → 0N 1E reference geometry,
 * aspect buckets, controller rounding, compass sectors and dead reckoning.
 */
import { describe, it, expect } from 'vitest';
import type { Aspect, CardinalDirection } from '../types/call.js';
import type { Position } from '../types/track.js';
import { EARTH_RADIUS_NM, haversineDistance, initialBearing, headingDifference } from '../utils/geo.js';
import {
  altitudeThousands,
  angleOff,
  aspectFromAngleOff,
  cardinalDirection,
  deadReckon,
  relativeGeometry,
  roundBearing,
  roundRange,
  velocityFromHeading,
} from '../utils/geometry.js';
import { formatAltitudeBlock, formatHeading } from '../utils/units.js';

// ─── Test Fixtures ───────────────────────────────────────────────────────────

function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    lat: 0,
    lon: 0,
    altitudeM: 0,
    heading: 0,
    groundSpeed: 0,
    ...overrides,
  };
}

const REQUESTER = makePosition({ altitudeM: 6096 });
const CONTACT = makePosition({ lon: 1, altitudeM: 4572, heading: 90 });

const SAMPLE_POINTS = [
  makePosition({ lat: 41.2, lon: 43.9 }),
  makePosition({ lat: 42.05, lon: 41.6 }),
  makePosition({ lat: -33.9, lon: 151.2 }),
  makePosition({ lat: 0.5, lon: -0.5 }),
  makePosition({ lat: 64.1, lon: -21.9 }),
];

// ─── Reference geometry ──────────────────────────────────────────────────────

describe('relativeGeometry: 0N 0E → 0N 1E', () => {
  it('gives bearing 090 and about 60 nm', () => {
    const geo = relativeGeometry(REQUESTER, CONTACT);
    expect(geo.kind).toBe('relative');
    if (geo.kind !== 'relative') return;
    expect(geo.bearingDeg).toBeCloseTo(90, 6);
    expect(geo.rangeNm).toBeCloseTo(60.04, 2);
    expect(roundBearing(geo.bearingDeg)).toBe(90);
    expect(roundRange(geo.rangeNm)).toBe(60);
  });

  it('reports the contact 5,000 ft below', () => {
    const geo = relativeGeometry(REQUESTER, CONTACT);
    expect(geo.altitudeDeltaFt).toBeCloseTo(-5000, 3);
  });

  it('reads 15 thousand for a 4572 m contact', () => {
    expect(altitudeThousands(CONTACT.altitudeM)).toBe(15);
    expect(formatAltitudeBlock(altitudeThousands(CONTACT.altitudeM))).toBe('15,000');
  });

  it.each<[number, Aspect]>([
    [90, 'cold'],
    [270, 'hot'],
    [0, 'beaming'],
    [180, 'beaming'],
    [225, 'flanking'],
  ])('contact heading %i is %s', (heading, aspect) => {
    const geo = relativeGeometry(REQUESTER, { ...CONTACT, heading });
    expect(geo.kind === 'relative' && geo.aspect).toBe(aspect);
  });
});

// ─── Range and bearing properties ────────────────────────────────────────────

describe('range and bearing', () => {
  it('keeps bearings in [0, 360) and ranges non-negative', () => {
    for (const a of SAMPLE_POINTS) {
      for (const b of SAMPLE_POINTS) {
        const range = haversineDistance(a, b);
        expect(range).toBeGreaterThanOrEqual(0);
        if (range === 0) continue;
        const bearing = initialBearing(a, b);
        expect(bearing).toBeGreaterThanOrEqual(0);
        expect(bearing).toBeLessThan(360);
      }
    }
  });

  it('gives a finite range for near-antipodal pairs', () => {
    for (let lat = -89; lat <= 89; lat++) {
      for (const lon of [180 - 1e-6, 180, 180 + 1e-6]) {
        const range = haversineDistance({ lat, lon: 0 }, { lat: -lat, lon });
        expect(Number.isFinite(range)).toBe(true);
        expect(range).toBeGreaterThan(10_800);
        expect(range).toBeLessThanOrEqual(Math.PI * EARTH_RADIUS_NM);
      }
    }
  });

  it('treats a position and itself as co-located', () => {
    const geo = relativeGeometry(SAMPLE_POINTS[0], SAMPLE_POINTS[0]);
    expect(geo.kind).toBe('colocated');
    expect(haversineDistance(SAMPLE_POINTS[0], SAMPLE_POINTS[0])).toBe(0);
  });

  it('gives the same range both ways', () => {
    const [a, b] = SAMPLE_POINTS;
    expect(haversineDistance(a, b)).toBeCloseTo(haversineDistance(b, a), 9);
  });

  it('gives roughly reciprocal bearings over short distances', () => {
    const a = makePosition({ lat: 42.0, lon: 42.0 });
    const b = makePosition({ lat: 42.3, lon: 42.4 });
    const out = initialBearing(a, b);
    const back = initialBearing(b, a);
    expect(Math.abs(headingDifference(out + 180, back))).toBeLessThan(1);
  });
});

// ─── Aspect ──────────────────────────────────────────────────────────────────

describe('aspectFromAngleOff', () => {
  it('buckets at 25, 65 and 115 degrees', () => {
    expect(aspectFromAngleOff(0)).toBe('hot');
    expect(aspectFromAngleOff(24.9)).toBe('hot');
    expect(aspectFromAngleOff(25)).toBe('flanking');
    expect(aspectFromAngleOff(64.9)).toBe('flanking');
    expect(aspectFromAngleOff(65)).toBe('beaming');
    expect(aspectFromAngleOff(114.9)).toBe('beaming');
    expect(aspectFromAngleOff(115)).toBe('cold');
    expect(aspectFromAngleOff(180)).toBe('cold');
  });

  it('measures angle-off from the line back to the observer', () => {
    // Target bears 090; pointing 270 is straight at the observer
    expect(angleOff(90, 270)).toBe(0);
    expect(angleOff(90, 90)).toBe(180);
    expect(angleOff(350, 200)).toBe(30);
  });
});

// ─── Rounding ────────────────────────────────────────────────────────────────

describe('controller rounding', () => {
  it('rounds bearings to the nearest 10 and folds 360 to 0', () => {
    expect(roundBearing(354)).toBe(350);
    expect(roundBearing(355)).toBe(0);
    expect(roundBearing(4)).toBe(0);
    expect(roundBearing(95)).toBe(100);
    expect(roundBearing(-10)).toBe(350);
  });

  it('rounds altitude to whole thousands', () => {
    expect(altitudeThousands(0)).toBe(0);
    expect(altitudeThousands(1600)).toBe(5);
    expect(altitudeThousands(7620)).toBe(25);
  });

  it('formats headings with 360 for north', () => {
    expect(formatHeading(0)).toBe('360');
    expect(formatHeading(5)).toBe('005');
    expect(formatHeading(90)).toBe('090');
  });
});

describe('cardinalDirection', () => {
  it.each<[number, CardinalDirection]>([
    [0, 'north'],
    [22, 'north'],
    [23, 'north east'],
    [90, 'east'],
    [135, 'south east'],
    [180, 'south'],
    [225, 'south west'],
    [270, 'west'],
    [315, 'north west'],
    [338, 'north'],
  ])('%i is %s', (heading, direction) => {
    expect(cardinalDirection(heading)).toBe(direction);
  });
});

// ─── Dead reckoning ──────────────────────────────────────────────────────────

describe('deadReckon', () => {
  it('returns the position unchanged for no elapsed time', () => {
    const pos = makePosition({ lat: 1, lon: 2 });
    expect(deadReckon(pos, velocityFromHeading(90, 360), 0)).toBe(pos);
    expect(deadReckon(pos, velocityFromHeading(90, 360), -500)).toBe(pos);
  });

  it('moves 1 nm east in 10 s at 360 kt', () => {
    const pos = makePosition();
    const next = deadReckon(pos, velocityFromHeading(90, 360), 10_000);
    expect(haversineDistance(pos, next)).toBeCloseTo(1, 6);
    expect(next.lat).toBeCloseTo(0, 9);
    expect(next.lon).toBeGreaterThan(0);
  });

  it('applies vertical speed', () => {
    const pos = makePosition({ altitudeM: 3048 });
    const next = deadReckon(pos, { northKts: 0, eastKts: 0, verticalFpm: -6000 }, 60_000);
    expect(next.altitudeM).toBeCloseTo(1219.2, 6);
    expect(next.lat).toBe(0);
  });
});
