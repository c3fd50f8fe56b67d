/**
 * CallComposer Unit Tests
 *
 * Covers: bogey dope against a direct geometry computation, requester lookup,
 * nearest-contact selection and tie-break, search radius, merged, clean,
 * no track, not friendly, stale tracks and dead reckoning.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { TrackUpdate } from '@gci-controller/shared';
import { relativeGeometry, roundBearing, roundRange } from '@gci-controller/shared';
import { TrackStore } from '../engine/TrackStore.js';
import { CallComposer, compareIdentity, locateRequester } from '../gci/CallComposer.js';
import { RequesterNotFound } from '../errors.js';

// ─── Test Fixtures ───────────────────────────────────────────────────────────

const NOW = 1_700_000_000_000;
const BOGEY_DOPE = { kind: 'bogeyDope' } as const;

function makeUpdate(overrides: Partial<TrackUpdate> = {}): TrackUpdate {
  return {
    id: 'a1',
    callsign: 'Viper 1-1',
    typeName: 'F-16C_50',
    side: 'friendly',
    timestamp: 1_000,
    position: { lat: 0, lon: 0, altitudeM: 6096, heading: 0, groundSpeed: 0 },
    ...overrides,
  };
}

function makeContact(id: string, lat: number, lon: number, overrides: Partial<TrackUpdate> = {}): TrackUpdate {
  return makeUpdate({
    id,
    callsign: null,
    typeName: 'Su-27',
    side: 'hostile',
    position: { lat, lon, altitudeM: 4572, heading: 90, groundSpeed: 0 },
    ...overrides,
  });
}

let store: TrackStore;
let composer: CallComposer;

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  store = new TrackStore({ stalenessWindowMs: 30_000, clock: () => NOW });
  composer = new CallComposer(store.reader(), { searchRadiusNm: 120 });
  store.upsert(makeUpdate());
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Contact ─────────────────────────────────────────────────────────────────

describe('bogey dope', () => {
  it('reports the contact east at 60 miles', () => {
    store.upsert(makeContact('b1', 0, 1));

    expect(composer.compose('a1', BOGEY_DOPE)).toEqual({
      outcome: 'contact',
      targetId: 'b1',
      bearingDeg: 90,
      rangeNm: 60,
      altitudeThousands: 15,
      altitudeBlock: '15,000',
      aspect: 'cold',
      trackDirection: 'east',
      side: 'hostile',
      typeName: 'Su-27',
    });
  });

  it('matches the geometry kernel for an arbitrary pair', () => {
    store.upsert(makeUpdate({ timestamp: 2_000, position: { lat: 42.1, lon: 41.7, altitudeM: 7000, heading: 0, groundSpeed: 0 } }));
    store.upsert(makeContact('b1', 42.6, 42.3, { position: { lat: 42.6, lon: 42.3, altitudeM: 9000, heading: 200, groundSpeed: 0 } }));

    const requester = store.get('a1');
    const contact = store.get('b1');
    if (!requester || !contact) throw new Error('fixture missing');
    const geo = relativeGeometry(requester.position, contact.position);
    if (geo.kind !== 'relative') throw new Error('unexpected co-location');

    const call = composer.compose('a1', BOGEY_DOPE);
    expect(call.outcome).toBe('contact');
    if (call.outcome !== 'contact') return;
    expect(call.bearingDeg).toBe(roundBearing(geo.bearingDeg));
    expect(call.rangeNm).toBe(roundRange(geo.rangeNm));
    expect(call.aspect).toBe(geo.aspect);
    expect(call.altitudeThousands).toBe(30);
  });

  it('finds the requester by callsign, ignoring case', () => {
    store.upsert(makeContact('b1', 0, 1));
    expect(composer.compose('viper 1-1', BOGEY_DOPE).outcome).toBe('contact');
  });

  it('picks the nearest contact', () => {
    store.upsert(makeContact('b1', 0, 1));
    store.upsert(makeContact('b2', 0, -0.5));
    const call = composer.compose('a1', BOGEY_DOPE);
    expect(call.outcome === 'contact' && call.targetId).toBe('b2');
    expect(call.outcome === 'contact' && call.bearingDeg).toBe(270);
    expect(call.outcome === 'contact' && call.rangeNm).toBe(30);
  });

  it('breaks range ties on the lower identity', () => {
    store.upsert(makeContact('1f', 0, 1));
    store.upsert(makeContact('c', 0, 1));
    const call = composer.compose('a1', BOGEY_DOPE);
    expect(call.outcome === 'contact' && call.targetId).toBe('c');
  });

  it('reports unknown contacts as bogeys', () => {
    store.upsert(makeContact('b1', 0, 1, { side: 'unknown' }));
    const call = composer.compose('a1', BOGEY_DOPE);
    expect(call.outcome === 'contact' && call.side).toBe('unknown');
  });

  it('ignores friendlies', () => {
    store.upsert(makeContact('b1', 0, 0.1, { side: 'friendly' }));
    store.upsert(makeContact('b2', 0, 1));
    const call = composer.compose('a1', BOGEY_DOPE);
    expect(call.outcome === 'contact' && call.targetId).toBe('b2');
  });

  it('calls a co-located contact merged', () => {
    store.upsert(makeContact('b1', 0, 0));
    expect(composer.compose('a1', BOGEY_DOPE)).toEqual({ outcome: 'merged', targetId: 'b1', side: 'hostile' });
  });

  it('projects moving tracks to the snapshot time', () => {
    // Heading west at 360 kt, last heard 10 s ago: 1 nm closer
    store.upsert(
      makeContact('b1', 0, 1, { position: { lat: 0, lon: 1, altitudeM: 4572, heading: 270, groundSpeed: 360 } }),
      NOW - 10_000
    );
    const call = composer.compose('a1', BOGEY_DOPE);
    expect(call.outcome === 'contact' && call.rangeNm).toBe(59);
    expect(call.outcome === 'contact' && call.aspect).toBe('hot');
  });
});

// ─── Empty picture ───────────────────────────────────────────────────────────

describe('empty picture', () => {
  it('is clean with no contacts', () => {
    expect(composer.compose('a1', BOGEY_DOPE)).toEqual({ outcome: 'clean' });
  });

  it('is clean when every contact is outside the search radius', () => {
    const near = new CallComposer(store.reader(), { searchRadiusNm: 50 });
    store.upsert(makeContact('b1', 0, 1));
    expect(near.compose('a1', BOGEY_DOPE)).toEqual({ outcome: 'clean' });
  });

  it('ignores stale contacts', () => {
    store.upsert(makeContact('b1', 0, 1), NOW - 31_000);
    expect(composer.compose('a1', BOGEY_DOPE)).toEqual({ outcome: 'clean' });
  });
});

// ─── Requester problems ──────────────────────────────────────────────────────

describe('requester', () => {
  it('answers no track for an unknown pilot', () => {
    store.upsert(makeContact('b1', 0, 1));
    expect(composer.compose('Hawg 2-1', BOGEY_DOPE)).toEqual({ outcome: 'noTrack' });
  });

  it('refuses a requester outside the coalition', () => {
    store.upsert(makeUpdate({ id: 'r1', callsign: 'Ivan', side: 'hostile' }));
    expect(composer.compose('r1', BOGEY_DOPE)).toEqual({ outcome: 'notFriendly' });
  });

  it('answers a radio check without looking at tracks', () => {
    expect(composer.compose('Hawg 2-1', { kind: 'radioCheck' })).toEqual({ outcome: 'radioCheck' });
  });

  it('throws RequesterNotFound from locateRequester', () => {
    expect(() => locateRequester(store.snapshot(), 'nobody')).toThrow(RequesterNotFound);
  });
});

describe('compareIdentity', () => {
  it('orders hex ids numerically', () => {
    expect(compareIdentity('c', '1f')).toBeLessThan(0);
    expect(compareIdentity('100', 'ff')).toBeGreaterThan(0);
    expect(compareIdentity('a1', 'a1')).toBe(0);
  });

  it('falls back to string order', () => {
    expect(compareIdentity('alpha', 'bravo')).toBeLessThan(0);
  });
});
