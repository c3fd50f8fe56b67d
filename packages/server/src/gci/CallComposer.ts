import type {
  AircraftTrack,
  CallResult,
  Position,
  RequestKind,
  TrackSnapshot,
} from '@gci-controller/shared';
import {
  altitudeThousands,
  cardinalDirection,
  deadReckon,
  formatAltitudeBlock,
  haversineDistance,
  relativeGeometry,
  roundBearing,
  roundRange,
} from '@gci-controller/shared';
import type { TrackReader } from '../engine/TrackStore.js';
import { RequesterNotFound } from '../errors.js';

export interface CallComposerOptions {
  /** Contacts beyond this range are not reported (nm) */
  searchRadiusNm: number;
}

const HEX_ID = /^[0-9a-f]+$/i;

/**
 * Order two track identities. Telemetry ids are hex object ids, so compare
 * them numerically when both parse; otherwise fall back to string order.
 */
export function compareIdentity(a: string, b: string): number {
  if (HEX_ID.test(a) && HEX_ID.test(b)) {
    const x = BigInt(`0x${a}`);
    const y = BigInt(`0x${b}`);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function normalizeCallsign(s: string): string {
  return s.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Find the requester's own track in a snapshot: by identity first, then by
 * callsign (case-insensitive).
 */
export function locateRequester(snapshot: TrackSnapshot, pilotId: string): Readonly<AircraftTrack> {
  const byId = snapshot.tracks.get(pilotId);
  if (byId) return byId;

  const wanted = normalizeCallsign(pilotId);
  for (const track of snapshot.tracks.values()) {
    if (track.callsign && normalizeCallsign(track.callsign) === wanted) return track;
  }
  throw new RequesterNotFound(pilotId);
}

/** Track position projected to the snapshot time */
function projectedPosition(track: Readonly<AircraftTrack>, at: number): Position {
  return deadReckon(track.position, track.velocity, at - track.receivedAt);
}

/**
 * CallComposer answers a pilot request from a snapshot of the track store.
 * It holds no state of its own, so any number of sessions can use it at once.
 */
export class CallComposer {
  constructor(
    private readonly tracks: TrackReader,
    private readonly options: CallComposerOptions
  ) {}

  compose(pilotId: string, request: RequestKind, now?: number): CallResult {
    switch (request.kind) {
      case 'radioCheck':
        return { outcome: 'radioCheck' };
      case 'bogeyDope':
        return this.bogeyDope(pilotId, this.tracks.snapshot(now));
      default: {
        const unhandled: never = request;
        throw new Error(`Unhandled request ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /** Nearest hostile or unknown contact within the search radius */
  bogeyDope(pilotId: string, snapshot: TrackSnapshot): CallResult {
    let requester: Readonly<AircraftTrack>;
    try {
      requester = locateRequester(snapshot, pilotId);
    } catch (err) {
      if (err instanceof RequesterNotFound) {
        console.warn(`[CallComposer] ${err.message}`);
        return { outcome: 'noTrack' };
      }
      throw err;
    }

    if (requester.side !== 'friendly') {
      return { outcome: 'notFriendly' };
    }

    const origin = projectedPosition(requester, snapshot.takenAt);

    let nearest: { track: Readonly<AircraftTrack>; position: Position; range: number } | null = null;
    for (const track of snapshot.tracks.values()) {
      if (track.id === requester.id || track.side === 'friendly') continue;

      const position = projectedPosition(track, snapshot.takenAt);
      const range = haversineDistance(origin, position);
      if (range > this.options.searchRadiusNm) continue;

      if (
        !nearest ||
        range < nearest.range ||
        (range === nearest.range && compareIdentity(track.id, nearest.track.id) < 0)
      ) {
        nearest = { track, position, range };
      }
    }

    if (!nearest) {
      return { outcome: 'clean' };
    }

    const { track, position } = nearest;
    const side = track.side === 'hostile' ? 'hostile' : 'unknown';
    const geometry = relativeGeometry(origin, position);

    if (geometry.kind === 'colocated') {
      return { outcome: 'merged', targetId: track.id, side };
    }

    const thousands = altitudeThousands(position.altitudeM);
    return {
      outcome: 'contact',
      targetId: track.id,
      bearingDeg: roundBearing(geometry.bearingDeg),
      rangeNm: roundRange(geometry.rangeNm),
      altitudeThousands: thousands,
      altitudeBlock: formatAltitudeBlock(thousands),
      aspect: geometry.aspect,
      trackDirection: cardinalDirection(position.heading),
      side,
      typeName: track.typeName,
    };
  }
}
