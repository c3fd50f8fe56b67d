import type {
  AircraftTrack,
  Position,
  TrackSnapshot,
  TrackUpdate,
  Velocity,
} from '@gci-controller/shared';
import {
  haversineDistance,
  initialBearing,
  metersToFeet,
  velocityFromHeading,
} from '@gci-controller/shared';

/**
 * Read side of the track store. Everything except the telemetry ingestor
 * gets this interface, never the store itself.
 */
export interface TrackReader {
  /** Immutable view of all non-stale tracks at `now` */
  snapshot(now?: number): TrackSnapshot;
  get(id: string): Readonly<AircraftTrack> | undefined;
  readonly size: number;
}

export interface TrackStoreOptions {
  /** Tracks older than this are hidden from snapshots and removed by evictStale (ms) */
  stalenessWindowMs: number;
  /** Wall clock (Unix ms) */
  clock?: () => number;
}

/**
 * TrackStore holds the latest known state of every aircraft, keyed by identity.
 *
 * Records are frozen and replaced wholesale on every accepted update, so a
 * snapshot taken before a write keeps pointing at the old, complete record.
 * Ordering is by source timestamp: an update that is not strictly newer than
 * the stored one is ignored, which also makes duplicates idempotent.
 */
export class TrackStore implements TrackReader {
  private tracks = new Map<string, Readonly<AircraftTrack>>();
  private readonly stalenessWindowMs: number;
  private readonly clock: () => number;
  private readonly readView: TrackReader;

  constructor(options: TrackStoreOptions) {
    this.stalenessWindowMs = options.stalenessWindowMs;
    this.clock = options.clock ?? Date.now;
    this.readView = new TrackReadView(this);
  }

  /** Read-only facade handed to consumers */
  reader(): TrackReader {
    return this.readView;
  }

  /**
   * Apply an update if it is newer than what is stored.
   * Returns true when the store changed.
   */
  upsert(update: TrackUpdate, receivedAt: number = this.clock()): boolean {
    const existing = this.tracks.get(update.id);
    if (existing && update.timestamp <= existing.timestamp) {
      return false;
    }

    const position = resolvePosition(update, existing);
    const velocity = deriveVelocity(position, update.timestamp, existing);

    const track: Readonly<AircraftTrack> = Object.freeze({
      id: update.id,
      callsign: update.callsign ?? existing?.callsign ?? null,
      typeName: update.typeName ?? existing?.typeName ?? null,
      side: update.side,
      position: Object.freeze(position),
      timestamp: update.timestamp,
      receivedAt,
      velocity: Object.freeze(velocity),
    });

    this.tracks.set(update.id, track);
    return true;
  }

  /** Remove a track the telemetry source reports as gone */
  remove(id: string): boolean {
    return this.tracks.delete(id);
  }

  /**
   * Remove every track whose last accepted update is more than `windowMs` old.
   * Returns the removed ids.
   */
  evictStale(now: number, windowMs: number = this.stalenessWindowMs): string[] {
    const removed: string[] = [];
    for (const [id, track] of this.tracks) {
      if (now - track.receivedAt > windowMs) {
        removed.push(id);
        this.tracks.delete(id);
      }
    }
    return removed;
  }

  snapshot(now: number = this.clock()): TrackSnapshot {
    const view = new Map<string, Readonly<AircraftTrack>>();
    for (const [id, track] of this.tracks) {
      if (now - track.receivedAt <= this.stalenessWindowMs) {
        view.set(id, track);
      }
    }
    return Object.freeze({ takenAt: now, tracks: view });
  }

  get(id: string): Readonly<AircraftTrack> | undefined {
    return this.tracks.get(id);
  }

  /** Get count of tracks, stale or not */
  get size(): number {
    return this.tracks.size;
  }
}

class TrackReadView implements TrackReader {
  constructor(private readonly store: TrackStore) {}

  snapshot(now?: number): TrackSnapshot {
    return this.store.snapshot(now);
  }

  get(id: string): Readonly<AircraftTrack> | undefined {
    return this.store.get(id);
  }

  get size(): number {
    return this.store.size;
  }
}

/** Fill in heading and ground speed from the previous fix when the source omits them */
function resolvePosition(update: TrackUpdate, existing: Readonly<AircraftTrack> | undefined): Position {
  const { heading, groundSpeed, ...rest } = update.position;
  if (!existing) {
    return { ...rest, heading: heading ?? 0, groundSpeed: groundSpeed ?? 0 };
  }

  const moved = haversineDistance(existing.position, rest);
  const dtHours = (update.timestamp - existing.timestamp) / 3_600_000;
  return {
    ...rest,
    heading: heading ?? (moved > 0.01 ? initialBearing(existing.position, rest) : existing.position.heading),
    groundSpeed: groundSpeed ?? (dtHours > 0 ? moved / dtHours : existing.position.groundSpeed),
  };
}

function deriveVelocity(
  position: Position,
  timestamp: number,
  existing: Readonly<AircraftTrack> | undefined
): Velocity {
  let verticalFpm = 0;
  let track = position.heading;

  if (existing) {
    const dtMinutes = (timestamp - existing.timestamp) / 60_000;
    if (dtMinutes > 0) {
      verticalFpm = metersToFeet(position.altitudeM - existing.position.altitudeM) / dtMinutes;
      // Follow the ground track between the last two fixes once they are apart
      if (haversineDistance(existing.position, position) > 0.01) {
        track = initialBearing(existing.position, position);
      }
    }
  }

  return velocityFromHeading(track, position.groundSpeed, verticalFpm);
}
