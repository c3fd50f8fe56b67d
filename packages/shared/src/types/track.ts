/** Latitude/longitude pair in decimal degrees */
export interface LatLon {
  lat: number;
  lon: number;
}

/** Immutable kinematic snapshot of one aircraft */
export interface Position extends LatLon {
  /** Altitude (meters MSL) */
  altitudeM: number;
  /** Heading (degrees true) */
  heading: number;
  /** Ground speed (kts) */
  groundSpeed: number;
}

/** Controller's own coalition */
export type Coalition = 'blue' | 'red';

/** Side of a track relative to the controller's coalition */
export type Side = 'friendly' | 'hostile' | 'unknown';

/** Velocity used to dead-reckon between telemetry updates */
export interface Velocity {
  /** North component (kts) */
  northKts: number;
  /** East component (kts) */
  eastKts: number;
  /** Vertical speed (ft/min) */
  verticalFpm: number;
}

/** One aircraft as known to the track store */
export interface AircraftTrack {
  /** Stable identity from telemetry */
  id: string;
  /** Pilot name or callsign, if the telemetry carries one */
  callsign: string | null;
  /** Airframe name as reported by telemetry (e.g. "Su-27") */
  typeName: string | null;
  side: Side;
  position: Position;
  /** Source timestamp of the last accepted update (Unix ms). Ordering key. */
  timestamp: number;
  /** Local wall-clock time the last update was accepted (Unix ms). Staleness key. */
  receivedAt: number;
  velocity: Velocity;
}

/**
 * A decoded telemetry record ready for the track store.
 * `groundSpeed` may be null when the source does not report it; the store
 * then derives it from the previous position.
 */
export interface TrackUpdate {
  id: string;
  callsign: string | null;
  typeName: string | null;
  side: Side;
  timestamp: number;
  /** Heading and ground speed are null when the source did not report them */
  position: Omit<Position, 'heading' | 'groundSpeed'> & { heading: number | null; groundSpeed: number | null };
}

/** Point-in-time, read-only view of all non-stale tracks */
export interface TrackSnapshot {
  /** Time the snapshot was taken (Unix ms) */
  takenAt: number;
  tracks: ReadonlyMap<string, Readonly<AircraftTrack>>;
}
