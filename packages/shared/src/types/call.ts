import type { Side } from './track.js';

/** Requests the controller understands. Extend here and the composer's switch stops compiling until handled. */
export type RequestKind =
  | { kind: 'bogeyDope' }
  | { kind: 'radioCheck' };

/** A classified pilot request */
export interface RadioRequest {
  /** Pilot identity as reported by the radio transport */
  pilotId: string;
  /** Channel the request came in on (Hz) */
  frequency: number;
  request: RequestKind;
  /** Transmission start (Unix ms) */
  startedAt: number;
}

/** Target aspect relative to the requester */
export type Aspect = 'hot' | 'flanking' | 'beaming' | 'cold';

/** Eight-point compass direction */
export type CardinalDirection =
  | 'north'
  | 'north east'
  | 'east'
  | 'south east'
  | 'south'
  | 'south west'
  | 'west'
  | 'north west';

/** Bogey dope with a contact found */
export interface ContactCall {
  outcome: 'contact';
  targetId: string;
  /** Bearing to the contact (degrees true, nearest 10, 0–350) */
  bearingDeg: number;
  /** Range (whole nm) */
  rangeNm: number;
  /** Altitude in thousands of feet (rounded) */
  altitudeThousands: number;
  /** Altitude label, e.g. "15,000" */
  altitudeBlock: string;
  aspect: Aspect;
  /** Compass direction the contact is tracking */
  trackDirection: CardinalDirection;
  side: Exclude<Side, 'friendly'>;
  typeName: string | null;
}

/** Contact co-located with the requester */
export interface MergedCall {
  outcome: 'merged';
  targetId: string;
  side: Exclude<Side, 'friendly'>;
}

export interface CleanCall {
  outcome: 'clean';
}

/** Requester has no track (RequesterNotFound) */
export interface NoTrackCall {
  outcome: 'noTrack';
}

/** Requester's track is not on the controller's side */
export interface NotFriendlyCall {
  outcome: 'notFriendly';
}

export interface RadioCheckCall {
  outcome: 'radioCheck';
}

/** Transcription did not match any request (UnrecognizedRequest) */
export interface UnrecognizedCall {
  outcome: 'unrecognized';
}

export type CallResult =
  | ContactCall
  | MergedCall
  | CleanCall
  | NoTrackCall
  | NotFriendlyCall
  | RadioCheckCall
  | UnrecognizedCall;
