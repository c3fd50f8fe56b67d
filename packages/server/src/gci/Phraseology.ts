import { formatHeading } from '@gci-controller/shared';
import type { CallResult, ContactCall } from '@gci-controller/shared';
import { spokenAircraftType } from './aircraftTypes.js';

/**
 * Reply scripts. Every call is addressed "<pilot>, <controller>, ..." and
 * uses a fixed template per result so the synthesized voice stays predictable:
 *
 *   "Viper 1-1, Overlord, bogey dope, bra zero niner zero, 60 miles, 15 thousand, cold east, hostile, type flanker."
 *   "Viper 1-1, Overlord, picture clean."
 *   "Viper 1-1, Overlord, say again."
 */

export interface Addressing {
  /** Pilot being answered */
  pilot: string;
  /** Controller's own callsign */
  controller: string;
}

const DIGIT_WORDS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'niner'];

/** Spoken bearing, digit by digit. 0 is read as 360. */
export function spokenBearing(bearingDeg: number): string {
  return Array.from(formatHeading(bearingDeg), d => DIGIT_WORDS[Number(d)]).join(' ');
}

export function spokenRange(rangeNm: number): string {
  if (rangeNm < 1) return 'less than 1 mile';
  return rangeNm === 1 ? '1 mile' : `${rangeNm} miles`;
}

export function spokenAltitude(thousands: number): string {
  if (thousands <= 0) return 'on the deck';
  return `${thousands} thousand`;
}

function contactBody(call: ContactCall): string {
  const aspect = call.aspect === 'hot' ? 'hot' : `${call.aspect} ${call.trackDirection}`;
  const identity = call.side === 'hostile' ? 'hostile' : 'bogey';
  return [
    'bogey dope',
    `bra ${spokenBearing(call.bearingDeg)}`,
    spokenRange(call.rangeNm),
    spokenAltitude(call.altitudeThousands),
    aspect,
    identity,
    `type ${spokenAircraftType(call.typeName)}`,
  ].join(', ');
}

/** Body of the reply, without addressing */
export function callBody(result: CallResult): string {
  switch (result.outcome) {
    case 'contact':
      return contactBody(result);
    case 'merged':
      return result.side === 'hostile' ? 'merged, hostile' : 'merged';
    case 'clean':
      return 'picture clean';
    case 'noTrack':
      return 'stand by, no track';
    case 'notFriendly':
      return 'negative, you are not in my coalition';
    case 'radioCheck':
      return 'five by five';
    case 'unrecognized':
      return 'say again';
    default: {
      const unhandled: never = result;
      throw new Error(`Unhandled call result ${JSON.stringify(unhandled)}`);
    }
  }
}

/** Full spoken reply */
export function renderScript(result: CallResult, to: Addressing): string {
  return `${to.pilot}, ${to.controller}, ${callBody(result)}.`;
}

/** Reply used when the pilot's transmission could not be understood */
export function sayAgainScript(to: Addressing): string {
  return renderScript({ outcome: 'unrecognized' }, to);
}
