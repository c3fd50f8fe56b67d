import type { Coalition, Side, TrackUpdate } from '@gci-controller/shared';
import { mpsToKnots } from '@gci-controller/shared';
import { MalformedRecord } from '../errors.js';

/**
 * AcmiDecoder: turn Tacview ACMI 2.x text lines into track updates.
 *
 * ACMI is a delta format. Each object line only carries the properties that
 * changed since the last frame, and empty fields inside `T=` keep their
 * previous value, so the decoder keeps per-object state:
 *
 *   FileType=text/acmi/tacview
 *   0,ReferenceTime=2024-05-01T10:00:00Z
 *   0,ReferenceLatitude=42
 *   #12.5
 *   a0f,T=1.2|0.8|6000|||270,Type=Air+FixedWing,Name=Su-27,Color=Red
 *   a0f,T=1.21||5990
 *   -a0f
 *
 * Latitude and longitude in `T=` are offsets from the reference point.
 */

export type AcmiEvent =
  | { type: 'record'; update: TrackUpdate }
  | { type: 'remove'; id: string }
  | { type: 'malformed'; error: MalformedRecord };

interface AcmiObject {
  lon: number | null;
  lat: number | null;
  alt: number | null;
  heading: number | null;
  tasMps: number | null;
  type: string | null;
  name: string | null;
  pilot: string | null;
  color: string | null;
  coalition: string | null;
}

const OBJECT_ID = /^[0-9a-fA-F]+$/;
const GLOBAL_OBJECT_ID = '0';

function emptyObject(): AcmiObject {
  return {
    lon: null,
    lat: null,
    alt: null,
    heading: null,
    tasMps: null,
    type: null,
    name: null,
    pilot: null,
    color: null,
    coalition: null,
  };
}

/** Map an ACMI color/coalition tag to the controller's view */
export function sideFromTags(color: string | null, coalitionTag: string | null, own: Coalition): Side {
  let tagged: Coalition | null = null;
  const c = color?.toLowerCase();
  if (c === 'blue' || c === 'red') {
    tagged = c;
  } else if (coalitionTag === 'Enemies') {
    // DCS exports the blue coalition as "Enemies" and red as "Allies"
    tagged = 'blue';
  } else if (coalitionTag === 'Allies') {
    tagged = 'red';
  }
  if (tagged === null) return 'unknown';
  return tagged === own ? 'friendly' : 'hostile';
}

/** Split on commas that are not escaped with a backslash */
function splitProperties(line: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '\\' && i + 1 < line.length) {
      current += line[i + 1];
      i++;
      continue;
    }
    if (ch === ',') {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}

function parseField(raw: string | undefined): number | null | 'invalid' {
  if (raw === undefined || raw === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : 'invalid';
}

export class AcmiDecoder {
  private referenceLat = 0;
  private referenceLon = 0;
  private referenceTime: number | null = null;
  private frameSeconds = 0;
  private objects = new Map<string, AcmiObject>();
  private continuation = '';

  constructor(private readonly coalition: Coalition) {}

  /** Forget all stream state (new connection, new header) */
  reset(): void {
    this.referenceLat = 0;
    this.referenceLon = 0;
    this.referenceTime = null;
    this.frameSeconds = 0;
    this.objects.clear();
    this.continuation = '';
  }

  /** Current source time (Unix ms, or ms since stream start without ReferenceTime) */
  get currentTime(): number {
    return (this.referenceTime ?? 0) + Math.round(this.frameSeconds * 1000);
  }

  /** Decode one line of the stream. Returns zero or more events. */
  decodeLine(rawLine: string): AcmiEvent[] {
    let line = rawLine.replace(/\r$/, '');

    // A trailing backslash continues the line
    if (line.endsWith('\\') && !line.endsWith('\\\\')) {
      this.continuation += line.slice(0, -1) + '\n';
      return [];
    }
    if (this.continuation) {
      line = this.continuation + line;
      this.continuation = '';
    }

    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('//')) return [];
    if (trimmed.startsWith('FileType=') || trimmed.startsWith('FileVersion=')) return [];

    if (trimmed.startsWith('#')) {
      const seconds = Number(trimmed.slice(1));
      if (!Number.isFinite(seconds)) {
        return [{ type: 'malformed', error: new MalformedRecord(trimmed, 'Invalid frame time') }];
      }
      this.frameSeconds = seconds;
      return [];
    }

    if (trimmed.startsWith('-')) {
      const id = trimmed.slice(1);
      if (!OBJECT_ID.test(id)) {
        return [{ type: 'malformed', error: new MalformedRecord(trimmed, 'Invalid object id') }];
      }
      this.objects.delete(id);
      return [{ type: 'remove', id }];
    }

    return this.decodeObjectLine(trimmed);
  }

  private decodeObjectLine(line: string): AcmiEvent[] {
    const [id, ...props] = splitProperties(line);
    if (!OBJECT_ID.test(id)) {
      return [{ type: 'malformed', error: new MalformedRecord(line, 'Invalid object id') }];
    }

    if (id === GLOBAL_OBJECT_ID) {
      return this.applyGlobal(line, props);
    }

    const previous = this.objects.get(id) ?? emptyObject();
    const next: AcmiObject = { ...previous };

    for (const prop of props) {
      const eq = prop.indexOf('=');
      if (eq <= 0) {
        return [{ type: 'malformed', error: new MalformedRecord(line, `Invalid property "${prop}"`) }];
      }
      const key = prop.slice(0, eq);
      const value = prop.slice(eq + 1);

      switch (key) {
        case 'T': {
          if (!this.applyTransform(next, value)) {
            return [{ type: 'malformed', error: new MalformedRecord(line, 'Invalid transform') }];
          }
          break;
        }
        case 'TAS': {
          const tas = Number(value);
          if (!Number.isFinite(tas)) {
            return [{ type: 'malformed', error: new MalformedRecord(line, 'Invalid TAS') }];
          }
          next.tasMps = tas;
          break;
        }
        case 'Type':
          next.type = value;
          break;
        case 'Name':
          next.name = value;
          break;
        case 'Pilot':
          next.pilot = value;
          break;
        case 'CallSign':
          if (!next.pilot) next.pilot = value;
          break;
        case 'Color':
          next.color = value;
          break;
        case 'Coalition':
          next.coalition = value;
          break;
        default:
          break;
      }
    }

    this.objects.set(id, next);

    if (!next.type?.includes('Air')) return [];
    if (next.lat === null || next.lon === null || next.alt === null) return [];

    const update: TrackUpdate = {
      id,
      callsign: next.pilot,
      typeName: next.name,
      side: sideFromTags(next.color, next.coalition, this.coalition),
      timestamp: this.currentTime,
      position: {
        lat: this.referenceLat + next.lat,
        lon: this.referenceLon + next.lon,
        altitudeM: next.alt,
        heading: next.heading,
        groundSpeed: next.tasMps === null ? null : mpsToKnots(next.tasMps),
      },
    };
    return [{ type: 'record', update }];
  }

  /**
   * Apply a `T=` transform. Supported layouts:
   *   lon|lat|alt
   *   lon|lat|alt|u|v
   *   lon|lat|alt|roll|pitch|yaw
   *   lon|lat|alt|roll|pitch|yaw|u|v|heading
   */
  private applyTransform(obj: AcmiObject, value: string): boolean {
    const fields = value.split('|');
    if (![3, 5, 6, 9].includes(fields.length)) return false;

    const parsed = fields.map(parseField);
    if (parsed.some(f => f === 'invalid')) return false;
    const num = (i: number): number | null => {
      const f = parsed[i];
      return f === 'invalid' ? null : f;
    };

    obj.lon = num(0) ?? obj.lon;
    obj.lat = num(1) ?? obj.lat;
    obj.alt = num(2) ?? obj.alt;

    if (fields.length === 6) {
      obj.heading = num(5) ?? obj.heading;
    } else if (fields.length === 9) {
      obj.heading = num(8) ?? num(5) ?? obj.heading;
    }
    return true;
  }

  private applyGlobal(line: string, props: string[]): AcmiEvent[] {
    for (const prop of props) {
      const eq = prop.indexOf('=');
      if (eq <= 0) continue;
      const key = prop.slice(0, eq);
      const value = prop.slice(eq + 1);

      if (key === 'ReferenceLatitude' || key === 'ReferenceLongitude') {
        const n = Number(value);
        if (!Number.isFinite(n)) {
          return [{ type: 'malformed', error: new MalformedRecord(line, `Invalid ${key}`) }];
        }
        if (key === 'ReferenceLatitude') this.referenceLat = n;
        else this.referenceLon = n;
      } else if (key === 'ReferenceTime') {
        const t = Date.parse(value);
        if (Number.isNaN(t)) {
          return [{ type: 'malformed', error: new MalformedRecord(line, 'Invalid ReferenceTime') }];
        }
        this.referenceTime = t;
      }
    }
    return [];
  }
}
