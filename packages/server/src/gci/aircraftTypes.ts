import { readFileSync, existsSync } from 'fs';
import { fileURLToPath } from 'url';

const DATA_PATH = fileURLToPath(new URL('../../data/aircraft-types.json', import.meta.url));

/** Load telemetry airframe name → spoken reporting name */
export function loadAircraftTypes(path: string = DATA_PATH): Map<string, string> {
  const map = new Map<string, string>();
  if (!existsSync(path)) {
    console.warn(`[AircraftTypes] ${path} not found, types will be spoken as reported`);
    return map;
  }
  try {
    const raw = readFileSync(path, 'utf-8');
    const data = JSON.parse(raw) as { types: { spoken: string; names: string[] }[] };
    for (const entry of data.types) {
      for (const name of entry.names) {
        map.set(name, entry.spoken);
      }
    }
  } catch (err) {
    console.warn(`[AircraftTypes] Failed to load ${path}: ${String(err)}`);
  }
  return map;
}

const AIRCRAFT_TYPES = loadAircraftTypes();

/** Spoken reporting name for an airframe, e.g. "Su-27" → "flanker" */
export function spokenAircraftType(typeName: string | null, table: ReadonlyMap<string, string> = AIRCRAFT_TYPES): string {
  if (!typeName) return 'unknown';
  return table.get(typeName) ?? typeName;
}
