import type { Coalition } from '@gci-controller/shared';
import { ConfigError } from '../errors.js';

export interface TelemetrySettings {
  host: string;
  port: number;
  username: string;
  /** Password hash sent in the handshake; "0" for servers without a password */
  passwordHash: string;
  /** Tracks not updated for this long are evicted (ms) */
  stalenessWindowMs: number;
  maintenanceIntervalMs: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
}

export interface RadioSettings {
  url: string;
  /** Channel the controller listens and replies on (Hz) */
  frequency: number;
  /** Size of outbound audio frames (bytes) */
  frameBytes: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
}

export interface SessionTimings {
  /** Longest accepted key-down before the transmission is treated as a stuck key */
  maxTransmissionMs: number;
  transcribeTimeoutMs: number;
  synthesizeTimeoutMs: number;
  /** Longest wait for a busy channel before giving up */
  channelWaitMs: number;
  transmitTimeoutMs: number;
  /** How long an idle session is kept before it is closed */
  idleLingerMs: number;
  /** Scheduler tick interval */
  tickIntervalMs: number;
}

export interface SpeechSettings {
  apiKey: string;
  baseUrl: string;
  transcriptionModel: string;
  speechModel: string;
  voice: string;
  speed: number;
  language: string;
}

export interface Settings {
  port: number;
  callsign: string;
  coalition: Coalition;
  searchRadiusNm: number;
  telemetry: TelemetrySettings;
  radio: RadioSettings;
  session: SessionTimings;
  speech: SpeechSettings;
}

export const DEFAULT_SESSION_TIMINGS: SessionTimings = {
  maxTransmissionMs: 30_000,
  transcribeTimeoutMs: 15_000,
  synthesizeTimeoutMs: 15_000,
  channelWaitMs: 10_000,
  transmitTimeoutMs: 30_000,
  idleLingerMs: 60_000,
  tickIntervalMs: 250,
};

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback?: string): string {
  const raw = env[name]?.trim();
  if (raw) return raw;
  if (fallback !== undefined) return fallback;
  throw new ConfigError(`${name} is required`);
}

function readNumber(env: Env, name: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigError(`${name} must be >= ${opts.min}, got ${value}`);
  }
  return value;
}

function readCoalition(env: Env): Coalition {
  const raw = readString(env, 'GCI_COALITION', 'blue').toLowerCase();
  if (raw === 'blue' || raw === 'red') return raw;
  throw new ConfigError(`GCI_COALITION must be "blue" or "red", got "${raw}"`);
}

function readUrl(env: Env, name: string, fallback: string, protocols: string[]): string {
  const raw = readString(env, name, fallback);
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`${name} is not a valid URL: "${raw}"`);
  }
  if (!protocols.includes(url.protocol)) {
    throw new ConfigError(`${name} must use ${protocols.join(' or ')}, got "${url.protocol}"`);
  }
  return raw.replace(/\/+$/, '');
}

/**
 * Build the validated, frozen settings object from environment variables.
 * Throws ConfigError on the first invalid or missing value.
 */
export function loadSettings(env: Env = process.env): Settings {
  const settings: Settings = {
    port: readNumber(env, 'PORT', 3001, { min: 0, integer: true }),
    callsign: readString(env, 'GCI_CALLSIGN', 'Overlord'),
    coalition: readCoalition(env),
    searchRadiusNm: readNumber(env, 'SEARCH_RADIUS_NM', 120, { min: 1 }),
    telemetry: {
      host: readString(env, 'TELEMETRY_HOST', '127.0.0.1'),
      port: readNumber(env, 'TELEMETRY_PORT', 42674, { min: 1, integer: true }),
      username: readString(env, 'TELEMETRY_USERNAME', 'gci-controller'),
      passwordHash: readString(env, 'TELEMETRY_PASSWORD_HASH', '0'),
      stalenessWindowMs: readNumber(env, 'STALENESS_WINDOW_MS', 30_000, { min: 1 }),
      maintenanceIntervalMs: readNumber(env, 'MAINTENANCE_INTERVAL_MS', 5_000, { min: 1 }),
      initialBackoffMs: readNumber(env, 'TELEMETRY_INITIAL_BACKOFF_MS', 1_000, { min: 1 }),
      maxBackoffMs: readNumber(env, 'TELEMETRY_MAX_BACKOFF_MS', 30_000, { min: 1 }),
    },
    radio: {
      url: readUrl(env, 'RADIO_URL', 'ws://127.0.0.1:5002', ['ws:', 'wss:']),
      frequency: readNumber(env, 'RADIO_FREQUENCY', 251_000_000, { min: 1 }),
      frameBytes: readNumber(env, 'RADIO_FRAME_BYTES', 4096, { min: 1, integer: true }),
      initialBackoffMs: readNumber(env, 'RADIO_INITIAL_BACKOFF_MS', 1_000, { min: 1 }),
      maxBackoffMs: readNumber(env, 'RADIO_MAX_BACKOFF_MS', 30_000, { min: 1 }),
    },
    session: {
      maxTransmissionMs: readNumber(env, 'MAX_TRANSMISSION_MS', DEFAULT_SESSION_TIMINGS.maxTransmissionMs, { min: 1 }),
      transcribeTimeoutMs: readNumber(env, 'TRANSCRIBE_TIMEOUT_MS', DEFAULT_SESSION_TIMINGS.transcribeTimeoutMs, { min: 1 }),
      synthesizeTimeoutMs: readNumber(env, 'SYNTHESIZE_TIMEOUT_MS', DEFAULT_SESSION_TIMINGS.synthesizeTimeoutMs, { min: 1 }),
      channelWaitMs: readNumber(env, 'CHANNEL_WAIT_MS', DEFAULT_SESSION_TIMINGS.channelWaitMs, { min: 0 }),
      transmitTimeoutMs: readNumber(env, 'TRANSMIT_TIMEOUT_MS', DEFAULT_SESSION_TIMINGS.transmitTimeoutMs, { min: 1 }),
      idleLingerMs: readNumber(env, 'IDLE_LINGER_MS', DEFAULT_SESSION_TIMINGS.idleLingerMs, { min: 0 }),
      tickIntervalMs: readNumber(env, 'TICK_INTERVAL_MS', DEFAULT_SESSION_TIMINGS.tickIntervalMs, { min: 10 }),
    },
    speech: {
      apiKey: readString(env, 'OPENAI_API_KEY'),
      baseUrl: readUrl(env, 'OPENAI_BASE_URL', 'https://api.openai.com/v1', ['http:', 'https:']),
      transcriptionModel: readString(env, 'TRANSCRIPTION_MODEL', 'whisper-1'),
      speechModel: readString(env, 'SPEECH_MODEL', 'tts-1'),
      voice: readString(env, 'SPEECH_VOICE', 'onyx'),
      speed: readNumber(env, 'SPEECH_SPEED', 1.0, { min: 0.25 }),
      language: readString(env, 'SPEECH_LANGUAGE', 'en'),
    },
  };

  if (settings.telemetry.maxBackoffMs < settings.telemetry.initialBackoffMs) {
    throw new ConfigError('TELEMETRY_MAX_BACKOFF_MS must be >= TELEMETRY_INITIAL_BACKOFF_MS');
  }
  if (settings.radio.maxBackoffMs < settings.radio.initialBackoffMs) {
    throw new ConfigError('RADIO_MAX_BACKOFF_MS must be >= RADIO_INITIAL_BACKOFF_MS');
  }

  for (const section of [settings.telemetry, settings.radio, settings.session, settings.speech]) {
    Object.freeze(section);
  }
  return Object.freeze(settings);
}
