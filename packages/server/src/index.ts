import express from 'express';
import { createServer } from 'http';
import type { StatusResponse } from '@gci-controller/shared';
import { formatFrequency } from '@gci-controller/shared';
import { loadSettings } from './config/settings.js';
import type { Settings } from './config/settings.js';
import { TrackStore } from './engine/TrackStore.js';
import { ConfigError, describeError } from './errors.js';
import { CallComposer } from './gci/CallComposer.js';
import { RequestClassifier } from './gci/RequestClassifier.js';
import { ChannelLock } from './radio/ChannelLock.js';
import { WebSocketRadioTransport } from './radio/RadioTransport.js';
import { SessionDispatcher } from './radio/SessionDispatcher.js';
import { OpenAISpeech } from './speech/OpenAISpeech.js';
import { TacviewClient } from './telemetry/TacviewClient.js';
import { TelemetryIngestor } from './telemetry/TelemetryIngestor.js';

let settings: Settings;
try {
  settings = loadSettings();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`[Server] Invalid configuration: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

const clock = () => Date.now();

// ─── Telemetry ─────────────────────────────────────────────────────────────
const store = new TrackStore({ stalenessWindowMs: settings.telemetry.stalenessWindowMs, clock });
const tacview = new TacviewClient({
  host: settings.telemetry.host,
  port: settings.telemetry.port,
  username: settings.telemetry.username,
  passwordHash: settings.telemetry.passwordHash,
  coalition: settings.coalition,
});
const ingestor = new TelemetryIngestor(store, tacview, {
  stalenessWindowMs: settings.telemetry.stalenessWindowMs,
  maintenanceIntervalMs: settings.telemetry.maintenanceIntervalMs,
  initialBackoffMs: settings.telemetry.initialBackoffMs,
  maxBackoffMs: settings.telemetry.maxBackoffMs,
  clock,
});

// ─── Radio ─────────────────────────────────────────────────────────────────
const speech = new OpenAISpeech(settings.speech);
const transport = new WebSocketRadioTransport({
  url: settings.radio.url,
  callsign: settings.callsign,
  frameBytes: settings.radio.frameBytes,
  initialBackoffMs: settings.radio.initialBackoffMs,
  maxBackoffMs: settings.radio.maxBackoffMs,
});
const channels = new ChannelLock();
const dispatcher = new SessionDispatcher(
  {
    composer: new CallComposer(store.reader(), { searchRadiusNm: settings.searchRadiusNm }),
    classifier: new RequestClassifier(settings.callsign),
    stt: speech,
    tts: speech,
    transport,
    channels,
    timings: settings.session,
    controllerCallsign: settings.callsign,
    language: settings.speech.language,
    clock,
  },
  { frequencies: [settings.radio.frequency] }
);

// ─── Express app ───────────────────────────────────────────────────────────
const app = express();

// Health check (used by liveness/readiness probes)
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok' });
});

app.get('/api/status', (_req, res) => {
  const body: StatusResponse = {
    status: 'ok',
    callsign: settings.callsign,
    tracks: store.size,
    ingest: ingestor.getStats(),
    sessions: dispatcher.listSessions(),
  };
  res.json(body);
});

// ─── HTTP server ───────────────────────────────────────────────────────────
const server = createServer(app);

server.listen(settings.port, () => {
  console.log(`[Server] ${settings.callsign} status API on port ${settings.port}`);
  console.log(`[Server] Listening on ${formatFrequency(settings.radio.frequency)} MHz for coalition ${settings.coalition}`);
});

ingestor.start();
dispatcher.start();
transport.connect({
  onMessage: (msg) => dispatcher.handleMessage(msg),
  onConnected: () => console.log('[Server] Radio network up'),
  onDisconnected: (err) => {
    console.error(`[Server] ${err.message}, reconnecting`);
    dispatcher.transportLost();
  },
});

// ─── Shutdown ──────────────────────────────────────────────────────────────
let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[Server] ${signal} received, shutting down`);

  dispatcher.stop();
  ingestor.stop();
  transport.close();
  void dispatcher
    .settled()
    .catch((err: unknown) => console.error(`[Server] Session shutdown failed: ${describeError(err)}`))
    .finally(() => {
      server.close(() => process.exit(0));
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
