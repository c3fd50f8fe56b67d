import { WebSocket } from 'ws';
import type { RadioInboundMessage, RadioOutboundMessage } from '@gci-controller/shared';
import { TransportDisconnected, describeError } from '../errors.js';
import { backoffDelay } from '../telemetry/TelemetryIngestor.js';

/** Outbound half of the radio network, as seen by a session */
export interface RadioTransport {
  /** Send one complete transmission (key, audio, unkey) on a frequency */
  transmit(frequency: number, audio: Buffer, signal: AbortSignal): Promise<void>;
}

export interface RadioEventHandlers {
  onMessage(message: RadioInboundMessage): void;
  onConnected(): void;
  onDisconnected(error: TransportDisconnected): void;
}

export interface WebSocketRadioOptions {
  url: string;
  /** Identity the controller transmits under */
  callsign: string;
  frameBytes: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
}

/** Validate an inbound JSON message from the radio network */
export function parseRadioMessage(raw: string): RadioInboundMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null) return null;
  if (!('type' in value) || !('pilotId' in value) || !('frequency' in value)) return null;

  const { type, pilotId, frequency } = value;
  if (typeof pilotId !== 'string' || !pilotId || typeof frequency !== 'number' || !Number.isFinite(frequency)) {
    return null;
  }

  switch (type) {
    case 'transmissionStart':
    case 'transmissionEnd':
    case 'pilotDisconnected':
      return { type, pilotId, frequency };
    case 'audioFrame': {
      if (!('data' in value) || typeof value.data !== 'string') return null;
      return { type, pilotId, frequency, data: value.data };
    }
    default:
      return null;
  }
}

/**
 * WebSocket client for the radio network. Reconnects with capped backoff;
 * inbound messages are validated before they reach the dispatcher.
 */
export class WebSocketRadioTransport implements RadioTransport {
  private ws: WebSocket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private attempt = 0;
  private stopped = true;
  private handlers: RadioEventHandlers | null = null;

  constructor(private readonly options: WebSocketRadioOptions) {}

  /** Connect to the server */
  connect(handlers: RadioEventHandlers): void {
    this.handlers = handlers;
    this.stopped = false;
    this.open();
  }

  /** Disconnect from server */
  close(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
  }

  get isOpen(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  async transmit(frequency: number, audio: Buffer, signal: AbortSignal): Promise<void> {
    const pilotId = this.options.callsign;
    await this.send({ type: 'transmissionStart', pilotId, frequency });
    try {
      for (let offset = 0; offset < audio.length; offset += this.options.frameBytes) {
        signal.throwIfAborted();
        const frame = audio.subarray(offset, offset + this.options.frameBytes);
        await this.send({ type: 'audioFrame', pilotId, frequency, data: frame.toString('base64') });
      }
    } finally {
      // Always unkey, even when cancelled mid-transmission
      if (this.isOpen) {
        await this.send({ type: 'transmissionEnd', pilotId, frequency });
      }
    }
  }

  private open(): void {
    const ws = new WebSocket(this.options.url);
    this.ws = ws;
    let reported = false;

    const reportDown = (reason: string, cause?: unknown): void => {
      if (reported) return;
      reported = true;
      if (this.ws === ws) this.ws = null;
      this.handlers?.onDisconnected(new TransportDisconnected('radio', reason, { cause }));
      this.scheduleReconnect();
    };

    ws.on('open', () => {
      this.attempt = 0;
      console.log(`[Radio] Connected to ${this.options.url}`);
      this.handlers?.onConnected();
    });

    ws.on('message', (data: Buffer) => {
      const message = parseRadioMessage(data.toString());
      if (!message) {
        console.warn('[Radio] Ignoring malformed message');
        return;
      }
      this.handlers?.onMessage(message);
    });

    ws.on('close', () => {
      reportDown('connection closed');
    });

    ws.on('error', (err) => {
      console.error('[Radio] Error:', err.message);
      reportDown(describeError(err), err);
    });
  }

  private send(message: RadioOutboundMessage): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportDisconnected('radio', 'not connected'));
    }
    return new Promise<void>((resolve, reject) => {
      ws.send(JSON.stringify(message), (err) => {
        if (err) reject(new TransportDisconnected('radio', describeError(err), { cause: err }));
        else resolve();
      });
    });
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return;
    const delay = backoffDelay(this.attempt, this.options.initialBackoffMs, this.options.maxBackoffMs);
    this.attempt++;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.stopped) this.open();
    }, delay);
  }
}
