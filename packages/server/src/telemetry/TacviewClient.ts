import { Socket } from 'net';
import type { Coalition } from '@gci-controller/shared';
import { TransportDisconnected, describeError } from '../errors.js';
import { AcmiDecoder } from './AcmiDecoder.js';
import type { TelemetryHandlers, TelemetrySource } from './TelemetrySource.js';

/**
 * Tacview real-time telemetry client.
 *
 * Protocol:
 * - TCP connection to host:port
 * - Client handshake: "XtraLib.Stream.0\nTacview.RealTimeTelemetry.0\n<user>\n<password hash>\0"
 * - Server answers with its own header block, terminated by a NUL byte
 * - After the handshake: ACMI text, one record per line
 */
export interface TacviewClientOptions {
  host: string;
  port: number;
  username: string;
  passwordHash: string;
  coalition: Coalition;
}

const NUL = 0x00;
const NEWLINE = 0x0a;

export class TacviewClient implements TelemetrySource {
  private socket: Socket | null = null;
  private readonly decoder: AcmiDecoder;
  private receiveBuffer = Buffer.alloc(0);
  private handshakeComplete = false;
  private closedByUser = false;

  constructor(private readonly options: TacviewClientOptions) {
    this.decoder = new AcmiDecoder(options.coalition);
  }

  connect(handlers: TelemetryHandlers): void {
    this.teardownSocket();
    this.closedByUser = false;
    this.decoder.reset();
    this.receiveBuffer = Buffer.alloc(0);
    this.handshakeComplete = false;

    const { host, port } = this.options;
    const socket = new Socket();
    this.socket = socket;
    let lastError: Error | null = null;
    let reported = false;

    socket.setNoDelay(true);

    socket.on('connect', () => {
      console.log(`[Tacview] Connected to ${host}:${port}`);
      socket.write(this.handshake());
    });

    socket.on('data', (chunk: Buffer) => {
      this.onData(chunk, handlers);
    });

    socket.on('error', (err: Error) => {
      lastError = err;
    });

    socket.on('close', () => {
      if (this.socket === socket) this.socket = null;
      if (reported) return;
      reported = true;
      const reason = this.closedByUser
        ? 'closed'
        : lastError
          ? describeError(lastError)
          : 'connection closed by server';
      handlers.onDisconnected(new TransportDisconnected('telemetry', reason, { cause: lastError ?? undefined }));
    });

    socket.connect(port, host);
  }

  close(): void {
    this.closedByUser = true;
    this.teardownSocket();
  }

  private teardownSocket(): void {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
  }

  private handshake(): string {
    const { username, passwordHash } = this.options;
    return `XtraLib.Stream.0\nTacview.RealTimeTelemetry.0\n${username}\n${passwordHash}\0`;
  }

  private onData(chunk: Buffer, handlers: TelemetryHandlers): void {
    this.receiveBuffer = Buffer.concat([this.receiveBuffer, chunk]);

    if (!this.handshakeComplete) {
      const end = this.receiveBuffer.indexOf(NUL);
      if (end === -1) return;
      this.receiveBuffer = this.receiveBuffer.subarray(end + 1);
      this.handshakeComplete = true;
      handlers.onConnected();
    }

    let newline = this.receiveBuffer.indexOf(NEWLINE);
    while (newline !== -1) {
      const line = this.receiveBuffer.subarray(0, newline).toString('utf-8');
      this.receiveBuffer = this.receiveBuffer.subarray(newline + 1);
      this.dispatch(line, handlers);
      newline = this.receiveBuffer.indexOf(NEWLINE);
    }
  }

  private dispatch(line: string, handlers: TelemetryHandlers): void {
    for (const event of this.decoder.decodeLine(line)) {
      switch (event.type) {
        case 'record':
          handlers.onRecord(event.update);
          break;
        case 'remove':
          handlers.onRemove(event.id);
          break;
        case 'malformed':
          handlers.onMalformed(event.error);
          break;
      }
    }
  }
}
