import type { SessionInfo } from './radio.js';

/** ===== Radio network → controller ===== */

export interface TransmissionStartMessage {
  type: 'transmissionStart';
  pilotId: string;
  frequency: number;
}

export interface AudioFrameMessage {
  type: 'audioFrame';
  pilotId: string;
  frequency: number;
  /** Base64 encoded audio payload */
  data: string;
}

export interface TransmissionEndMessage {
  type: 'transmissionEnd';
  pilotId: string;
  frequency: number;
}

export interface PilotDisconnectedMessage {
  type: 'pilotDisconnected';
  pilotId: string;
  frequency: number;
}

export type RadioInboundMessage =
  | TransmissionStartMessage
  | AudioFrameMessage
  | TransmissionEndMessage
  | PilotDisconnectedMessage;

/** ===== Controller → radio network ===== */

export type RadioOutboundMessage =
  | TransmissionStartMessage
  | AudioFrameMessage
  | TransmissionEndMessage;

/** ===== Status API ===== */

export interface IngestStats {
  connected: boolean;
  applied: number;
  ignored: number;
  malformed: number;
  removed: number;
  evicted: number;
  reconnects: number;
}

export interface StatusResponse {
  status: 'ok';
  callsign: string;
  tracks: number;
  ingest: IngestStats;
  sessions: SessionInfo[];
}
