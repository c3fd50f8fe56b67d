/** Radio session lifecycle */
export type RadioSessionState =
  | 'Idle'
  | 'Receiving'
  | 'Transcribing'
  | 'Composing'
  | 'Synthesizing'
  | 'AwaitingChannel'
  | 'Transmitting'
  | 'Aborted';

/** Why a session was torn down */
export type AbortReason =
  | 'stuckKey'
  | 'transcribeTimeout'
  | 'transcribeFailed'
  | 'composeFailed'
  | 'synthesizeTimeout'
  | 'synthesizeFailed'
  | 'channelBusy'
  | 'transmitTimeout'
  | 'transmitFailed'
  | 'disconnected'
  | 'transportLost'
  | 'shutdown';

/** Public view of a live session */
export interface SessionInfo {
  id: string;
  pilotId: string;
  frequency: number;
  state: RadioSessionState;
  /** Deadline of the current state (Unix ms), null when none */
  deadline: number | null;
  createdAt: number;
  /** Completed exchanges on this session */
  exchanges: number;
}
