/**
 * Error taxonomy for the controller. Every error carries a stable `code` so
 * callers can branch without `instanceof` chains across module boundaries.
 */
export type GciErrorCode =
  | 'TransportDisconnected'
  | 'MalformedRecord'
  | 'RequesterNotFound'
  | 'UnrecognizedRequest'
  | 'NotAddressed'
  | 'CollaboratorFailure'
  | 'ChannelBusy'
  | 'SessionTimeout'
  | 'ConfigError';

export class GciError extends Error {
  readonly code: GciErrorCode;

  constructor(code: GciErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

/** Telemetry or radio link dropped */
export class TransportDisconnected extends GciError {
  constructor(readonly transport: 'telemetry' | 'radio', message: string, options?: { cause?: unknown }) {
    super('TransportDisconnected', `${transport}: ${message}`, options);
  }
}

/** A single telemetry record could not be decoded */
export class MalformedRecord extends GciError {
  constructor(readonly line: string, reason: string) {
    super('MalformedRecord', `${reason}: ${line}`);
  }
}

export class RequesterNotFound extends GciError {
  constructor(readonly pilotId: string) {
    super('RequesterNotFound', `No track for requester "${pilotId}"`);
  }
}

export class UnrecognizedRequest extends GciError {
  constructor(readonly text: string) {
    super('UnrecognizedRequest', `Unrecognized request "${text}"`);
  }
}

/** A transmission addressed to some other station */
export class NotAddressed extends GciError {
  constructor(readonly addressee: string) {
    super('NotAddressed', `Transmission is for "${addressee}"`);
  }
}

/** Speech-to-text or text-to-speech call failed */
export class CollaboratorFailure extends GciError {
  constructor(readonly collaborator: 'speechToText' | 'textToSpeech', message: string, options?: { cause?: unknown }) {
    super('CollaboratorFailure', `${collaborator}: ${message}`, options);
  }
}

export class ChannelBusy extends GciError {
  constructor(readonly frequency: number) {
    super('ChannelBusy', `Channel ${frequency} busy`);
  }
}

export class SessionTimeout extends GciError {
  constructor(readonly state: string) {
    super('SessionTimeout', `Timed out in ${state}`);
  }
}

export class ConfigError extends GciError {
  constructor(message: string) {
    super('ConfigError', message);
  }
}

/** Describe an unknown thrown value for logs */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Cancellation raised through an AbortSignal (fetch, signal.throwIfAborted) */
export function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}
