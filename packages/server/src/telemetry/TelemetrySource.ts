import type { TrackUpdate } from '@gci-controller/shared';
import type { MalformedRecord, TransportDisconnected } from '../errors.js';

/** Callbacks a telemetry source reports into */
export interface TelemetryHandlers {
  onConnected(): void;
  onRecord(update: TrackUpdate): void;
  onRemove(id: string): void;
  onMalformed(error: MalformedRecord): void;
  /** Called exactly once per connect() attempt that ends, whether it ever connected or not */
  onDisconnected(error: TransportDisconnected): void;
}

/**
 * A streaming telemetry connection. The ingestor owns reconnection: a
 * source makes one attempt per connect() call and reports the outcome.
 */
export interface TelemetrySource {
  connect(handlers: TelemetryHandlers): void;
  close(): void;
}
