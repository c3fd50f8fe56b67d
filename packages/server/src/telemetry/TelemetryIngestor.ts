import type { IngestStats, TrackUpdate } from '@gci-controller/shared';
import type { TrackStore } from '../engine/TrackStore.js';
import type { MalformedRecord, TransportDisconnected } from '../errors.js';
import type { TelemetryHandlers, TelemetrySource } from './TelemetrySource.js';

export interface TelemetryIngestorOptions {
  stalenessWindowMs: number;
  maintenanceIntervalMs: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  /** Wall clock (Unix ms) */
  clock?: () => number;
}

/** Exponential backoff: initial * 2^attempt, capped */
export function backoffDelay(attempt: number, initialMs: number, maxMs: number): number {
  return Math.min(initialMs * 2 ** attempt, maxMs);
}

/**
 * TelemetryIngestor is the only writer of the track store.
 *
 * It keeps the telemetry connection alive (retrying forever with capped
 * exponential backoff), applies every decoded record, and runs the periodic
 * staleness eviction. A reconnect never clears the store; tracks that stop
 * updating age out through eviction.
 */
export class TelemetryIngestor {
  private readonly clock: () => number;
  private running = false;
  private connected = false;
  private attempt = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private maintenanceTimer: ReturnType<typeof setInterval> | null = null;

  private stats: IngestStats = {
    connected: false,
    applied: 0,
    ignored: 0,
    malformed: 0,
    removed: 0,
    evicted: 0,
    reconnects: 0,
  };

  private readonly handlers: TelemetryHandlers = {
    onConnected: () => this.handleConnected(),
    onRecord: (update) => this.handleRecord(update),
    onRemove: (id) => this.handleRemove(id),
    onMalformed: (error) => this.handleMalformed(error),
    onDisconnected: (error) => this.handleDisconnected(error),
  };

  constructor(
    private readonly store: TrackStore,
    private readonly source: TelemetrySource,
    private readonly options: TelemetryIngestorOptions
  ) {
    this.clock = options.clock ?? Date.now;
  }

  /** Connect and start the maintenance cycle */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.attempt = 0;
    this.source.connect(this.handlers);

    this.maintenanceTimer = setInterval(() => {
      this.runMaintenance();
    }, this.options.maintenanceIntervalMs);

    console.log('[Ingestor] Started');
  }

  /** Stop reconnecting and close the source. The store is left as is. */
  stop(): void {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }
    this.source.close();
    console.log('[Ingestor] Stopped');
  }

  /** Evict stale tracks. Returns the evicted ids. */
  runMaintenance(now: number = this.clock()): string[] {
    const evicted = this.store.evictStale(now, this.options.stalenessWindowMs);
    if (evicted.length > 0) {
      this.stats.evicted += evicted.length;
      console.log(`[Ingestor] Evicted ${evicted.length} stale track(s)`);
    }
    return evicted;
  }

  getStats(): IngestStats {
    return { ...this.stats, connected: this.connected };
  }

  get isConnected(): boolean {
    return this.connected;
  }

  private handleConnected(): void {
    this.connected = true;
    this.attempt = 0;
    console.log('[Ingestor] Telemetry stream up');
  }

  private handleRecord(update: TrackUpdate): void {
    if (this.store.upsert(update, this.clock())) {
      this.stats.applied++;
    } else {
      this.stats.ignored++;
    }
  }

  private handleRemove(id: string): void {
    if (this.store.remove(id)) {
      this.stats.removed++;
    }
  }

  private handleMalformed(error: MalformedRecord): void {
    this.stats.malformed++;
    console.warn(`[Ingestor] Skipped malformed record: ${error.message}`);
  }

  private handleDisconnected(error: TransportDisconnected): void {
    this.connected = false;
    if (!this.running) return;

    const delay = backoffDelay(this.attempt, this.options.initialBackoffMs, this.options.maxBackoffMs);
    this.attempt++;
    console.warn(`[Ingestor] ${error.message}; reconnecting in ${delay}ms`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.running) return;
      this.stats.reconnects++;
      this.source.connect(this.handlers);
    }, delay);
  }
}
