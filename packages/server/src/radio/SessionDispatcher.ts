import type { AbortReason, RadioInboundMessage, SessionInfo } from '@gci-controller/shared';
import { RadioSession } from './RadioSession.js';
import type { SessionDeps, SessionObserver } from './RadioSession.js';

export interface DispatcherOptions {
  /** Only traffic on these frequencies is handled; all when omitted */
  frequencies?: readonly number[];
}

/** Transcription failures that get a "say again" instead of silence */
const SAY_AGAIN_REASONS: ReadonlySet<AbortReason> = new Set(['transcribeFailed', 'transcribeTimeout']);

/**
 * SessionDispatcher owns the pool of live radio sessions, one per pilot.
 *
 * Pilot events are routed to that pilot's session while it accepts input
 * (Idle or Receiving); anything else is dropped and logged. tick() is the
 * scheduler: it fires elapsed session deadlines and reaps dead sessions.
 */
export class SessionDispatcher implements SessionObserver {
  private sessions = new Map<string, RadioSession>();
  /** Aborted or closed sessions whose in-flight work may still be settling */
  private retired = new Set<RadioSession>();
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private readonly frequencies: ReadonlySet<number> | null;

  constructor(
    private readonly deps: SessionDeps,
    options: DispatcherOptions = {}
  ) {
    this.frequencies = options.frequencies ? new Set(options.frequencies) : null;
  }

  /** Start the deadline scheduler */
  start(): void {
    if (this.tickTimer) return;
    this.tickTimer = setInterval(() => this.tick(this.deps.clock()), this.deps.timings.tickIntervalMs);
    console.log(`[Dispatcher] Started (tick ${this.deps.timings.tickIntervalMs}ms)`);
  }

  /** Stop the scheduler and abort every live session */
  stop(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    for (const session of [...this.sessions.values()]) {
      session.abort('shutdown');
    }
    this.sessions.clear();
  }

  handleMessage(msg: RadioInboundMessage): void {
    if (this.frequencies && !this.frequencies.has(msg.frequency)) return;
    const now = this.deps.clock();

    switch (msg.type) {
      case 'transmissionStart':
        this.transmissionStart(msg.pilotId, msg.frequency, now);
        break;
      case 'audioFrame':
        this.audioFrame(msg.pilotId, Buffer.from(msg.data, 'base64'));
        break;
      case 'transmissionEnd':
        this.transmissionEnd(msg.pilotId, msg.frequency, now);
        break;
      case 'pilotDisconnected':
        this.pilotDisconnected(msg.pilotId, msg.frequency);
        break;
      default: {
        const unhandled: never = msg;
        console.warn(`[Dispatcher] Unknown message ${JSON.stringify(unhandled)}`);
      }
    }
  }

  transmissionStart(pilotId: string, frequency: number, now: number): void {
    // The pilot is on the air whatever the session makes of it
    this.deps.channels.markKeyed(frequency, pilotId);

    let session = this.live(pilotId);
    if (!session) {
      session = new RadioSession(pilotId, frequency, this.deps, this);
      this.sessions.set(pilotId, session);
      console.log(`[Dispatcher] New session ${session.id} for ${pilotId} on ${frequency}`);
    }

    if (session.frequency !== frequency || !session.transmissionStart(now)) {
      console.warn(`[Dispatcher] Dropped transmission start from ${pilotId} (session ${session.state})`);
    }
  }

  audioFrame(pilotId: string, frame: Buffer): void {
    const session = this.live(pilotId);
    if (!session || !session.audioFrame(frame)) {
      console.warn(`[Dispatcher] Dropped audio frame from ${pilotId} (session ${session?.state ?? 'none'})`);
    }
  }

  transmissionEnd(pilotId: string, frequency: number, now: number): void {
    this.deps.channels.clearKeyed(frequency, pilotId);

    const session = this.live(pilotId);
    if (!session || session.frequency !== frequency || !session.transmissionEnd(now)) {
      console.warn(`[Dispatcher] Dropped transmission end from ${pilotId} (session ${session?.state ?? 'none'})`);
    }
  }

  pilotDisconnected(pilotId: string, frequency: number): void {
    this.deps.channels.clearKeyed(frequency, pilotId);
    this.live(pilotId)?.disconnect();
  }

  /**
   * The radio network dropped. Pilots on the air are gone with it and a reply
   * being sent cannot finish, so those sessions abort and the channels unkey.
   */
  transportLost(): void {
    const frequencies = new Set(this.frequencies ?? [...this.sessions.values()].map(s => s.frequency));
    let aborted = 0;
    for (const session of [...this.sessions.values()]) {
      if (session.state === 'Receiving' || session.state === 'Transmitting') {
        if (session.abort('transportLost')) aborted++;
      }
    }
    for (const frequency of frequencies) {
      this.deps.channels.clearAllKeyed(frequency);
    }
    console.warn(`[Dispatcher] Radio network lost, aborted ${aborted} session(s)`);
  }

  /** Fire every elapsed deadline, then drop dead sessions from the pool */
  tick(now: number): void {
    for (const session of [...this.sessions.values()]) {
      session.checkDeadline(now);
    }
    for (const [pilotId, session] of this.sessions) {
      if (session.isDead) this.sessions.delete(pilotId);
    }
  }

  // ─── SessionObserver ───────────────────────────────────────────────────

  onAborted(session: RadioSession, reason: AbortReason): void {
    this.deps.channels.clearKeyed(session.frequency, session.pilotId);
    this.retire(session);

    if (SAY_AGAIN_REASONS.has(reason)) {
      this.sayAgain(session.pilotId, session.frequency);
    }
  }

  onClosed(session: RadioSession): void {
    this.retire(session);
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  getSession(pilotId: string): RadioSession | null {
    return this.live(pilotId);
  }

  listSessions(): SessionInfo[] {
    return [...this.sessions.values()].filter(s => !s.isDead).map(s => s.info());
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Resolves once no session, live or retired, has work in flight */
  async settled(): Promise<void> {
    let pending = this.busySessions();
    while (pending.length > 0) {
      await Promise.all(pending.map(s => s.settled()));
      pending = this.busySessions();
    }
  }

  private busySessions(): RadioSession[] {
    return [...this.sessions.values(), ...this.retired].filter(s => s.busy);
  }

  private live(pilotId: string): RadioSession | null {
    const session = this.sessions.get(pilotId);
    return session && !session.isDead ? session : null;
  }

  private retire(session: RadioSession): void {
    if (this.sessions.get(session.pilotId) === session) {
      this.sessions.delete(session.pilotId);
    }
    this.retired.add(session);
    void session.settled().then(() => {
      this.retired.delete(session);
    });
  }

  /** Best-effort "say again" on a fresh session after the pilot could not be understood */
  private sayAgain(pilotId: string, frequency: number): void {
    if (this.live(pilotId)) return;
    const session = new RadioSession(pilotId, frequency, this.deps, this);
    this.sessions.set(pilotId, session);
    if (session.reply({ outcome: 'unrecognized' }, this.deps.clock())) {
      console.log(`[Dispatcher] Asking ${pilotId} to say again`);
    }
  }
}
