import { v4 as uuid } from 'uuid';
import type { AbortReason, CallResult, RadioSessionState, SessionInfo } from '@gci-controller/shared';
import type { SessionTimings } from '../config/settings.js';
import type { CallComposer } from '../gci/CallComposer.js';
import { renderScript } from '../gci/Phraseology.js';
import type { RequestClassifier } from '../gci/RequestClassifier.js';
import type { SpeechToText, TextToSpeech } from '../speech/SpeechCollaborators.js';
import { ChannelBusy, SessionTimeout, describeError, isAbortError } from '../errors.js';
import type { ChannelLock, ChannelTicket } from './ChannelLock.js';
import type { RadioTransport } from './RadioTransport.js';

export interface SessionDeps {
  composer: Pick<CallComposer, 'compose'>;
  classifier: Pick<RequestClassifier, 'classify'>;
  stt: SpeechToText;
  tts: TextToSpeech;
  transport: RadioTransport;
  channels: ChannelLock;
  timings: SessionTimings;
  controllerCallsign: string;
  language: string;
  clock: () => number;
}

export interface SessionObserver {
  onAborted(session: RadioSession, reason: AbortReason, error?: unknown): void;
  /** Idle linger elapsed; the session finished normally */
  onClosed(session: RadioSession): void;
}

/** Reject with the signal's reason once it fires */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * RadioSession: one pilot's exchange with the controller.
 *
 *   Idle → Receiving → Transcribing → Composing → Synthesizing
 *        → AwaitingChannel → Transmitting → Idle
 *
 * Any state except Idle can fall into Aborted, which is terminal. The session
 * holds a single state and the deadline for it; the dispatcher's tick calls
 * checkDeadline(). Collaborator completions carry the epoch they started in
 * and are dropped if the session moved on (aborted) in the meantime.
 */
export class RadioSession {
  readonly id = uuid();
  readonly createdAt: number;

  private _state: RadioSessionState = 'Idle';
  private _deadline: number | null;
  private _closed = false;
  private _exchanges = 0;

  private audio: Buffer[] | null = null;
  private controller: AbortController | null = null;
  private ticket: ChannelTicket | null = null;
  private epoch = 0;
  private tasks = new Set<Promise<void>>();

  constructor(
    readonly pilotId: string,
    readonly frequency: number,
    private readonly deps: SessionDeps,
    private readonly observer: SessionObserver
  ) {
    this.createdAt = deps.clock();
    this._deadline = this.createdAt + deps.timings.idleLingerMs;
  }

  get state(): RadioSessionState {
    return this._state;
  }

  get deadline(): number | null {
    return this._deadline;
  }

  /** Aborted or closed; the dispatcher must not route to it any more */
  get isDead(): boolean {
    return this._closed || this._state === 'Aborted';
  }

  get exchanges(): number {
    return this._exchanges;
  }

  info(): SessionInfo {
    return {
      id: this.id,
      pilotId: this.pilotId,
      frequency: this.frequency,
      state: this._state,
      deadline: this._deadline,
      createdAt: this.createdAt,
      exchanges: this._exchanges,
    };
  }

  // ─── Pilot events ──────────────────────────────────────────────────────

  transmissionStart(now: number): boolean {
    if (this.isDead) return false;
    if (this._state === 'Receiving') return true;
    if (this._state !== 'Idle') return false;

    this.audio = [];
    this.enter('Receiving', now + this.deps.timings.maxTransmissionMs);
    return true;
  }

  audioFrame(frame: Buffer): boolean {
    if (this.isDead || this._state !== 'Receiving' || !this.audio) return false;
    this.audio.push(frame);
    return true;
  }

  transmissionEnd(now: number): boolean {
    if (this.isDead || this._state !== 'Receiving' || !this.audio) return false;

    const audio = Buffer.concat(this.audio);
    this.audio = null;
    if (audio.length === 0) {
      this.enter('Idle', now + this.deps.timings.idleLingerMs);
      return true;
    }

    this.enter('Transcribing', now + this.deps.timings.transcribeTimeoutMs);
    const epoch = ++this.epoch;
    this.track(epoch, () => this.handleTransmission(epoch, audio));
    return true;
  }

  /** Answer without a preceding transmission (used for "say again") */
  reply(result: CallResult, now: number): boolean {
    if (this.isDead || this._state !== 'Idle') return false;
    const epoch = ++this.epoch;
    this.startSynthesizing(now);
    this.track(epoch, () => this.speak(epoch, result));
    return true;
  }

  disconnect(): boolean {
    return this.abort('disconnected');
  }

  // ─── Scheduler ─────────────────────────────────────────────────────────

  /** Apply the current state's deadline. Returns true if it fired. */
  checkDeadline(now: number): boolean {
    if (this.isDead || this._deadline === null || now < this._deadline) return false;

    switch (this._state) {
      case 'Idle':
        this._closed = true;
        this._deadline = null;
        console.log(`[Session ${this.pilotId}] Closed after ${this._exchanges} exchange(s)`);
        this.observer.onClosed(this);
        return true;
      case 'Receiving':
        return this.abort('stuckKey', new SessionTimeout('Receiving'));
      case 'Transcribing':
        return this.abort('transcribeTimeout', new SessionTimeout('Transcribing'));
      case 'Composing':
        return this.abort('composeFailed', new SessionTimeout('Composing'));
      case 'Synthesizing':
        return this.abort('synthesizeTimeout', new SessionTimeout('Synthesizing'));
      case 'AwaitingChannel':
        return this.abort('channelBusy', new ChannelBusy(this.frequency));
      case 'Transmitting':
        return this.abort('transmitTimeout', new SessionTimeout('Transmitting'));
      case 'Aborted':
        return false;
      default: {
        const unhandled: never = this._state;
        throw new Error(`Unhandled session state ${String(unhandled)}`);
      }
    }
  }

  /**
   * Tear the session down: cancel the pending call, drop buffered audio and
   * give the channel back. Returns false if it was already dead.
   */
  abort(reason: AbortReason, error?: unknown): boolean {
    if (this.isDead) return false;
    const from = this._state;

    this.epoch++;
    this.controller?.abort();
    this.controller = null;
    this.audio = null;
    // A transmission in progress keeps the channel until the transport has
    // unkeyed; speak() releases it once transmit() settles.
    if (this.ticket && from !== 'Transmitting') {
      this.deps.channels.cancel(this.ticket);
    }
    this.ticket = null;
    this._state = 'Aborted';
    this._deadline = null;

    const detail = error === undefined ? '' : `: ${describeError(error)}`;
    console.warn(`[Session ${this.pilotId}] Aborted in ${from} (${reason})${detail}`);
    this.observer.onAborted(this, reason, error);
    return true;
  }

  /** Collaborator work is in flight */
  get busy(): boolean {
    return this.tasks.size > 0;
  }

  /** Resolves once no collaborator work is in flight */
  async settled(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks);
    }
  }

  // ─── Pipeline ──────────────────────────────────────────────────────────

  private async handleTransmission(epoch: number, audio: Buffer): Promise<void> {
    let text: string;
    try {
      text = await this.withRetry(epoch, signal =>
        this.deps.stt.transcribe(audio, { language: this.deps.language, signal })
      );
    } catch (err) {
      this.fail(epoch, 'transcribeFailed', err);
      return;
    }
    if (!this.isCurrent(epoch)) return;

    console.log(`[Session ${this.pilotId}] Heard "${text}"`);
    this.enter('Composing', null);

    let result: CallResult | null;
    try {
      result = this.composeReply(text);
    } catch (err) {
      this.fail(epoch, 'composeFailed', err);
      return;
    }
    if (result === null) {
      this.enter('Idle', this.deps.clock() + this.deps.timings.idleLingerMs);
      return;
    }

    this.startSynthesizing(this.deps.clock());
    await this.speak(epoch, result);
  }

  /** The reply to a transcript, or null when it was meant for another station */
  private composeReply(text: string): CallResult | null {
    const classified = this.deps.classifier.classify(text);
    if (!classified.success) {
      console.warn(`[Session ${this.pilotId}] ${classified.error.message}`);
      return classified.error.code === 'NotAddressed' ? null : { outcome: 'unrecognized' };
    }
    return this.deps.composer.compose(this.pilotId, classified.request, this.deps.clock());
  }

  private startSynthesizing(now: number): void {
    this.enter('Synthesizing', now + this.deps.timings.synthesizeTimeoutMs);
  }

  /** Synthesizing → AwaitingChannel → Transmitting → Idle */
  private async speak(epoch: number, result: CallResult): Promise<void> {
    const script = renderScript(result, { pilot: this.pilotId, controller: this.deps.controllerCallsign });

    let audio: Buffer;
    try {
      audio = await this.withRetry(epoch, signal => this.deps.tts.synthesize(script, { signal }));
    } catch (err) {
      this.fail(epoch, 'synthesizeFailed', err);
      return;
    }
    if (!this.isCurrent(epoch)) return;

    this.enter('AwaitingChannel', this.deps.clock() + this.deps.timings.channelWaitMs);
    const ticket = this.deps.channels.acquire(this.frequency, this.id);
    this.ticket = ticket;
    const waiting = new AbortController();
    this.controller = waiting;
    try {
      await raceAbort(ticket.granted, waiting.signal);
    } catch (err) {
      this.fail(epoch, 'channelBusy', err);
      return;
    } finally {
      if (this.controller === waiting) this.controller = null;
    }
    if (!this.isCurrent(epoch)) {
      this.deps.channels.release(ticket);
      return;
    }

    this.enter('Transmitting', this.deps.clock() + this.deps.timings.transmitTimeoutMs);
    const sending = new AbortController();
    this.controller = sending;
    try {
      console.log(`[Session ${this.pilotId}] Transmitting "${script}"`);
      await this.deps.transport.transmit(this.frequency, audio, sending.signal);
    } catch (err) {
      this.fail(epoch, 'transmitFailed', err);
      return;
    } finally {
      if (this.controller === sending) this.controller = null;
      this.deps.channels.release(ticket);
      if (this.ticket === ticket) this.ticket = null;
    }
    if (!this.isCurrent(epoch)) return;

    this._exchanges++;
    this.enter('Idle', this.deps.clock() + this.deps.timings.idleLingerMs);
  }

  /** Run a collaborator call, retrying once unless it was cancelled */
  private async withRetry<T>(epoch: number, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      const controller = new AbortController();
      this.controller = controller;
      try {
        return await call(controller.signal);
      } catch (err) {
        if (attempt >= 1 || isAbortError(err) || controller.signal.aborted || !this.isCurrent(epoch)) {
          throw err;
        }
        console.warn(`[Session ${this.pilotId}] Retrying after ${describeError(err)}`);
      } finally {
        if (this.controller === controller) this.controller = null;
      }
    }
  }

  private fail(epoch: number, reason: AbortReason, err: unknown): void {
    // Completion of a call that was cancelled by an earlier abort
    if (!this.isCurrent(epoch)) return;
    console.error(`[Session ${this.pilotId}] ${reason}: ${describeError(err)}`);
    this.abort(reason, err);
  }

  private isCurrent(epoch: number): boolean {
    return epoch === this.epoch && !this.isDead;
  }

  private enter(state: RadioSessionState, deadline: number | null): void {
    this._state = state;
    this._deadline = deadline;
  }

  private track(epoch: number, run: () => Promise<void>): void {
    const task: Promise<void> = run()
      .catch((err: unknown) => this.fail(epoch, 'composeFailed', err))
      .then(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }
}
