/**
 * Per-channel transmit lock.
 *
 * One controller transmission per frequency at a time. The channel also
 * counts as busy while any pilot is keyed on it, so a reply never steps on a
 * live transmission. Waiters are granted strictly in arrival order.
 */

export interface ChannelTicket {
  readonly id: number;
  readonly frequency: number;
  readonly owner: string;
  /** Resolves when the lock is granted to this ticket */
  readonly granted: Promise<void>;
}

interface Waiter {
  ticket: ChannelTicket;
  grant: () => void;
}

interface ChannelState {
  holder: ChannelTicket | null;
  keyed: Set<string>;
  waiters: Waiter[];
}

export class ChannelLock {
  private channels = new Map<number, ChannelState>();
  private nextId = 1;

  private channel(frequency: number): ChannelState {
    let state = this.channels.get(frequency);
    if (!state) {
      state = { holder: null, keyed: new Set(), waiters: [] };
      this.channels.set(frequency, state);
    }
    return state;
  }

  /** Queue for the lock. The ticket's promise resolves once it is this owner's turn. */
  acquire(frequency: number, owner: string): ChannelTicket {
    const state = this.channel(frequency);
    let grant: () => void = () => {};
    const granted = new Promise<void>(resolve => {
      grant = resolve;
    });
    const ticket: ChannelTicket = { id: this.nextId++, frequency, owner, granted };
    state.waiters.push({ ticket, grant });
    this.pump(frequency);
    return ticket;
  }

  /**
   * Withdraw a ticket: drops it from the queue if still waiting, releases the
   * lock if it was granted. Safe to call more than once.
   */
  cancel(ticket: ChannelTicket): void {
    const state = this.channels.get(ticket.frequency);
    if (!state) return;
    if (state.holder?.id === ticket.id) {
      state.holder = null;
      this.pump(ticket.frequency);
      return;
    }
    state.waiters = state.waiters.filter(w => w.ticket.id !== ticket.id);
  }

  /** Release the lock held by this ticket. No-op if it does not hold it. */
  release(ticket: ChannelTicket): void {
    const state = this.channels.get(ticket.frequency);
    if (!state || state.holder?.id !== ticket.id) return;
    state.holder = null;
    this.pump(ticket.frequency);
  }

  /** A pilot keyed up on this channel */
  markKeyed(frequency: number, pilotId: string): void {
    this.channel(frequency).keyed.add(pilotId);
  }

  /** A pilot released the key (or dropped off) */
  clearKeyed(frequency: number, pilotId: string): void {
    const state = this.channels.get(frequency);
    if (!state || !state.keyed.delete(pilotId)) return;
    this.pump(frequency);
  }

  /** Forget every keyed pilot, e.g. after the radio network dropped */
  clearAllKeyed(frequency: number): void {
    const state = this.channels.get(frequency);
    if (!state || state.keyed.size === 0) return;
    state.keyed.clear();
    this.pump(frequency);
  }

  isBusy(frequency: number): boolean {
    const state = this.channels.get(frequency);
    return !!state && (state.holder !== null || state.keyed.size > 0);
  }

  /** Owner currently holding the lock, if any */
  holder(frequency: number): string | null {
    return this.channels.get(frequency)?.holder?.owner ?? null;
  }

  /** Number of tickets still waiting */
  queueLength(frequency: number): number {
    return this.channels.get(frequency)?.waiters.length ?? 0;
  }

  private pump(frequency: number): void {
    const state = this.channels.get(frequency);
    if (!state || state.holder !== null || state.keyed.size > 0) return;
    const next = state.waiters.shift();
    if (!next) return;
    state.holder = next.ticket;
    next.grant();
  }
}
