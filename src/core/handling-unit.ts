import { HandlingUnitStateError } from '../common/errors.js';

export type HandlingUnitState = 'idle' | 'accepting' | 'processing' | 'responding' | 'failed';

const TRANSITIONS: Record<HandlingUnitState, readonly HandlingUnitState[]> = {
  idle: ['accepting'],
  accepting: ['processing', 'failed'],
  processing: ['responding', 'failed'],
  responding: ['idle', 'failed'],
  failed: ['idle'],
};

export interface HandlingUnitSnapshot {
  id: number;
  state: HandlingUnitState;
  /**
   * Epoch timestamp of the last state change.
   */
  since: number;
  handled: number;
  failed: number;
}

/**
 * One concurrent slot of a worker. Runs a single exchange at a time:
 * idle -> accepting -> processing -> responding -> idle, or -> failed -> idle.
 */
export class HandlingUnit {
  public readonly id: number;

  private current: HandlingUnitState = 'idle';

  private since = Date.now();

  private handledCount = 0;

  private failedCount = 0;

  /**
   * Cancels the exchange in flight; replaced on every `begin()`.
   */
  private controller: AbortController | undefined;

  constructor(id: number) {
    this.id = id;
  }

  get state(): HandlingUnitState {
    return this.current;
  }

  get busy(): boolean {
    return this.current !== 'idle';
  }

  /**
   * Claims the unit for a new exchange and returns the signal that cancels it.
   */
  begin(): AbortSignal {
    this.transition('accepting');
    this.controller = new AbortController();
    return this.controller.signal;
  }

  transition(next: HandlingUnitState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new HandlingUnitStateError(this.id, this.current, next);
    }

    if (next === 'idle' && this.current === 'responding') {
      this.handledCount += 1;
    }

    if (next === 'failed') {
      this.failedCount += 1;
    }

    if (next === 'idle') {
      this.controller = undefined;
    }

    this.current = next;
    this.since = Date.now();
  }

  /**
   * Cancels the exchange in flight. No-op when idle or already aborted.
   */
  abort(reason: Error): void {
    if (this.controller === undefined || this.controller.signal.aborted) {
      return;
    }

    this.controller.abort(reason);
  }

  /**
   * Brings the unit back to idle from wherever the exchange left it.
   */
  reset(): void {
    if (this.current === 'idle') {
      return;
    }

    if (this.current !== 'failed') {
      this.transition('failed');
    }

    this.transition('idle');
  }

  getSnapshot(): HandlingUnitSnapshot {
    return {
      id: this.id,
      state: this.current,
      since: this.since,
      handled: this.handledCount,
      failed: this.failedCount,
    };
  }
}
