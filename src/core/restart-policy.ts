export interface RestartPolicyOptions {
  /**
   * Restarts tolerated inside one window. Zero makes every crash fatal.
   */
  maxRestarts: number;
  windowMs: number;
  /**
   * Delay before the first restart in a window; doubles for each further one.
   */
  backoffMs: number;
  maxBackoffMs: number;
}

export type RestartDecision =
  | { allowed: true; delayMs: number; recentRestarts: number }
  | { allowed: false; recentRestarts: number };

/**
 * Sliding-window crash accounting shared by all worker slots of one supervisor.
 */
export class RestartPolicy {
  private readonly options: RestartPolicyOptions;

  /**
   * Timestamps of granted restarts, oldest first.
   */
  private readonly history: number[] = [];

  constructor(options: RestartPolicyOptions) {
    this.options = options;
  }

  /**
   * Records a crash and decides whether the crashed worker may be replaced, and after how long.
   */
  recordCrash(now: number = Date.now()): RestartDecision {
    this.prune(now);

    if (this.history.length >= this.options.maxRestarts) {
      return { allowed: false, recentRestarts: this.history.length };
    }

    this.history.push(now);
    const recentRestarts = this.history.length;

    return {
      allowed: true,
      delayMs: this.computeDelay(recentRestarts),
      recentRestarts,
    };
  }

  recentRestarts(now: number = Date.now()): number {
    this.prune(now);
    return this.history.length;
  }

  private computeDelay(attempt: number): number {
    const exponential = this.options.backoffMs * 2 ** (attempt - 1);
    return Math.min(exponential, this.options.maxBackoffMs);
  }

  private prune(now: number): void {
    const windowStart = now - this.options.windowMs;
    while (this.history.length > 0 && this.history[0] <= windowStart) {
      this.history.shift();
    }
  }
}
