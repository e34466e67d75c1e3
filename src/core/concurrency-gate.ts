import { QueueFullError, toError } from '../common/errors.js';

interface Waiter<T> {
  resolve: (resource: T) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

/**
 * Hands out a fixed set of resources (handling units) and parks callers in a bounded FIFO
 * while all of them are taken.
 */
export class ConcurrencyGate<T> {
  private readonly available: T[];

  private readonly waiting: Waiter<T>[] = [];

  private readonly size: number;

  private readonly maxQueue: number;

  constructor(resources: readonly T[], maxQueue: number) {
    this.available = [...resources];
    this.size = resources.length;
    this.maxQueue = maxQueue;
  }

  /**
   * Resolves with a free resource, immediately or once one is released.
   * Rejects with `QueueFullError` when the queue is at capacity, or with the
   * abort reason when `signal` fires while waiting.
   */
  acquire(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(toError(signal.reason));
    }

    const resource = this.available.shift();
    if (resource !== undefined) {
      return Promise.resolve(resource);
    }

    if (this.waiting.length >= this.maxQueue) {
      return Promise.reject(new QueueFullError(this.maxQueue));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiting.indexOf(waiter);
        if (index !== -1) {
          this.waiting.splice(index, 1);
        }
        reject(toError(signal?.reason));
      };

      const waiter: Waiter<T> = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiting.push(waiter);
    });
  }

  /**
   * Returns a resource; the longest-waiting caller gets it first.
   */
  release(resource: T): void {
    const waiter = this.waiting.shift();
    if (waiter === undefined) {
      this.available.push(resource);
      return;
    }

    waiter.detach();
    waiter.resolve(resource);
  }

  /**
   * Fails every parked caller, returning how many there were.
   */
  rejectWaiting(error: Error): number {
    const waiters = this.waiting.splice(0);

    for (let i = 0; i < waiters.length; i++) {
      waiters[i].detach();
      waiters[i].reject(error);
    }

    return waiters.length;
  }

  get active(): number {
    return this.size - this.available.length;
  }

  get queued(): number {
    return this.waiting.length;
  }
}
