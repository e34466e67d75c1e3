import type { IncomingMessage, ServerResponse } from 'node:http';

import { HttpCode } from '../common/consts.js';
import { QueueFullError, RequestTimeoutError, ShutdownError, toError } from '../common/errors.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import type { ApplicationAdapter, ExchangeOutcome } from './adapter.js';
import { ConcurrencyGate } from './concurrency-gate.js';
import type { HandlingUnitSnapshot } from './handling-unit.js';
import { HandlingUnit } from './handling-unit.js';
import { safeSendJson } from './utils/send-json.js';

export interface DispatcherOptions {
  /**
   * Handling units per worker.
   */
  concurrency: number;
  /**
   * Requests allowed to wait for a unit.
   */
  backlog: number;
  requestTimeoutMs: number;
}

export interface DrainReport {
  /**
   * Exchanges that finished on their own after the drain began.
   */
  completed: number;
  /**
   * Exchanges cut off when the grace period ran out.
   */
  forced: number;
  durationMs: number;
}

export interface DispatcherSnapshot {
  concurrency: number;
  active: number;
  queued: number;
  draining: boolean;
  /**
   * Requests answered 503 because the queue was full or the worker was draining.
   */
  rejected: number;
  timedOut: number;
  units: HandlingUnitSnapshot[];
}

export interface Dispatcher {
  /**
   * Schedules one request onto a handling unit, queueing it while all are busy.
   */
  dispatch(req: IncomingMessage, res: ServerResponse): Promise<void>;
  /**
   * Stops taking work and waits up to `graceMs` for what is active or queued.
   */
  drain(graceMs: number): Promise<DrainReport>;
  isDraining(): boolean;
  getSnapshot(): DispatcherSnapshot;
}

export function createDispatcher(adapter: ApplicationAdapter, options: DispatcherOptions): Dispatcher {
  return new DispatcherImpl(adapter, options);
}

class DispatcherImpl implements Dispatcher {
  private readonly adapter: ApplicationAdapter;

  private readonly options: DispatcherOptions;

  private readonly units: HandlingUnit[] = [];

  private readonly gate: ConcurrencyGate<HandlingUnit>;

  /**
   * Exchanges that are queued or running, settled when their response is done.
   */
  private readonly inflight = new Set<Promise<void>>();

  private draining = false;

  /**
   * Shared by every pending drain() call.
   */
  private drainPromise: Promise<DrainReport> | undefined;

  private completedWhileDraining = 0;

  private rejected = 0;

  private timedOut = 0;

  constructor(adapter: ApplicationAdapter, options: DispatcherOptions) {
    this.adapter = adapter;
    this.options = options;

    for (let i = 0; i < options.concurrency; i++) {
      this.units.push(new HandlingUnit(i));
    }

    this.gate = new ConcurrencyGate(this.units, options.backlog);
  }

  dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (this.draining) {
      this.rejectRequest(res, 'Server is shutting down');
      return Promise.resolve();
    }

    const exchange = this.run(req, res).finally(() => {
      this.inflight.delete(exchange);
      if (this.draining) {
        this.completedWhileDraining += 1;
      }
    });

    this.inflight.add(exchange);
    return exchange;
  }

  drain(graceMs: number): Promise<DrainReport> {
    if (this.drainPromise === undefined) {
      this.draining = true;
      this.drainPromise = this.performDrain(graceMs);
    }

    return this.drainPromise;
  }

  isDraining(): boolean {
    return this.draining;
  }

  getSnapshot(): DispatcherSnapshot {
    return {
      concurrency: this.options.concurrency,
      active: this.gate.active,
      queued: this.gate.queued,
      draining: this.draining,
      rejected: this.rejected,
      timedOut: this.timedOut,
      units: this.units.map((unit) => unit.getSnapshot()),
    };
  }

  private async run(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const unit = await this.acquireUnit(res);
    if (unit === undefined) {
      return;
    }

    const signal = unit.begin();
    const timer = setTimeout(() => {
      this.timedOut += 1;
      unit.abort(new RequestTimeoutError(this.options.requestTimeoutMs));
    }, this.options.requestTimeoutMs);

    const onClose = (): void => {
      if (!res.writableFinished) {
        unit.abort(new Error('Client closed the connection'));
      }
    };
    res.once('close', onClose);

    let outcome: ExchangeOutcome | undefined;
    try {
      unit.transition('processing');
      outcome = await this.adapter.serve(req, res, {
        signal,
        onResponding: () => unit.transition('responding'),
      });
    } catch (error) {
      outcome = { ok: false, statusCode: res.statusCode, error: toError(error) };
      res.destroy();
    } finally {
      clearTimeout(timer);
      res.off('close', onClose);
    }

    this.settleUnit(unit, req, outcome);
  }

  /**
   * Waits for a free unit. Resolves `undefined` when the request was answered or abandoned instead.
   */
  private async acquireUnit(res: ServerResponse): Promise<HandlingUnit | undefined> {
    // the client may hang up while queued
    const abandoned = new AbortController();
    const onClose = (): void => abandoned.abort(new Error('Client closed the connection while queued'));
    res.once('close', onClose);

    try {
      return await this.gate.acquire(abandoned.signal);
    } catch (error) {
      if (error instanceof QueueFullError) {
        this.rejectRequest(res, 'Server overloaded');
      } else if (error instanceof ShutdownError) {
        this.rejectRequest(res, 'Server is shutting down');
      }

      return undefined;
    } finally {
      res.off('close', onClose);
    }
  }

  private settleUnit(unit: HandlingUnit, req: IncomingMessage, outcome: ExchangeOutcome): void {
    if (outcome.ok) {
      unit.transition('idle');
      this.gate.release(unit);
      return;
    }

    logJsonl(outcome.error instanceof RequestTimeoutError ? 'WARN' : 'ERROR', 'exchange_failed', {
      unit: unit.id,
      state: unit.state,
      method: req.method,
      url: req.url ?? null,
      statusCode: outcome.statusCode,
      error: getErrorMessage(outcome.error),
    });

    unit.reset();
    this.gate.release(unit);
  }

  private rejectRequest(res: ServerResponse, message: string): void {
    this.rejected += 1;
    safeSendJson(res, { message }, HttpCode.ServiceUnavailable, { close: true });
  }

  private async performDrain(graceMs: number): Promise<DrainReport> {
    const startedAt = Date.now();

    logJsonl('INFO', 'dispatcher_draining', {
      active: this.gate.active,
      queued: this.gate.queued,
      graceMs,
    });

    let timer: NodeJS.Timeout | undefined;
    const graceExpired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), graceMs);
    });
    const settled = this.waitForInflight().then(() => false);

    const expired = await Promise.race([settled, graceExpired]);
    clearTimeout(timer);

    let forced = 0;
    if (expired) {
      forced = this.inflight.size;
      const reason = new ShutdownError(`Grace period of ${graceMs}ms expired`);

      this.gate.rejectWaiting(reason);
      for (let i = 0; i < this.units.length; i++) {
        this.units[i].abort(reason);
      }

      await this.waitForInflight();
    }

    const report: DrainReport = {
      completed: this.completedWhileDraining - forced,
      forced,
      durationMs: Date.now() - startedAt,
    };

    logJsonl(expired ? 'WARN' : 'INFO', 'dispatcher_drained', { ...report });
    return report;
  }

  private async waitForInflight(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled(Array.from(this.inflight));
    }
  }
}
