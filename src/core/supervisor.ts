import { ExitCode, KILL_MARGIN_MS } from '../common/consts.js';
import { RestartCapExceededError, WorkerBootError, formatAddress, toError } from '../common/errors.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';
import type { WorkerLauncher, WorkerProcess } from '../workers/launcher.js';
import { createClusterLauncher } from '../workers/launcher.js';
import { isWorkerMessage } from '../workers/messages.js';
import type { protocol } from '../workers/protocol.js';

import type { ServerConfig } from './config.js';
import type { ListenTarget } from './listener.js';
import { probeListener } from './listener.js';
import { RestartPolicy } from './restart-policy.js';

export type SupervisorState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

export type WorkerState = 'starting' | 'ready' | 'draining';

export interface WorkerHandle {
  /**
   * Stable position in the pool, kept by replacement workers.
   */
  slot: number;
  pid: number | undefined;
  /**
   * Epoch timestamp of the fork.
   */
  startedAt: number;
  /**
   * How many workers this slot has lost so far.
   */
  restartCount: number;
  state: WorkerState;
}

export interface SupervisorExit {
  code: ExitCode;
  reason: string;
  error?: Error;
}

export interface SupervisorSnapshot {
  state: SupervisorState;
  workers: WorkerHandle[];
  /**
   * Slots waiting for their restart backoff.
   */
  pendingRestarts: number[];
  /**
   * Restarts inside the current window.
   */
  recentRestarts: number;
  totalRestarts: number;
}

export interface SupervisorOptions {
  launcher?: WorkerLauncher;
  /**
   * Checks the address before any fork. Defaults to binding it once.
   */
  probe?: (target: ListenTarget) => Promise<void>;
}

export interface Supervisor {
  /**
   * Resolves once every worker reported ready, or once a stop was requested before that.
   * Rejects when startup fails; the supervisor then stops with `ExitCode.StartupFailure`.
   */
  start(): Promise<void>;
  /**
   * Drains every worker. Repeated calls share one result.
   */
  stop(reason?: string): Promise<SupervisorExit>;
  /**
   * Kills every worker at once.
   */
  forceStop(reason?: string): void;
  wait(): Promise<SupervisorExit>;
  getSnapshot(): SupervisorSnapshot;
}

export function createSupervisor(config: ServerConfig, options: SupervisorOptions = {}): Supervisor {
  return new SupervisorImpl(config, options.launcher ?? createClusterLauncher(), options.probe ?? probeListener);
}

interface LiveWorker {
  handle: WorkerHandle;
  process: WorkerProcess;
  /**
   * Reason reported by the worker before it exited, if any.
   */
  bootError?: WorkerBootError;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

function describeExit(code: number | null, signal: string | null): string {
  return signal !== null ? `signal ${signal}` : `code ${code ?? 'unknown'}`;
}

class SupervisorImpl implements Supervisor {
  private readonly config: ServerConfig;

  private readonly launcher: WorkerLauncher;

  private readonly probe: (target: ListenTarget) => Promise<void>;

  private readonly policy: RestartPolicy;

  /**
   * Live-worker registry, keyed by slot. Only `spawn` and `reap` touch it.
   */
  private readonly workers = new Map<number, LiveWorker>();

  /**
   * Backoff timers of slots waiting to be respawned.
   */
  private readonly restartTimers = new Map<number, NodeJS.Timeout>();

  private state: SupervisorState = 'idle';

  private readonly startup = createDeferred<void>();

  private readonly exit = createDeferred<SupervisorExit>();

  /**
   * Outcome decided by whatever started the stop; reported once the last worker is gone.
   */
  private outcome: SupervisorExit | undefined;

  /**
   * SIGKILL backstop armed by the stop.
   */
  private killTimer: NodeJS.Timeout | undefined;

  private totalRestarts = 0;

  constructor(config: ServerConfig, launcher: WorkerLauncher, probe: (target: ListenTarget) => Promise<void>) {
    this.config = config;
    this.launcher = launcher;
    this.probe = probe;
    this.policy = new RestartPolicy({
      maxRestarts: config.maxRestarts,
      windowMs: config.restartWindowMs,
      backoffMs: config.restartBackoffMs,
      maxBackoffMs: config.maxRestartBackoffMs,
    });
  }

  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Supervisor cannot start from state "${this.state}"`);
    }

    this.state = 'starting';
    const { host, port, backlog, workers } = this.config;

    log('INFO', `Starting ${workers} worker(s) on http://${formatAddress(host, port)}`);
    logJsonl('INFO', 'supervisor_starting', {
      host,
      port,
      workers,
      concurrency: this.config.concurrency,
      schedulingPolicy: this.config.schedulingPolicy,
    });

    if (port !== 0) {
      try {
        await this.probe({ host, port, backlog });
      } catch (error) {
        this.abortStartup(toError(error));
        return this.startup.promise;
      }
    }

    if (this.state !== 'starting') {
      return this.startup.promise;
    }

    try {
      this.launcher.prepare(this.config);

      for (let slot = 0; slot < workers && this.state === 'starting'; slot++) {
        this.spawn(slot, 0);
      }
    } catch (error) {
      this.abortStartup(toError(error));
    }

    return this.startup.promise;
  }

  stop(reason = 'shutdown_requested'): Promise<SupervisorExit> {
    if (this.state === 'stopping' || this.state === 'stopped') {
      return this.exit.promise;
    }

    return this.beginStop({ code: ExitCode.Ok, reason });
  }

  forceStop(reason = 'forced_shutdown'): void {
    if (this.state === 'stopped') {
      return;
    }

    if (this.outcome === undefined || this.outcome.code === ExitCode.Ok) {
      this.outcome = { code: ExitCode.ForcedShutdown, reason };
    }

    logJsonl('WARN', 'supervisor_force_stop', { reason, workers: this.workers.size });

    if (this.state !== 'stopping') {
      void this.beginStop(this.outcome);
    }

    this.killAll('SIGKILL');
  }

  wait(): Promise<SupervisorExit> {
    return this.exit.promise;
  }

  getSnapshot(): SupervisorSnapshot {
    const workers = Array.from(this.workers.values())
      .map((live) => ({ ...live.handle }))
      .sort((left, right) => left.slot - right.slot);

    return {
      state: this.state,
      workers,
      pendingRestarts: Array.from(this.restartTimers.keys()).sort((left, right) => left - right),
      recentRestarts: this.policy.recentRestarts(),
      totalRestarts: this.totalRestarts,
    };
  }

  /**
   * Forks the worker for `slot` and wires its lifecycle events.
   */
  private spawn(slot: number, restartCount: number): void {
    const child = this.launcher.launch(slot, this.config);
    const live: LiveWorker = {
      handle: {
        slot,
        pid: child.pid,
        startedAt: Date.now(),
        restartCount,
        state: 'starting',
      },
      process: child,
    };

    this.workers.set(slot, live);
    child.onMessage((message) => this.handleMessage(live, message));
    child.onExit((code, signal) => this.reap(live, code, signal));

    logJsonl('INFO', 'worker_spawned', { slot, workerPid: child.pid, restartCount });
  }

  /**
   * Drops an exited worker from the registry and decides what its exit means.
   */
  private reap(live: LiveWorker, code: number | null, signal: string | null): void {
    const { slot } = live.handle;
    if (this.workers.get(slot) !== live) {
      return;
    }

    this.workers.delete(slot);

    logJsonl(this.state === 'running' ? 'WARN' : 'INFO', 'worker_exited', {
      slot,
      workerPid: live.handle.pid,
      code,
      signal,
      state: live.handle.state,
    });

    switch (this.state) {
      case 'starting':
        this.abortStartup(
          live.bootError ?? new WorkerBootError(slot, `Worker ${slot} exited (${describeExit(code, signal)}) before it was ready`),
        );
        break;
      case 'running':
        this.restart(live.handle);
        break;
      case 'stopping':
        if (this.workers.size === 0) {
          this.finishStop();
        }
        break;
      default:
        break;
    }
  }

  /**
   * Schedules a replacement for the worker that held `previous.slot`, unless the crash budget is spent.
   */
  private restart(previous: WorkerHandle): void {
    const { slot } = previous;
    const decision = this.policy.recordCrash();

    if (!decision.allowed) {
      const error = new RestartCapExceededError(this.config.maxRestarts, this.config.restartWindowMs);
      logJsonl('ERROR', 'restart_cap_exceeded', {
        slot,
        recentRestarts: decision.recentRestarts,
        maxRestarts: this.config.maxRestarts,
        windowMs: this.config.restartWindowMs,
      });

      void this.beginStop({ code: ExitCode.RestartCapExceeded, reason: 'restart_cap_exceeded', error });
      return;
    }

    this.totalRestarts += 1;
    logJsonl('WARN', 'worker_restart_scheduled', {
      slot,
      delayMs: decision.delayMs,
      recentRestarts: decision.recentRestarts,
    });

    const timer = setTimeout(() => {
      this.restartTimers.delete(slot);
      if (this.state !== 'running') {
        return;
      }

      try {
        this.spawn(slot, previous.restartCount + 1);
      } catch (error) {
        logJsonl('ERROR', 'worker_spawn_failed', { slot, error: getErrorMessage(error) });
        this.restart(previous);
      }
    }, decision.delayMs);

    this.restartTimers.set(slot, timer);
  }

  private handleMessage(live: LiveWorker, message: unknown): void {
    if (!isWorkerMessage(message)) {
      return;
    }

    switch (message.type) {
      case 'ready':
        this.markReady(live, message);
        break;
      case 'boot_failed':
        live.bootError = new WorkerBootError(
          live.handle.slot,
          `Worker ${live.handle.slot} failed to ${message.stage === 'load' ? 'load the application' : 'listen'}: ${message.error.message}`,
        );
        logJsonl('ERROR', 'worker_boot_failed', {
          slot: live.handle.slot,
          stage: message.stage,
          code: message.error.code ?? null,
          error: message.error.message,
        });
        if (this.state === 'starting') {
          this.abortStartup(live.bootError);
        }
        break;
      case 'drained':
        logJsonl('INFO', 'worker_drained', {
          slot: live.handle.slot,
          completed: message.completed,
          forced: message.forced,
        });
        break;
    }
  }

  private markReady(live: LiveWorker, message: protocol.ReadyMessage): void {
    if (live.handle.state === 'starting') {
      live.handle.state = 'ready';
    }

    logJsonl('INFO', 'worker_ready', {
      slot: live.handle.slot,
      workerPid: live.handle.pid,
      address: message.address,
      port: message.port,
      restartCount: live.handle.restartCount,
    });

    if (this.state !== 'starting') {
      return;
    }

    for (const worker of this.workers.values()) {
      if (worker.handle.state !== 'ready') {
        return;
      }
    }

    if (this.workers.size < this.config.workers) {
      return;
    }

    this.state = 'running';
    log('INFO', `All ${this.config.workers} worker(s) ready on port ${message.port}`);
    logJsonl('INFO', 'supervisor_running', { workers: this.workers.size, port: message.port });
    this.startup.resolve();
  }

  private abortStartup(error: Error): void {
    if (this.state !== 'starting') {
      return;
    }

    logJsonl('ERROR', 'startup_failed', { error: getErrorMessage(error) });
    this.startup.reject(error);
    void this.beginStop({ code: ExitCode.StartupFailure, reason: 'startup_failed', error });
  }

  private beginStop(outcome: SupervisorExit): Promise<SupervisorExit> {
    const wasStarting = this.state === 'starting';

    if (this.outcome === undefined) {
      this.outcome = outcome;
    }
    this.state = 'stopping';

    for (const timer of this.restartTimers.values()) {
      clearTimeout(timer);
    }
    this.restartTimers.clear();

    // start() settles on a stop that came before every worker was ready
    if (wasStarting) {
      this.startup.resolve();
    }

    logJsonl('INFO', 'supervisor_stopping', {
      reason: this.outcome.reason,
      workers: this.workers.size,
      graceMs: this.config.gracefulTimeoutMs,
    });

    if (this.workers.size === 0) {
      this.finishStop();
      return this.exit.promise;
    }

    for (const live of this.workers.values()) {
      live.handle.state = 'draining';
      live.process.send({ type: 'shutdown', graceMs: this.config.gracefulTimeoutMs });
    }

    this.killTimer = setTimeout(() => {
      logJsonl('WARN', 'shutdown_backstop_fired', { workers: this.workers.size });
      this.killAll('SIGKILL');
    }, this.config.gracefulTimeoutMs + KILL_MARGIN_MS);

    return this.exit.promise;
  }

  private killAll(signal: NodeJS.Signals): void {
    for (const live of this.workers.values()) {
      live.process.kill(signal);
    }
  }

  private finishStop(): void {
    if (this.state === 'stopped') {
      return;
    }

    clearTimeout(this.killTimer);
    this.killTimer = undefined;
    this.state = 'stopped';

    const outcome = this.outcome ?? { code: ExitCode.Ok, reason: 'stopped' };

    log(outcome.code === ExitCode.Ok ? 'INFO' : 'WARN', `Supervisor stopped (${outcome.reason}), exit code ${outcome.code}`);
    logJsonl('INFO', 'supervisor_stopped', { code: outcome.code, reason: outcome.reason });
    this.exit.resolve(outcome);
  }
}
