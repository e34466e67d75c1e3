import cluster from 'node:cluster';
import type { Worker } from 'node:cluster';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { WORKER_PAYLOAD_ENV } from '../common/consts.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import type { ServerConfig } from '../core/config.js';
import { serializeWorkerPayload } from '../core/config.js';
import type { protocol } from './protocol.js';

/**
 * The supervisor's view of one worker process.
 */
export interface WorkerProcess {
  readonly pid: number | undefined;
  send(message: protocol.SupervisorMessage): void;
  kill(signal: NodeJS.Signals): void;
  onMessage(listener: (message: unknown) => void): void;
  /**
   * `code` is null when the process was ended by a signal.
   */
  onExit(listener: (code: number | null, signal: string | null) => void): void;
}

export interface WorkerLauncher {
  /**
   * Called once before the first launch.
   */
  prepare(config: ServerConfig): void;
  launch(slot: number, config: ServerConfig): WorkerProcess;
}

/**
 * Resolves worker entry for tsx dev and compiled js runtime.
 */
function resolveWorkerEntry(): string {
  const currentExt = path.extname(fileURLToPath(import.meta.url));
  const entryName = currentExt === '.ts' ? 'worker-entry.ts' : 'worker-entry.js';
  return fileURLToPath(new URL(`./${entryName}`, import.meta.url));
}

function hasTsxLoader(execArgv: readonly string[]): boolean {
  for (let i = 0; i < execArgv.length; i++) {
    const arg = execArgv[i];

    if ((arg === '--import' || arg === '--loader' || arg === '--require') && execArgv[i + 1]?.includes('tsx')) {
      return true;
    }

    if (/^--(import|loader|require)=.*tsx/.test(arg)) {
      return true;
    }
  }

  return false;
}

/**
 * A `.ts` worker entry can only be loaded through tsx.
 */
export function resolveExecArgv(entry: string, execArgv: readonly string[]): string[] {
  const args = [...execArgv];

  if (entry.endsWith('.ts') && !hasTsxLoader(args)) {
    args.push('--import', 'tsx');
  }

  return args;
}

class ClusterWorkerProcess implements WorkerProcess {
  private readonly worker: Worker;

  constructor(worker: Worker) {
    this.worker = worker;

    worker.on('error', (error: Error) => {
      logJsonl('WARN', 'worker_ipc_error', {
        pid: worker.process.pid,
        error: getErrorMessage(error),
      });
    });
  }

  get pid(): number | undefined {
    return this.worker.process.pid;
  }

  send(message: protocol.SupervisorMessage): void {
    if (!this.worker.isConnected()) {
      return;
    }

    this.worker.send(message, (error: Error | null) => {
      if (error !== null) {
        logJsonl('WARN', 'worker_send_failed', {
          pid: this.pid,
          type: message.type,
          error: getErrorMessage(error),
        });
      }
    });
  }

  kill(signal: NodeJS.Signals): void {
    if (this.worker.process.exitCode !== null || this.worker.process.signalCode !== null) {
      return;
    }

    this.worker.process.kill(signal);
  }

  onMessage(listener: (message: unknown) => void): void {
    this.worker.on('message', (message: unknown) => listener(message));
  }

  onExit(listener: (code: number | null, signal: string | null) => void): void {
    this.worker.on('exit', (code: number | null, signal: string | null) => {
      listener(typeof code === 'number' ? code : null, signal === '' ? null : signal);
    });
  }
}

/**
 * Forks workers with `node:cluster`, so every worker listens on the socket the primary holds.
 */
export function createClusterLauncher(): WorkerLauncher {
  return {
    prepare(config) {
      cluster.schedulingPolicy = config.schedulingPolicy === 'rr' ? cluster.SCHED_RR : cluster.SCHED_NONE;

      const exec = resolveWorkerEntry();
      cluster.setupPrimary({
        exec,
        execArgv: resolveExecArgv(exec, process.execArgv),
      });

      logJsonl('INFO', 'cluster_prepared', {
        exec,
        schedulingPolicy: config.schedulingPolicy,
      });
    },

    launch(slot, config) {
      const worker = cluster.fork({
        [WORKER_PAYLOAD_ENV]: serializeWorkerPayload({ slot, config }),
      });

      return new ClusterWorkerProcess(worker);
    },
  };
}
