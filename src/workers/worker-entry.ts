import type { LoadedApplication } from '../core/adapter.js';
import { loadApplication } from '../core/app-loader.js';
import { readWorkerPayload } from '../core/config.js';
import { createWorkerServer } from '../core/server.js';
import type { WorkerServer } from '../core/server.js';
import { formatAddress } from '../common/errors.js';
import { getErrorMessage, log, logJsonl, setLogContext } from '../common/logger.js';

import { isSupervisorMessage, serializeError } from './messages.js';
import type { protocol } from './protocol.js';

/**
 * Resolves once the message is handed to the IPC channel, or right away without one.
 */
function sendToSupervisor(message: protocol.WorkerMessage): Promise<void> {
  return new Promise((resolve) => {
    if (process.send === undefined || !process.connected) {
      resolve();
      return;
    }

    process.send(message, undefined, {}, (error: Error | null) => {
      if (error !== null) {
        logJsonl('WARN', 'supervisor_send_failed', {
          type: message.type,
          error: getErrorMessage(error),
        });
      }
      resolve();
    });
  });
}

async function main(): Promise<void> {
  const { slot, config } = readWorkerPayload(process.env);
  setLogContext({ role: 'worker', worker: slot });

  let runtime: WorkerServer | undefined;
  let stopping = false;

  const shutdown = async (graceMs: number, reason: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;

    logJsonl('INFO', 'worker_shutdown_requested', { reason, graceMs });

    // nothing to drain yet
    if (runtime === undefined) {
      process.exit(0);
    }

    const report = await runtime.drain(graceMs);
    await sendToSupervisor({ type: 'drained', completed: report.completed, forced: report.forced });

    process.exit(0);
  };

  const requestShutdown = (graceMs: number, reason: string): void => {
    shutdown(graceMs, reason).catch((error: unknown) => {
      logJsonl('ERROR', 'worker_shutdown_failed', { error: getErrorMessage(error) });
      process.exit(1);
    });
  };

  process.on('message', (message: unknown) => {
    if (isSupervisorMessage(message)) {
      requestShutdown(message.graceMs, 'supervisor');
    }
  });

  // the terminal delivers Ctrl-C to the whole process group; the supervisor's shutdown follows
  process.on('SIGINT', () => requestShutdown(config.gracefulTimeoutMs, 'SIGINT'));
  process.on('SIGTERM', () => requestShutdown(config.gracefulTimeoutMs, 'SIGTERM'));
  process.on('disconnect', () => requestShutdown(config.gracefulTimeoutMs, 'supervisor_disconnected'));

  let app: LoadedApplication;
  try {
    app = await loadApplication(config.app);
  } catch (error) {
    logJsonl('ERROR', 'worker_boot_failed', { stage: 'load', error: getErrorMessage(error) });
    await sendToSupervisor({ type: 'boot_failed', stage: 'load', error: serializeError(error) });
    process.exit(1);
  }

  if (stopping) {
    process.exit(0);
  }

  const server = createWorkerServer(config, app, { slot });

  try {
    const address = await server.listen();
    runtime = server;

    logJsonl('INFO', 'worker_ready', {
      address: address.address,
      port: address.port,
      concurrency: config.concurrency,
    });
    await sendToSupervisor({ type: 'ready', port: address.port, address: address.address });

    log('INFO', `Serving on ${formatAddress(address.address, address.port)}`);
  } catch (error) {
    logJsonl('ERROR', 'worker_boot_failed', { stage: 'listen', error: getErrorMessage(error) });
    await sendToSupervisor({ type: 'boot_failed', stage: 'listen', error: serializeError(error) });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logJsonl('ERROR', 'worker_crashed', { error: getErrorMessage(error) });
  process.exit(1);
});
