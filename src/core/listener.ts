import net from 'node:net';
import type { AddressInfo } from 'node:net';

import {
  AddressInUseError,
  ListenerError,
  PermissionError,
  formatAddress,
  getErrorCode,
} from '../common/errors.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';

export interface ListenTarget {
  host: string;
  port: number;
  backlog: number;
}

/**
 * Turns a bind failure into the matching `ListenerError`.
 */
export function classifyBindError(error: unknown, host: string, port: number): ListenerError {
  if (error instanceof ListenerError) {
    return error;
  }

  switch (getErrorCode(error)) {
    case 'EADDRINUSE':
      return new AddressInUseError(host, port, error);
    case 'EACCES':
    case 'EPERM':
      return new PermissionError(host, port, error);
    case 'EADDRNOTAVAIL':
      return new ListenerError(`Address not available: ${formatAddress(host, port)}`, host, port, error);
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return new ListenerError(`Cannot resolve host "${host}"`, host, port, error);
    default:
      return new ListenerError(
        `Cannot listen on ${formatAddress(host, port)}: ${getErrorMessage(error)}`,
        host,
        port,
        error,
      );
  }
}

/**
 * Listens on `target` and settles once the bind either succeeded or failed.
 * Inside a cluster worker the primary owns the socket; the returned address is the shared one.
 */
export function listenShared(server: net.Server, target: ListenTarget): Promise<AddressInfo> {
  return new Promise<AddressInfo>((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(classifyBindError(error, target.host, target.port));
    };

    const onListening = (): void => {
      server.off('error', onError);

      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new ListenerError('Server is not bound to a TCP address', target.host, target.port));
        return;
      }

      resolve(address);
    };

    server.once('error', onError);
    server.once('listening', onListening);
    server.listen({ host: target.host, port: target.port, backlog: target.backlog });
  });
}

/**
 * Binds and releases the address once in the supervisor, so that an unusable address fails
 * the whole startup before any worker is forked.
 */
export async function probeListener(target: ListenTarget): Promise<void> {
  const probe = net.createServer();

  const address = await listenShared(probe, target);
  await new Promise<void>((resolve, reject) => {
    probe.close((error) => (error ? reject(error) : resolve()));
  });

  log('INFO', `Address ${formatAddress(address.address, address.port)} is available`);
  logJsonl('INFO', 'listener_probed', {
    host: target.host,
    port: address.port,
    backlog: target.backlog,
  });
}
