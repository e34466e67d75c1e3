import http from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';

import { HttpCode } from '../common/consts.js';
import { formatAddress, getErrorCode } from '../common/errors.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';

import type { LoadedApplication } from './adapter.js';
import { createApplicationAdapter } from './adapter.js';
import type { ServerConfig } from './config.js';
import type { Dispatcher, DrainReport } from './dispatcher.js';
import { createDispatcher } from './dispatcher.js';
import { listenShared } from './listener.js';
import { createWorkerRouter } from './router.js';
import { getRealIp, parseRequestTarget } from './utils/request.js';

export interface WorkerServerOptions {
  slot: number;
}

export interface WorkerServer {
  readonly server: http.Server;
  readonly dispatcher: Dispatcher;
  listen(): Promise<AddressInfo>;
  /**
   * Stops accepting, lets exchanges finish for up to `graceMs`, then closes every connection.
   */
  drain(graceMs: number): Promise<DrainReport>;
}

function statusLine(statusCode: number, reason: string): string {
  const body = JSON.stringify({ message: reason });
  return (
    `HTTP/1.1 ${statusCode} ${reason}\r\n` +
    'Content-Type: application/json; charset=utf-8\r\n' +
    `Content-Length: ${Buffer.byteLength(body)}\r\n` +
    'Connection: close\r\n\r\n' +
    body
  );
}

/**
 * Node only notices an expired `headersTimeout`/`requestTimeout` on this periodic sweep.
 */
function readSweepInterval(readTimeoutMs: number): number {
  return Math.min(Math.max(Math.floor(readTimeoutMs / 4), 10), 30_000);
}

/**
 * Parser and read-timeout failures, answered before the request ever reaches the dispatcher.
 */
function handleClientError(error: Error, socket: Duplex): void {
  const code = getErrorCode(error);

  logJsonl('WARN', 'client_error', {
    code: code ?? null,
    error: getErrorMessage(error),
  });

  if (code === 'ECONNRESET' || !socket.writable) {
    socket.destroy();
    return;
  }

  let response: string;
  switch (code) {
    case 'ERR_HTTP_REQUEST_TIMEOUT':
      response = statusLine(HttpCode.RequestTimeout, 'Request Timeout');
      break;
    case 'HPE_HEADER_OVERFLOW':
      response = statusLine(HttpCode.RequestHeaderFieldsTooLarge, 'Request Header Fields Too Large');
      break;
    default:
      response = statusLine(HttpCode.BadRequest, 'Bad Request');
  }

  socket.end(response);
}

export function createWorkerServer(
  config: ServerConfig,
  app: LoadedApplication,
  options: WorkerServerOptions,
): WorkerServer {
  const dispatcher = createDispatcher(createApplicationAdapter(app), {
    concurrency: config.concurrency,
    backlog: config.backlog,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const router = createWorkerRouter({
    dispatcher,
    slot: options.slot,
    metaRoutes: config.metaRoutes,
  });

  const serverOptions: http.ServerOptions = {
    connectionsCheckingInterval: readSweepInterval(config.readTimeoutMs),
  };

  const server = http.createServer(serverOptions, (req, res) => {
    if (config.accessLog) {
      const startedAt = Date.now();

      res.once('close', () => {
        logJsonl('INFO', 'request_completed', {
          method: req.method ?? 'GET',
          path: parseRequestTarget(req.url).path,
          ip: getRealIp(req),
          statusCode: res.statusCode,
          completed: res.writableFinished,
          durationMs: Date.now() - startedAt,
        });
      });
    }

    router.lookup(req, res);
  });

  server.keepAliveTimeout = config.keepAliveTimeoutMs;
  server.headersTimeout = config.readTimeoutMs;
  server.requestTimeout = config.readTimeoutMs;
  server.on('clientError', handleClientError);

  let drainPromise: Promise<DrainReport> | undefined;

  const performDrain = async (graceMs: number): Promise<DrainReport> => {
    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    server.closeIdleConnections();

    const report = await dispatcher.drain(graceMs);

    server.closeAllConnections();
    await closed;

    log('INFO', `Worker ${options.slot} stopped listening`);
    return report;
  };

  return {
    server,
    dispatcher,

    async listen() {
      const address = await listenShared(server, {
        host: config.host,
        port: config.port,
        backlog: config.backlog,
      });

      log('INFO', `Worker ${options.slot} listening on http://${formatAddress(address.address, address.port)}`);
      return address;
    },

    drain(graceMs) {
      if (drainPromise === undefined) {
        drainPromise = performDrain(graceMs);
      }

      return drainPromise;
    },
  };
}
