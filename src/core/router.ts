import type http from 'node:http';

import createRouter from 'find-my-way';

import { HttpCode, META_PREFIX } from '../common/consts.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import type { Dispatcher } from './dispatcher.js';
import { safeSendJson } from './utils/send-json.js';

export interface WorkerRouterOptions {
  dispatcher: Dispatcher;
  slot: number;
  /**
   * Serve `/_forkline/healthz` and `/_forkline/status` before the application.
   */
  metaRoutes: boolean;
  /**
   * Epoch timestamp the worker started at, for `uptimeMs`.
   */
  startedAt?: number;
}

export interface WorkerRouter {
  lookup: http.RequestListener;
}

export function createWorkerRouter(options: WorkerRouterOptions): WorkerRouter {
  const { dispatcher, slot } = options;
  const startedAt = options.startedAt ?? Date.now();

  const router = createRouter({
    defaultRoute(req, res) {
      dispatcher.dispatch(req, res).catch((error: unknown) => {
        logJsonl('ERROR', 'dispatch_failed', {
          method: req.method,
          url: req.url ?? null,
          error: getErrorMessage(error),
        });

        safeSendJson(res, { message: 'Internal Server Error' }, HttpCode.InternalServerError, { close: true });
      });
    },
  });

  if (options.metaRoutes) {
    router.on('GET', `${META_PREFIX}/healthz`, (_req, res) => {
      const draining = dispatcher.isDraining();
      safeSendJson(
        res,
        { ok: !draining, worker: slot, pid: process.pid, now: Date.now() },
        draining ? HttpCode.ServiceUnavailable : HttpCode.Ok,
        { headers: { 'Cache-Control': 'no-store' } },
      );
    });

    router.on('GET', `${META_PREFIX}/status`, (_req, res) => {
      safeSendJson(
        res,
        {
          worker: slot,
          pid: process.pid,
          uptimeMs: Date.now() - startedAt,
          dispatcher: dispatcher.getSnapshot(),
        },
        HttpCode.Ok,
        { headers: { 'Cache-Control': 'no-store' } },
      );
    });
  }

  return {
    lookup(req, res) {
      router.lookup(req, res);
    },
  };
}
