import type { ServerResponse } from 'node:http';

import { HttpCode } from '../../common/consts.js';

export interface SendJsonOptions {
  /**
   * Ask the client not to reuse the connection.
   */
  close?: boolean;
  headers?: Record<string, string>;
}

export function sendJson(
  res: ServerResponse,
  payload: unknown,
  statusCode: HttpCode = HttpCode.Ok,
  options: SendJsonOptions = {},
): void {
  const body = JSON.stringify(payload);

  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.setHeader('Content-Length', Buffer.byteLength(body));

  if (options.headers !== undefined) {
    for (const [name, value] of Object.entries(options.headers)) {
      res.setHeader(name, value);
    }
  }

  if (options.close === true) {
    res.setHeader('Connection', 'close');
  }

  res.end(body);
}

/**
 * Like `sendJson`, but tolerates a response that already started: a finished one is left alone
 * and one with headers on the wire is cut off, since its status can no longer change.
 * Returns whether the payload was sent.
 */
export function safeSendJson(
  res: ServerResponse,
  payload: unknown,
  statusCode: HttpCode = HttpCode.Ok,
  options: SendJsonOptions = {},
): boolean {
  if (res.writableEnded || res.destroyed) {
    return false;
  }

  if (res.headersSent) {
    res.destroy();
    return false;
  }

  sendJson(res, payload, statusCode, options);
  return true;
}
