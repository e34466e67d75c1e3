import type { IncomingHttpHeaders, IncomingMessage, OutgoingHttpHeader, ServerResponse } from 'node:http';
import { Readable } from 'node:stream';
import { finished, pipeline } from 'node:stream/promises';

import { HttpCode } from '../common/consts.js';
import { RequestTimeoutError, ShutdownError, toError } from '../common/errors.js';
import type { QueryParams } from './utils/request.js';
import { getRealIp, parseRequestTarget } from './utils/request.js';
import { safeSendJson } from './utils/send-json.js';

/**
 * Normalized request handed to the application.
 */
export interface AppRequest {
  method: string;
  /**
   * Raw request target, path and query string.
   */
  url: string;
  path: string;
  query: QueryParams;
  headers: IncomingHttpHeaders;
  /**
   * Socket peer address.
   */
  remoteAddress: string;
  /**
   * Client address honoring `x-forwarded-for` and `x-real-ip`.
   */
  ip: string;
  /**
   * Request body, read lazily.
   */
  body: Readable;
  /**
   * Aborted when the exchange times out, the client goes away or the worker is forced down.
   */
  signal: AbortSignal;
}

export type BodyChunk = string | Uint8Array;

export type AppBody = BodyChunk | Iterable<BodyChunk> | AsyncIterable<BodyChunk>;

export interface AppResponse {
  /**
   * Defaults to 200.
   */
  status?: number;
  headers?: Record<string, OutgoingHttpHeader>;
  body?: AppBody | null;
}

/**
 * The application boundary: one method, called once per request.
 */
export interface Application {
  handle(request: AppRequest): AppResponse | Promise<AppResponse>;
}

/**
 * What the loader can promise about a user module. Its results are validated per response.
 */
export interface LoadedApplication {
  handle(request: AppRequest): unknown;
}

type ResponseBody =
  | { kind: 'empty' }
  | { kind: 'buffer'; data: BodyChunk }
  | { kind: 'stream'; source: Iterable<unknown> | AsyncIterable<unknown> };

export interface NormalizedResponse {
  status: number;
  headers: Array<[string, OutgoingHttpHeader]>;
  body: ResponseBody;
}

export interface ServeOptions {
  signal: AbortSignal;
  /**
   * Called once the application returned a valid response, right before writing starts.
   */
  onResponding?: () => void;
}

export interface ExchangeOutcome {
  ok: boolean;
  statusCode: number;
  error?: Error;
}

export interface ApplicationAdapter {
  /**
   * Runs one exchange end to end. Never rejects: failures are answered on `res` and reported in the outcome.
   */
  serve(req: IncomingMessage, res: ServerResponse, options: ServeOptions): Promise<ExchangeOutcome>;
}

export function createApplicationAdapter(app: LoadedApplication): ApplicationAdapter {
  return {
    async serve(req, res, { signal, onResponding }) {
      try {
        const request = createAppRequest(req, signal);
        const result = await raceSignal(invoke(app, request), signal);
        const response = normalizeAppResponse(result);

        onResponding?.();
        await writeResponse(res, response, signal);

        return { ok: true, statusCode: res.statusCode };
      } catch (error) {
        return failExchange(res, signal.aborted ? toError(signal.reason) : toError(error));
      }
    },
  };
}

export function createAppRequest(req: IncomingMessage, signal: AbortSignal): AppRequest {
  const url = req.url ?? '/';
  const target = parseRequestTarget(url);

  return {
    method: req.method ?? 'GET',
    url,
    path: target.path,
    query: target.query,
    headers: req.headers,
    remoteAddress: req.socket.remoteAddress ?? '',
    ip: getRealIp(req),
    body: req,
    signal,
  };
}

function invoke(app: LoadedApplication, request: AppRequest): Promise<unknown> {
  // a synchronous throw becomes a rejection
  return Promise.resolve().then(() => app.handle(request));
}

function raceSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(toError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(error));
      },
    );
  });
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  return typeof value;
}

function isHeaderValue(value: unknown): value is OutgoingHttpHeader {
  if (typeof value === 'string' || typeof value === 'number') {
    return true;
  }

  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

function isAsyncIterable(value: object): value is AsyncIterable<unknown> {
  return Symbol.asyncIterator in value && typeof value[Symbol.asyncIterator] === 'function';
}

function normalizeBody(body: unknown): ResponseBody {
  if (body === undefined || body === null) {
    return { kind: 'empty' };
  }

  if (typeof body === 'string' || body instanceof Uint8Array) {
    return { kind: 'buffer', data: body };
  }

  if (typeof body === 'object' && (isAsyncIterable(body) || isIterable(body))) {
    return { kind: 'stream', source: body };
  }

  throw new TypeError(`Invalid response body: expected string, Uint8Array or iterable, got ${describeValue(body)}`);
}

/**
 * Validates whatever the application returned. Throws `TypeError` on a malformed response.
 */
export function normalizeAppResponse(value: unknown): NormalizedResponse {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new TypeError(`Invalid application response: expected an object, got ${describeValue(value)}`);
  }

  let status: number = HttpCode.Ok;
  if ('status' in value && value.status !== undefined) {
    if (typeof value.status !== 'number' || !Number.isInteger(value.status) || value.status < 100 || value.status > 599) {
      throw new TypeError(`Invalid response status: ${String(value.status)}`);
    }
    status = value.status;
  }

  const headers: Array<[string, OutgoingHttpHeader]> = [];
  const rawHeaders = 'headers' in value ? value.headers : undefined;

  if (rawHeaders !== undefined) {
    if (typeof rawHeaders !== 'object' || rawHeaders === null || Array.isArray(rawHeaders)) {
      throw new TypeError(`Invalid response headers: expected an object, got ${describeValue(rawHeaders)}`);
    }

    for (const [name, headerValue] of Object.entries(rawHeaders)) {
      if (!isHeaderValue(headerValue)) {
        throw new TypeError(`Invalid value for response header "${name}"`);
      }
      headers.push([name, headerValue]);
    }
  }

  return {
    status,
    headers,
    body: normalizeBody('body' in value ? value.body : undefined),
  };
}

async function* checkedChunks(source: Iterable<unknown> | AsyncIterable<unknown>): AsyncGenerator<BodyChunk> {
  for await (const chunk of source) {
    if (typeof chunk !== 'string' && !(chunk instanceof Uint8Array)) {
      throw new TypeError(`Invalid response body chunk: expected string or Uint8Array, got ${describeValue(chunk)}`);
    }

    yield chunk;
  }
}

async function* prependChunk(first: BodyChunk, rest: AsyncIterator<BodyChunk>): AsyncGenerator<BodyChunk> {
  yield first;

  for (let next = await rest.next(); next.done !== true; next = await rest.next()) {
    yield next.value;
  }
}

function writeHead(res: ServerResponse, response: NormalizedResponse): void {
  res.statusCode = response.status;
  for (let i = 0; i < response.headers.length; i++) {
    const [name, value] = response.headers[i];
    res.setHeader(name, value);
  }
}

async function writeResponse(res: ServerResponse, response: NormalizedResponse, signal: AbortSignal): Promise<void> {
  const body = response.body;

  if (body.kind === 'stream') {
    // pulled before the head so a failing source still leaves room for a 500
    const chunks = checkedChunks(body.source);
    const first = await raceSignal(chunks.next(), signal);

    writeHead(res, response);
    if (first.done === true) {
      res.end();
      await finished(res, { signal });
      return;
    }

    await pipeline(Readable.from(prependChunk(first.value, chunks)), res, { signal });
    return;
  }

  writeHead(res, response);
  if (body.kind === 'buffer') {
    if (!res.hasHeader('content-length')) {
      res.setHeader('Content-Length', Buffer.byteLength(body.data));
    }
    res.end(body.data);
  } else {
    res.end();
  }

  await finished(res, { signal });
}

function failExchange(res: ServerResponse, error: Error): ExchangeOutcome {
  if (error instanceof ShutdownError || res.headersSent || res.writableEnded) {
    res.destroy();
    return { ok: false, statusCode: res.statusCode, error };
  }

  for (const name of res.getHeaderNames()) {
    res.removeHeader(name);
  }

  const timedOut = error instanceof RequestTimeoutError;
  const statusCode = timedOut ? HttpCode.GatewayTimeout : HttpCode.InternalServerError;
  const sent = safeSendJson(res, { message: timedOut ? 'Gateway Timeout' : 'Internal Server Error' }, statusCode, {
    close: true,
  });

  return { ok: false, statusCode: sent ? statusCode : res.statusCode, error };
}
