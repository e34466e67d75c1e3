import type { IncomingMessage } from 'node:http';

import { DUMMY_BASE_URL } from '../../common/consts.js';

export type QueryParams = Record<string, string | string[]>;

export interface RequestTarget {
  path: string;
  query: QueryParams;
}

export function parseQuery(searchParams: URLSearchParams): QueryParams {
  const query: QueryParams = {};

  for (const [key, value] of searchParams.entries()) {
    const existing = query[key];

    if (existing === undefined) {
      query[key] = value;
      continue;
    }

    if (Array.isArray(existing)) {
      existing.push(value);
      continue;
    }

    query[key] = [existing, value];
  }

  return query;
}

/**
 * Splits a raw request target into path and query. Targets `URL` cannot parse are kept verbatim as the path.
 */
export function parseRequestTarget(rawUrl: string | undefined): RequestTarget {
  if (rawUrl === undefined || rawUrl.length === 0) {
    return { path: '/', query: {} };
  }

  try {
    const parsedUrl = new URL(rawUrl, DUMMY_BASE_URL);
    return {
      path: parsedUrl.pathname,
      query: parseQuery(parsedUrl.searchParams),
    };
  } catch {
    return { path: rawUrl, query: {} };
  }
}

/**
 * Client address as seen through a reverse proxy: first `x-forwarded-for` hop,
 * then `x-real-ip`, then the socket peer.
 */
export function getRealIp(req: IncomingMessage): string {
  const forwardedFor = req.headersDistinct['x-forwarded-for'];
  if (forwardedFor !== undefined) {
    const firstForwarded = forwardedFor[0]?.split(',')[0]?.trim();
    if (firstForwarded !== undefined && firstForwarded.length > 0) {
      return firstForwarded;
    }
  }

  const realIp = req.headersDistinct['x-real-ip']?.[0]?.trim();
  if (realIp !== undefined && realIp.length > 0) {
    return realIp;
  }

  return req.socket.remoteAddress ?? 'unknown';
}
