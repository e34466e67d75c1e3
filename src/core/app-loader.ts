import { pathToFileURL } from 'node:url';

import { ApplicationLoadError } from '../common/errors.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import type { AppRequest, LoadedApplication } from './adapter.js';
import type { AppReference } from './config.js';

function describeCandidate(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Accepts a bare handler function or an object exposing `handle`.
 */
export function toApplication(candidate: unknown, label: string): LoadedApplication {
  if (typeof candidate === 'function') {
    const handler = candidate;
    return {
      handle: (request: AppRequest): unknown => Reflect.apply(handler, undefined, [request]),
    };
  }

  if (typeof candidate === 'object' && candidate !== null && 'handle' in candidate) {
    const handle = candidate.handle;
    if (typeof handle === 'function') {
      return {
        handle: (request: AppRequest): unknown => Reflect.apply(handle, candidate, [request]),
      };
    }
  }

  throw new ApplicationLoadError(
    `${label} must be a function or an object with a handle() method, got ${describeCandidate(candidate)}`,
  );
}

/**
 * Imports the application module and picks the referenced export.
 */
export async function loadApplication(ref: AppReference): Promise<LoadedApplication> {
  const label = `${ref.modulePath}:${ref.exportName}`;

  let namespace: unknown;
  try {
    namespace = await import(pathToFileURL(ref.modulePath).href);
  } catch (error) {
    throw new ApplicationLoadError(`Cannot import ${ref.modulePath}: ${getErrorMessage(error)}`, error);
  }

  if (typeof namespace !== 'object' || namespace === null || !Reflect.has(namespace, ref.exportName)) {
    throw new ApplicationLoadError(`Module ${ref.modulePath} has no export named "${ref.exportName}"`);
  }

  const candidate: unknown = Reflect.get(namespace, ref.exportName);
  const app = toApplication(candidate, label);

  logJsonl('INFO', 'application_loaded', {
    module: ref.modulePath,
    export: ref.exportName,
  });

  return app;
}
