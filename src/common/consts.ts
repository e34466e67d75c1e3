export const DUMMY_BASE_URL = 'http://forkline.local';
export const META_PREFIX = '/_forkline';

/**
 * Environment variable carrying the serialized worker payload from supervisor to forked worker.
 */
export const WORKER_PAYLOAD_ENV = 'FORKLINE_WORKER_PAYLOAD';

/**
 * Extra time the supervisor grants a draining worker before SIGKILL.
 */
export const KILL_MARGIN_MS = 2000;

export const enum HttpCode {
  Ok = 200,
  BadRequest = 400,
  RequestTimeout = 408,
  RequestHeaderFieldsTooLarge = 431,
  InternalServerError = 500,
  ServiceUnavailable = 503,
  GatewayTimeout = 504,
}

export const enum ExitCode {
  Ok = 0,
  StartupFailure = 1,
  RestartCapExceeded = 2,
  ForcedShutdown = 3,
}
