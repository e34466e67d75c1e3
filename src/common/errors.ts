export type ForklineErrorCode =
  | 'CONFIG_INVALID'
  | 'LISTEN_FAILED'
  | 'ADDRESS_IN_USE'
  | 'PERMISSION_DENIED'
  | 'APP_LOAD_FAILED'
  | 'WORKER_BOOT_FAILED'
  | 'RESTART_CAP_EXCEEDED'
  | 'REQUEST_TIMEOUT'
  | 'QUEUE_FULL'
  | 'SHUTDOWN'
  | 'UNIT_STATE';

/**
 * Base class of every error the runtime raises on purpose.
 */
export class ForklineError extends Error {
  public readonly code: ForklineErrorCode;

  constructor(code: ForklineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ForklineError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function formatAddress(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

export class ListenerError extends ForklineError {
  public readonly host: string;
  public readonly port: number;

  constructor(message: string, host: string, port: number, cause?: unknown, code: ForklineErrorCode = 'LISTEN_FAILED') {
    super(code, message, { cause });
    this.host = host;
    this.port = port;
  }
}

export class AddressInUseError extends ListenerError {
  constructor(host: string, port: number, cause?: unknown) {
    super(`Address already in use: ${formatAddress(host, port)}`, host, port, cause, 'ADDRESS_IN_USE');
  }
}

export class PermissionError extends ListenerError {
  constructor(host: string, port: number, cause?: unknown) {
    super(`Permission denied binding ${formatAddress(host, port)}`, host, port, cause, 'PERMISSION_DENIED');
  }
}

export class ApplicationLoadError extends ForklineError {
  constructor(message: string, cause?: unknown) {
    super('APP_LOAD_FAILED', message, { cause });
  }
}

/**
 * A worker could not get to `ready`: its app failed to load, it could not listen, or it died first.
 */
export class WorkerBootError extends ForklineError {
  public readonly slot: number;

  constructor(slot: number, message: string) {
    super('WORKER_BOOT_FAILED', message);
    this.slot = slot;
  }
}

export class RestartCapExceededError extends ForklineError {
  constructor(maxRestarts: number, windowMs: number) {
    super('RESTART_CAP_EXCEEDED', `Workers crashed more than ${maxRestarts} time(s) within ${windowMs}ms`);
  }
}

export class RequestTimeoutError extends ForklineError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('REQUEST_TIMEOUT', `Request exceeded ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class QueueFullError extends ForklineError {
  constructor(limit: number) {
    super('QUEUE_FULL', `Request queue is full (${limit} waiting)`);
  }
}

export class ShutdownError extends ForklineError {
  constructor(message = 'Worker is shutting down') {
    super('SHUTDOWN', message);
  }
}

export class HandlingUnitStateError extends ForklineError {
  constructor(unitId: number, from: string, to: string) {
    super('UNIT_STATE', `Handling unit ${unitId} cannot move from ${from} to ${to}`);
  }
}

/**
 * Reads the errno-style `code` of a Node error, if any.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
