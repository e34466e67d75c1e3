import { getErrorCode } from '../common/errors.js';
import type { protocol } from './protocol.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSerializedError(value: unknown): value is protocol.SerializedError {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.message === 'string' &&
    (value.stack === undefined || typeof value.stack === 'string') &&
    (value.code === undefined || typeof value.code === 'string')
  );
}

export function serializeError(error: unknown): protocol.SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code: getErrorCode(error),
    };
  }

  return { name: 'Error', message: String(error) };
}

/**
 * IPC payloads arrive untyped; anything not matching the protocol is ignored by the receiver.
 */
export function isWorkerMessage(value: unknown): value is protocol.WorkerMessage {
  if (!isRecord(value)) {
    return false;
  }

  switch (value.type) {
    case 'ready':
      return typeof value.port === 'number' && typeof value.address === 'string';
    case 'boot_failed':
      return (value.stage === 'load' || value.stage === 'listen') && isSerializedError(value.error);
    case 'drained':
      return typeof value.completed === 'number' && typeof value.forced === 'number';
    default:
      return false;
  }
}

export function isSupervisorMessage(value: unknown): value is protocol.SupervisorMessage {
  return isRecord(value) && value.type === 'shutdown' && typeof value.graceMs === 'number';
}
