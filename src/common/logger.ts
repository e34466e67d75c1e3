export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export type ProcessRole = 'supervisor' | 'worker';

export interface LogContext {
  role: ProcessRole;
  /**
   * Worker slot, only set inside worker processes.
   */
  worker?: number;
}

let context: LogContext = { role: 'supervisor' };

function dtm(dt = new Date()): string {
  const y = dt.getFullYear();
  const m = String(dt.getMonth() + 1).padStart(2, '0');
  const d = String(dt.getDate()).padStart(2, '0');
  const hh = String(dt.getHours()).padStart(2, '0');
  const mm = String(dt.getMinutes()).padStart(2, '0');
  const ss = String(dt.getSeconds()).padStart(2, '0');
  const ms = String(dt.getMilliseconds()).padStart(3, '0');
  return `${y}.${m}.${d} ${hh}:${mm}:${ss}.${ms}`;
}

function describeContext(): string {
  return context.worker === undefined ? context.role : `${context.role}#${context.worker}`;
}

/**
 * Tags every following log line of this process with its role (and worker slot).
 */
export function setLogContext(next: LogContext): void {
  context = { ...next };
}

/**
 * Write a jsonl log entry to stdout. The entry carries a timestamp, log level, event name,
 * the process context and any additional fields provided.
 */
export function logJsonl(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  console.log(
    JSON.stringify({
      timestamp: dtm(),
      level,
      event,
      role: context.role,
      worker: context.worker,
      pid: process.pid,
      ...fields,
    }),
  );
}

export function log(level: LogLevel, message: string): void {
  console.log(`[${dtm()}] ${level} ${describeContext()} - ${message}`);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
