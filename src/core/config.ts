import path from 'node:path';

import { META_PREFIX, WORKER_PAYLOAD_ENV } from '../common/consts.js';
import { ConfigError } from '../common/errors.js';

export type SchedulingPolicy = 'none' | 'rr';

/**
 * Where the application lives: an absolute module path and the export to use.
 */
export interface AppReference {
  modulePath: string;
  exportName: string;
}

/**
 * Immutable runtime configuration, resolved once in the supervisor and copied into every worker.
 */
export interface ServerConfig {
  readonly host: string;
  readonly port: number;
  /**
   * Number of worker processes kept alive.
   */
  readonly workers: number;
  /**
   * Handling units per worker, i.e. requests processed at once by one worker.
   */
  readonly concurrency: number;
  /**
   * Kernel listen backlog, and the per-worker bound on requests waiting for a free unit.
   */
  readonly backlog: number;
  readonly gracefulTimeoutMs: number;
  /**
   * Deadline for processing and responding to one request.
   */
  readonly requestTimeoutMs: number;
  /**
   * Deadline for receiving request headers and body.
   */
  readonly readTimeoutMs: number;
  readonly keepAliveTimeoutMs: number;
  /**
   * Restarts tolerated inside `restartWindowMs` before the supervisor gives up.
   */
  readonly maxRestarts: number;
  readonly restartWindowMs: number;
  readonly restartBackoffMs: number;
  readonly maxRestartBackoffMs: number;
  readonly schedulingPolicy: SchedulingPolicy;
  readonly app: Readonly<AppReference>;
  readonly accessLog: boolean;
  readonly metaRoutes: boolean;
}

type NumericField =
  | 'port'
  | 'workers'
  | 'concurrency'
  | 'backlog'
  | 'gracefulTimeoutMs'
  | 'requestTimeoutMs'
  | 'readTimeoutMs'
  | 'keepAliveTimeoutMs'
  | 'maxRestarts'
  | 'restartWindowMs'
  | 'restartBackoffMs'
  | 'maxRestartBackoffMs';

type BooleanField = 'accessLog' | 'metaRoutes';

type StringField = 'host' | 'schedulingPolicy' | 'app';

/**
 * Loosely typed configuration as it arrives from env, argv or code.
 */
export type ConfigInput = Partial<Record<NumericField, number | string>> &
  Partial<Record<BooleanField, boolean | string>> &
  Partial<Record<StringField, string>>;

export type ConfigField = keyof ConfigInput;

interface NumericRule {
  min: number;
  max: number;
}

const NUMERIC_RULES: Record<NumericField, NumericRule> = {
  port: { min: 0, max: 65535 },
  workers: { min: 1, max: 1024 },
  concurrency: { min: 1, max: 65536 },
  backlog: { min: 1, max: 65535 },
  gracefulTimeoutMs: { min: 0, max: Number.MAX_SAFE_INTEGER },
  requestTimeoutMs: { min: 1, max: Number.MAX_SAFE_INTEGER },
  readTimeoutMs: { min: 1, max: Number.MAX_SAFE_INTEGER },
  keepAliveTimeoutMs: { min: 0, max: Number.MAX_SAFE_INTEGER },
  maxRestarts: { min: 0, max: Number.MAX_SAFE_INTEGER },
  restartWindowMs: { min: 1, max: Number.MAX_SAFE_INTEGER },
  restartBackoffMs: { min: 0, max: Number.MAX_SAFE_INTEGER },
  maxRestartBackoffMs: { min: 0, max: Number.MAX_SAFE_INTEGER },
};

const NUMERIC_FIELDS = Object.keys(NUMERIC_RULES).filter(isNumericField);

const DEFAULT_NUMBERS: Readonly<Record<NumericField, number>> = {
  port: 8000,
  workers: 4,
  concurrency: 16,
  backlog: 2048,
  gracefulTimeoutMs: 30_000,
  requestTimeoutMs: 30_000,
  readTimeoutMs: 60_000,
  keepAliveTimeoutMs: 5_000,
  maxRestarts: 5,
  restartWindowMs: 60_000,
  restartBackoffMs: 500,
  maxRestartBackoffMs: 10_000,
};

export const DEFAULT_CONFIG: Readonly<Omit<ServerConfig, 'app'>> = {
  ...DEFAULT_NUMBERS,
  host: '0.0.0.0',
  schedulingPolicy: 'none',
  accessLog: true,
  metaRoutes: true,
};

const ENV_NAMES: Record<ConfigField, string> = {
  host: 'HOST',
  port: 'PORT',
  workers: 'WORKERS',
  concurrency: 'CONCURRENCY',
  backlog: 'BACKLOG',
  gracefulTimeoutMs: 'GRACEFUL_TIMEOUT_MS',
  requestTimeoutMs: 'REQUEST_TIMEOUT_MS',
  readTimeoutMs: 'READ_TIMEOUT_MS',
  keepAliveTimeoutMs: 'KEEP_ALIVE_TIMEOUT_MS',
  maxRestarts: 'MAX_RESTARTS',
  restartWindowMs: 'RESTART_WINDOW_MS',
  restartBackoffMs: 'RESTART_BACKOFF_MS',
  maxRestartBackoffMs: 'MAX_RESTART_BACKOFF_MS',
  schedulingPolicy: 'SCHEDULING_POLICY',
  app: 'APP_MODULE',
  accessLog: 'ACCESS_LOG',
  metaRoutes: 'META_ROUTES',
};

const VALUE_FLAGS: Record<string, ConfigField> = {
  '--host': 'host',
  '--port': 'port',
  '--workers': 'workers',
  '--concurrency': 'concurrency',
  '--backlog': 'backlog',
  '--graceful-timeout': 'gracefulTimeoutMs',
  '--request-timeout': 'requestTimeoutMs',
  '--read-timeout': 'readTimeoutMs',
  '--keep-alive-timeout': 'keepAliveTimeoutMs',
  '--max-restarts': 'maxRestarts',
  '--restart-window': 'restartWindowMs',
  '--restart-backoff': 'restartBackoffMs',
  '--max-restart-backoff': 'maxRestartBackoffMs',
  '--scheduling': 'schedulingPolicy',
  '--app': 'app',
};

const SWITCH_FLAGS: Record<string, BooleanField> = {
  '--no-access-log': 'accessLog',
  '--no-meta': 'metaRoutes',
};

export const USAGE = `Usage: forkline [options] <module[:export]>

Serves an application module with a supervised pool of worker processes.

Options:
  --host <host>                 bind host (HOST, default ${DEFAULT_CONFIG.host})
  --port <port>                 bind port (PORT, default ${DEFAULT_CONFIG.port})
  --workers <n>                 worker processes (WORKERS, default ${DEFAULT_CONFIG.workers})
  --concurrency <n>             concurrent requests per worker (CONCURRENCY, default ${DEFAULT_CONFIG.concurrency})
  --backlog <n>                 listen backlog and per-worker queue bound (BACKLOG, default ${DEFAULT_CONFIG.backlog})
  --graceful-timeout <ms>       drain window on shutdown (GRACEFUL_TIMEOUT_MS, default ${DEFAULT_CONFIG.gracefulTimeoutMs})
  --request-timeout <ms>        per-request processing deadline (REQUEST_TIMEOUT_MS, default ${DEFAULT_CONFIG.requestTimeoutMs})
  --read-timeout <ms>           deadline for receiving a request (READ_TIMEOUT_MS, default ${DEFAULT_CONFIG.readTimeoutMs})
  --keep-alive-timeout <ms>     idle keep-alive window (KEEP_ALIVE_TIMEOUT_MS, default ${DEFAULT_CONFIG.keepAliveTimeoutMs})
  --max-restarts <n>            restarts tolerated per window (MAX_RESTARTS, default ${DEFAULT_CONFIG.maxRestarts})
  --restart-window <ms>         restart counting window (RESTART_WINDOW_MS, default ${DEFAULT_CONFIG.restartWindowMs})
  --restart-backoff <ms>        first restart delay (RESTART_BACKOFF_MS, default ${DEFAULT_CONFIG.restartBackoffMs})
  --max-restart-backoff <ms>    restart delay ceiling (MAX_RESTART_BACKOFF_MS, default ${DEFAULT_CONFIG.maxRestartBackoffMs})
  --scheduling <none|rr>        connection distribution (SCHEDULING_POLICY, default ${DEFAULT_CONFIG.schedulingPolicy})
  --app <module[:export]>       application module (APP_MODULE)
  --no-access-log               disable per-request logs (ACCESS_LOG=false)
  --no-meta                     disable ${META_PREFIX} routes (META_ROUTES=false)
  -h, --help                    show this help
`;

export interface ParsedArguments {
  input: ConfigInput;
  help: boolean;
}

function isNumericField(field: string): field is NumericField {
  return Object.hasOwn(NUMERIC_RULES, field);
}

function isConfigField(field: string): field is ConfigField {
  return Object.hasOwn(ENV_NAMES, field);
}

/**
 * Picks the known configuration variables out of an environment.
 */
export function readConfigFromEnv(env: NodeJS.ProcessEnv): ConfigInput {
  const input: ConfigInput = {};

  for (const [field, name] of Object.entries(ENV_NAMES)) {
    const value = env[name];
    if (value === undefined || value.trim().length === 0 || !isConfigField(field)) {
      continue;
    }

    input[field] = value.trim();
  }

  return input;
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Supports `--flag value`, `--flag=value` and one positional application module.
 */
export function parseArguments(argv: readonly string[]): ParsedArguments {
  const input: ConfigInput = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      help = true;
      continue;
    }

    const switchField = SWITCH_FLAGS[arg];
    if (switchField !== undefined) {
      input[switchField] = false;
      continue;
    }

    if (!arg.startsWith('-')) {
      if (input.app !== undefined) {
        throw new ConfigError(`Unexpected argument: ${arg}`);
      }
      input.app = arg;
      continue;
    }

    const equalsAt = arg.indexOf('=');
    const flag = equalsAt === -1 ? arg : arg.slice(0, equalsAt);
    const field = VALUE_FLAGS[flag];

    if (field === undefined) {
      throw new ConfigError(`Unknown option: ${flag}`);
    }

    let value: string;
    if (equalsAt !== -1) {
      value = arg.slice(equalsAt + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ConfigError(`Missing value for ${flag}`);
      }
      value = next;
      i++;
    }

    input[field] = value;
  }

  return { input, help };
}

function parseInteger(field: NumericField, value: number | string): number {
  const rule = NUMERIC_RULES[field];
  const text = typeof value === 'number' ? String(value) : value.trim();
  const parsed = /^-?\d+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN;

  if (!Number.isSafeInteger(parsed) || parsed < rule.min || parsed > rule.max) {
    throw new ConfigError(`Invalid ${field}: expected an integer between ${rule.min} and ${rule.max}, got "${text}"`);
  }

  return parsed;
}

function parseBoolean(field: BooleanField, value: boolean | string): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes' || normalized === 'on') {
    return true;
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  throw new ConfigError(`Invalid ${field}: expected a boolean, got "${value}"`);
}

function parseSchedulingPolicy(value: string): SchedulingPolicy {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'none' || normalized === 'rr') {
    return normalized;
  }

  throw new ConfigError(`Invalid schedulingPolicy: expected "none" or "rr", got "${value}"`);
}

/**
 * Parses `path/to/module.js[:exportName]` relative to `cwd`.
 */
export function parseAppReference(reference: string, cwd: string): AppReference {
  const trimmed = reference.trim();
  if (trimmed.length === 0) {
    throw new ConfigError('Invalid app: module path is empty');
  }

  let modulePart = trimmed;
  let exportName = 'default';

  const colonAt = trimmed.lastIndexOf(':');
  const suffix = colonAt === -1 ? '' : trimmed.slice(colonAt + 1);
  // a lone drive letter before the colon is a windows path, not a module
  const isDrivePrefix = colonAt === 1 && /^[A-Za-z]$/.test(trimmed[0]);

  if (colonAt > 0 && !isDrivePrefix && /^[A-Za-z_$][\w$]*$/.test(suffix)) {
    modulePart = trimmed.slice(0, colonAt);
    exportName = suffix;
  }

  return {
    modulePath: path.resolve(cwd, modulePart),
    exportName,
  };
}

/**
 * Applies defaults, validates every field and freezes the result.
 */
export function resolveServerConfig(input: ConfigInput, cwd: string = process.cwd()): ServerConfig {
  const resolvedNumbers: Record<NumericField, number> = { ...DEFAULT_NUMBERS };

  for (const field of NUMERIC_FIELDS) {
    const value = input[field];
    if (value !== undefined) {
      resolvedNumbers[field] = parseInteger(field, value);
    }
  }

  if (resolvedNumbers.maxRestartBackoffMs < resolvedNumbers.restartBackoffMs) {
    throw new ConfigError(
      `Invalid maxRestartBackoffMs: ${resolvedNumbers.maxRestartBackoffMs} is lower than restartBackoffMs ${resolvedNumbers.restartBackoffMs}`,
    );
  }

  const host = input.host?.trim() ?? DEFAULT_CONFIG.host;
  if (host.length === 0) {
    throw new ConfigError('Invalid host: must not be empty');
  }

  if (input.app === undefined) {
    throw new ConfigError(`Missing application module: pass <module[:export]> or set ${ENV_NAMES.app}`);
  }

  const config: ServerConfig = {
    ...resolvedNumbers,
    host,
    schedulingPolicy:
      input.schedulingPolicy === undefined ? DEFAULT_CONFIG.schedulingPolicy : parseSchedulingPolicy(input.schedulingPolicy),
    app: Object.freeze(parseAppReference(input.app, cwd)),
    accessLog: input.accessLog === undefined ? DEFAULT_CONFIG.accessLog : parseBoolean('accessLog', input.accessLog),
    metaRoutes: input.metaRoutes === undefined ? DEFAULT_CONFIG.metaRoutes : parseBoolean('metaRoutes', input.metaRoutes),
  };

  return Object.freeze(config);
}

/**
 * What a forked worker needs to know about itself.
 */
export interface WorkerPayload {
  slot: number;
  config: ServerConfig;
}

export function serializeWorkerPayload(payload: WorkerPayload): string {
  return JSON.stringify(payload);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toConfigInput(record: Record<string, unknown>): ConfigInput {
  const input: ConfigInput = {};

  for (const field of NUMERIC_FIELDS) {
    const value = record[field];
    if (typeof value === 'number' || typeof value === 'string') {
      input[field] = value;
    }
  }

  if (typeof record.host === 'string') {
    input.host = record.host;
  }
  if (typeof record.schedulingPolicy === 'string') {
    input.schedulingPolicy = record.schedulingPolicy;
  }
  if (typeof record.accessLog === 'boolean') {
    input.accessLog = record.accessLog;
  }
  if (typeof record.metaRoutes === 'boolean') {
    input.metaRoutes = record.metaRoutes;
  }

  const app = record.app;
  if (isRecord(app) && typeof app.modulePath === 'string' && typeof app.exportName === 'string') {
    input.app = `${app.modulePath}:${app.exportName}`;
  }

  return input;
}

/**
 * Reads and re-validates the payload the supervisor put into a worker's environment.
 */
export function readWorkerPayload(env: NodeJS.ProcessEnv): WorkerPayload {
  const raw = env[WORKER_PAYLOAD_ENV];
  if (raw === undefined) {
    throw new ConfigError(`Missing ${WORKER_PAYLOAD_ENV}: worker processes are started by the supervisor`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Malformed ${WORKER_PAYLOAD_ENV}`);
  }

  if (!isRecord(parsed) || typeof parsed.slot !== 'number' || !Number.isInteger(parsed.slot) || !isRecord(parsed.config)) {
    throw new ConfigError(`Malformed ${WORKER_PAYLOAD_ENV}`);
  }

  return {
    slot: parsed.slot,
    config: resolveServerConfig(toConfigInput(parsed.config)),
  };
}
