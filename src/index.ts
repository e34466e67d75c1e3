export { ExitCode, HttpCode, META_PREFIX } from './common/consts.js';
export * from './common/errors.js';
export type { LogLevel } from './common/logger.js';

export type {
  AppBody,
  AppRequest,
  AppResponse,
  Application,
  ApplicationAdapter,
  BodyChunk,
  ExchangeOutcome,
  LoadedApplication,
} from './core/adapter.js';
export { createAppRequest, createApplicationAdapter, normalizeAppResponse } from './core/adapter.js';
export { loadApplication, toApplication } from './core/app-loader.js';
export type { AppReference, ConfigInput, SchedulingPolicy, ServerConfig } from './core/config.js';
export {
  DEFAULT_CONFIG,
  parseAppReference,
  parseArguments,
  readConfigFromEnv,
  resolveServerConfig,
} from './core/config.js';
export type { Dispatcher, DispatcherOptions, DispatcherSnapshot, DrainReport } from './core/dispatcher.js';
export { createDispatcher } from './core/dispatcher.js';
export type { HandlingUnitSnapshot, HandlingUnitState } from './core/handling-unit.js';
export type { ListenTarget } from './core/listener.js';
export { classifyBindError, listenShared, probeListener } from './core/listener.js';
export type { WorkerServer } from './core/server.js';
export { createWorkerServer } from './core/server.js';
export type {
  Supervisor,
  SupervisorExit,
  SupervisorOptions,
  SupervisorSnapshot,
  SupervisorState,
  WorkerHandle,
} from './core/supervisor.js';
export { createSupervisor } from './core/supervisor.js';
export type { WorkerLauncher, WorkerProcess } from './workers/launcher.js';
export { createClusterLauncher } from './workers/launcher.js';
