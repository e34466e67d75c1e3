#!/usr/bin/env node
import { ExitCode } from './common/consts.js';
import { ConfigError } from './common/errors.js';
import { getErrorMessage, log, logJsonl } from './common/logger.js';
import { USAGE, parseArguments, readConfigFromEnv, resolveServerConfig } from './core/config.js';
import type { ServerConfig } from './core/config.js';
import { createSupervisor } from './core/supervisor.js';

function loadConfig(): ServerConfig | undefined {
  const parsed = parseArguments(process.argv.slice(2));
  if (parsed.help) {
    process.stdout.write(USAGE);
    return undefined;
  }

  // flags win over the environment
  return resolveServerConfig({ ...readConfigFromEnv(process.env), ...parsed.input });
}

async function main(): Promise<number> {
  let config: ServerConfig | undefined;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return ExitCode.StartupFailure;
    }
    throw error;
  }

  if (config === undefined) {
    return ExitCode.Ok;
  }

  const supervisor = createSupervisor(config);

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals): void => {
    signals += 1;

    if (signals === 1) {
      log('INFO', `Received ${signal}, draining workers (send again to force)`);
      void supervisor.stop(signal);
      return;
    }

    log('WARN', `Received ${signal} again, killing workers`);
    supervisor.forceStop(signal);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await supervisor.start();
  } catch (error) {
    log('ERROR', `Startup failed: ${getErrorMessage(error)}`);
  }

  const exit = await supervisor.wait();
  logJsonl(exit.code === ExitCode.Ok ? 'INFO' : 'ERROR', 'process_exit', {
    code: exit.code,
    reason: exit.reason,
    error: exit.error === undefined ? undefined : getErrorMessage(exit.error),
  });

  return exit.code;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    log('ERROR', `Fatal: ${getErrorMessage(error)}`);
    process.exit(ExitCode.StartupFailure);
  });
