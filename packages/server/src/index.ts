/**
 * @koboldgate/server - process entry: settings, logging, backend, transports, shutdown
 *
 * It can be used as a library or run through the CLI.
 */

import type { LogLevel, Settings } from '@koboldgate/core';
import { BackendClient } from '@koboldgate/backend';
import { createGateway } from '@koboldgate/gateway';
import { loadSettings } from './config.js';
import { Logger, resolveLogLevel } from './logger.js';
import { createShutdown, installSignalHandlers } from './shutdown.js';
import { createStdioSession } from './stdio.js';
import { startWebSocketServer } from './ws.js';

export { ConfigError, type LoadedSettings, loadSettings, stripJsonComments } from './config.js';
export { collectEnvOverrides, coerceEnvValue, ENV_OVERRIDES } from './env-overrides.js';
export { createHealthApp } from './health.js';
export { Logger, resolveLogLevel } from './logger.js';
export { createShutdown, installSignalHandlers } from './shutdown.js';
export { createStdioSession } from './stdio.js';
export { checkSettings, generateDefaultConfig, type SettingsCheck } from './utils.js';
export { DEFAULT_CONFIG_FILE, resolveConfigPath, selectConfigPath } from './utils/path-resolver.js';
export { isOriginAllowed, startWebSocketServer } from './ws.js';

/**
 * Server options for starting koboldgate
 */
export interface ServerOptions {
  config?: string;
  host?: string;
  port?: number;
  koboldUrl?: string;
  stdio?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  /** Install SIGINT/SIGTERM handlers that exit the process */
  handleSignals?: boolean;
}

export type RunningServer = {
  mode: 'stdio' | 'websocket';
  settings: Settings;
  /** Bound port in WebSocket mode */
  port?: number;
  /** Resolves when the transport has ended (stdin closed, or after stop) */
  done: Promise<void>;
  stop(): Promise<void>;
};

export function flagLogLevel(
  options: Pick<ServerOptions, 'verbose' | 'quiet'>
): LogLevel | undefined {
  if (options.quiet) return 'error';
  if (options.verbose) return 'debug';
  return undefined;
}

/**
 * Settings overrides from command line flags
 */
export function flagOverrides(
  options: Pick<ServerOptions, 'host' | 'port' | 'koboldUrl'>
): Record<string, unknown> {
  const overrides: Record<string, Record<string, unknown>> = {};
  if (options.koboldUrl !== undefined) overrides.backend = { url: options.koboldUrl };
  if (options.host !== undefined || options.port !== undefined) {
    overrides.server = { host: options.host, port: options.port };
  }
  return overrides;
}

/**
 * Start koboldgate with the given options
 */
export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
  const flagLevel = flagLogLevel(options);
  const bootLogger = new Logger(flagLevel ?? process.env.KOBOLDGATE_LOG_LEVEL ?? 'info');

  const { settings, path, exists } = await loadSettings({
    configPath: options.config,
    logger: bootLogger,
    overrides: flagOverrides(options)
  });

  const logger = new Logger(resolveLogLevel(flagLevel, settings.logging.level), {
    json: settings.logging.json || process.env.KOBOLDGATE_LOG === 'json'
  });
  logger.debug({ path, exists }, 'Settings resolved');

  const backend = new BackendClient({
    backend: settings.backend,
    performance: settings.performance,
    logger: logger.child('backend')
  });
  backend.connect();
  if (await backend.healthCheck()) {
    logger.info(`Connected to KoboldCpp at ${settings.backend.url}`);
  } else {
    logger.warn(
      `KoboldCpp is not reachable at ${settings.backend.url}; tool calls will fail until it is`
    );
  }

  const gateway = createGateway({ settings, backend, logger });

  let running: RunningServer;
  if (options.stdio) {
    const done = gateway.supervisor.attach(
      createStdioSession({ input: process.stdin, output: process.stdout, logger })
    );
    logger.info('koboldgate started in stdio mode');

    running = {
      mode: 'stdio',
      settings,
      done,
      async stop() {
        await gateway.supervisor.closeAll();
        await done;
        await backend.disconnect();
        await gateway.audit?.flush();
      }
    };
  } else {
    const handle = await startWebSocketServer({
      settings,
      supervisor: gateway.supervisor,
      logger
    });
    let markDone: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      markDone = resolve;
    });

    running = {
      mode: 'websocket',
      settings,
      port: handle.port,
      done,
      async stop() {
        try {
          await handle.close();
          await backend.disconnect();
          await gateway.audit?.flush();
        } finally {
          markDone();
        }
      }
    };
  }

  if (options.handleSignals) {
    installSignalHandlers(createShutdown({ stop: () => running.stop(), logger }));
  }

  return running;
}
