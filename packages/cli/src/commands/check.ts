/**
 * Check command - probe the KoboldCpp backend
 */

import { BackendClient } from '@koboldgate/backend';
import type { GenerationBackend, Settings } from '@koboldgate/core';
import { errorMessage } from '@koboldgate/runtime';
import { loadSettings, Logger } from '@koboldgate/server';
import type { Command } from 'commander';
import { consoleOutput, type GlobalOptions, type Output } from './shared.js';

export type CheckBackend = Pick<GenerationBackend, 'checkStatus' | 'getModelInfo'> & {
  disconnect(): Promise<void>;
};

export type CheckDeps = {
  output?: Output;
  env?: NodeJS.ProcessEnv;
  createBackend?: (settings: Settings, logger: Logger) => CheckBackend;
};

export type CheckOptions = GlobalOptions & { url?: string };

const defaultBackend = (settings: Settings, logger: Logger): CheckBackend =>
  new BackendClient({ backend: settings.backend, performance: settings.performance, logger });

/**
 * Resolves to the process exit code
 */
export async function runCheck(options: CheckOptions, deps: CheckDeps = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;
  const logger = new Logger(options.verbose ? 'debug' : 'silent');

  let settings: Settings;
  try {
    ({ settings } = await loadSettings({
      configPath: options.config,
      logger,
      env: deps.env,
      overrides: options.url ? { backend: { url: options.url } } : {}
    }));
  } catch (error) {
    output.error(`Connection check failed: ${errorMessage(error)}`);
    return 1;
  }

  output.log(`Checking KoboldCpp connection to ${settings.backend.url}...`);
  const backend = (deps.createBackend ?? defaultBackend)(settings, logger);

  try {
    const status = await backend.checkStatus();
    if (!status.online) {
      output.log('KoboldCpp server is not responding');
      return 1;
    }

    output.log('KoboldCpp server is online');
    if (status.modelLoaded) {
      output.log(`Model loaded: ${status.modelName}`);
      if (status.contextLength !== null) {
        output.log(`  Context length: ${status.contextLength}`);
      }
    } else {
      output.log('No model loaded');
    }
    if (status.generationActive) {
      output.log('Generation currently active');
    }

    try {
      const info = await backend.getModelInfo();
      output.log(`  Architecture: ${info.architecture ?? 'unknown'}`);
      output.log(`  Format: ${info.format ?? 'unknown'}`);
      if (info.parameters) {
        output.log(`  Parameters: ${info.parameters}`);
      }
    } catch (error) {
      logger.debug({ error }, 'Model info endpoint unavailable');
    }
    return 0;
  } catch (error) {
    output.error(`Connection check failed: ${errorMessage(error)}`);
    return 1;
  } finally {
    await backend.disconnect();
  }
}

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check the KoboldCpp connection')
    .option('--url <url>', 'KoboldCpp server URL to check')
    .action(async (_options: CheckOptions, command: Command) => {
      process.exitCode = await runCheck(command.optsWithGlobals<CheckOptions>());
    });
}
