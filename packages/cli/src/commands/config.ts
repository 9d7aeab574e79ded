/**
 * Config command - validate, show and initialize koboldgate settings
 */

import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Settings } from '@koboldgate/core';
import { errorMessage } from '@koboldgate/runtime';
import {
  checkSettings,
  generateDefaultConfig,
  loadSettings,
  Logger,
  resolveConfigPath,
  selectConfigPath
} from '@koboldgate/server';
import type { Command } from 'commander';
import { consoleOutput, type GlobalOptions, type Output } from './shared.js';

export type ConfigDeps = {
  output?: Output;
  env?: NodeJS.ProcessEnv;
};

function redact(settings: Settings): Settings {
  if (settings.security.authToken === undefined) return settings;
  return { ...settings, security: { ...settings.security, authToken: '********' } };
}

export async function runConfigValidate(
  options: GlobalOptions,
  deps: ConfigDeps = {}
): Promise<number> {
  const output = deps.output ?? consoleOutput;
  output.log('Validating configuration...');

  try {
    const { settings, path, exists } = await loadSettings({
      configPath: options.config,
      logger: new Logger(options.verbose ? 'debug' : 'silent'),
      env: deps.env
    });
    output.log(exists ? `Settings file: ${path}` : `Settings file not found, using defaults`);

    let failed = false;
    for (const check of checkSettings(settings)) {
      if (check.ok) {
        output.log(`✓ ${check.label} is valid`);
      } else {
        failed = true;
        output.log(`✗ ${check.label}: ${check.message ?? 'invalid'}`);
      }
    }
    if (failed) return 1;

    output.log('All configuration is valid');
    return 0;
  } catch (error) {
    output.error(errorMessage(error));
    return 1;
  }
}

export async function runConfigShow(
  options: GlobalOptions,
  deps: ConfigDeps = {}
): Promise<number> {
  const output = deps.output ?? consoleOutput;
  try {
    const { settings, path, exists } = await loadSettings({
      configPath: options.config,
      logger: new Logger(options.verbose ? 'debug' : 'silent'),
      env: deps.env
    });
    output.log(`Current configuration (${exists ? path : 'defaults'}):`);
    output.log(JSON.stringify(redact(settings), null, 2));
    return 0;
  } catch (error) {
    output.error(`Failed to show configuration: ${errorMessage(error)}`);
    return 1;
  }
}

export async function runConfigInit(
  options: GlobalOptions & { force?: boolean },
  deps: ConfigDeps = {}
): Promise<number> {
  const output = deps.output ?? consoleOutput;
  const path = resolveConfigPath(selectConfigPath(options.config, deps.env));

  if (existsSync(path) && !options.force) {
    output.error(`Configuration file already exists: ${path}`);
    output.error('Use --force to replace it');
    return 1;
  }

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, generateDefaultConfig(), 'utf-8');
  } catch (error) {
    output.error(`Failed to initialize configuration: ${errorMessage(error)}`);
    return 1;
  }

  output.log(`Created configuration file: ${path}`);
  output.log('');
  output.log('Next steps:');
  output.log('1. Start KoboldCpp: koboldcpp --model your_model.gguf --port 5001');
  output.log('2. Start the gateway: koboldgate serve');
  return 0;
}

export function setupConfigCommand(program: Command): void {
  const config = program.command('config').description('Manage koboldgate configuration');

  config
    .command('validate')
    .description('Validate configuration')
    .action(async (_options: GlobalOptions, command: Command) => {
      process.exitCode = await runConfigValidate(command.optsWithGlobals<GlobalOptions>());
    });

  config
    .command('show')
    .description('Show the effective configuration')
    .action(async (_options: GlobalOptions, command: Command) => {
      process.exitCode = await runConfigShow(command.optsWithGlobals<GlobalOptions>());
    });

  config
    .command('init')
    .description('Write a settings file with the defaults')
    .option('--force', 'overwrite an existing file')
    .action(async (_options: { force?: boolean }, command: Command) => {
      process.exitCode = await runConfigInit(
        command.optsWithGlobals<GlobalOptions & { force?: boolean }>()
      );
    });
}
