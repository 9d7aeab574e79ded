/**
 * koboldgate CLI program definition
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { setupCheckCommand } from './commands/check.js';
import { setupConfigCommand } from './commands/config.js';
import { setupServeCommand } from './commands/serve.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('koboldgate')
    .description('MCP gateway for a KoboldCpp text-generation backend')
    .version(readVersion())
    .option('-c, --config <path>', 'path to settings file')
    .option('-v, --verbose', 'verbose output')
    .option('-q, --quiet', 'quiet output');

  setupServeCommand(program);
  setupCheckCommand(program);
  setupConfigCommand(program);

  return program;
}

export { runCheck } from './commands/check.js';
export { runConfigInit, runConfigShow, runConfigValidate } from './commands/config.js';
