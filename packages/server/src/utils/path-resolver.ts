/**
 * Path resolution utilities for settings files
 */

import { realpathSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, isAbsolute, resolve } from 'node:path';

export const DEFAULT_CONFIG_FILE = './koboldgate.config.json';

/**
 * Resolve a settings file path
 *
 * - `~/` expands to the home directory
 * - relative paths resolve from the base file's directory, else the working directory
 * - symbolic links resolve to real paths when the file exists
 */
export function resolveConfigPath(filePath: string, basePath?: string): string {
  if (!filePath) {
    throw new Error('Configuration path cannot be empty');
  }

  let p = filePath;
  if (p.startsWith('~/')) {
    p = homedir() + p.slice(1);
  }

  if (!isAbsolute(p)) {
    p = basePath ? resolve(dirname(basePath), p) : resolve(process.cwd(), p);
  }

  try {
    return realpathSync(p);
  } catch {
    // Not there yet; callers report the missing file
    return resolve(p);
  }
}

/**
 * `--config` flag, then KOBOLDGATE_CONFIG, then ./koboldgate.config.json
 */
export function selectConfigPath(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return flag ?? env.KOBOLDGATE_CONFIG ?? DEFAULT_CONFIG_FILE;
}
