/**
 * Settings loader
 *
 * Reads JSON or JSONC, follows `extends`, applies environment and caller overrides,
 * then validates with the core schema.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import {
  deepMerge,
  formatConfigError,
  isPlainObject,
  type Logger,
  mergeLayers,
  safeParseSettings,
  type Settings
} from '@koboldgate/core';
import { collectEnvOverrides } from './env-overrides.js';
import { resolveConfigPath, selectConfigPath } from './utils/path-resolver.js';

const MAX_EXTENDS_DEPTH = 10;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type LoadSettingsOptions = {
  /** Explicit path, e.g. from --config */
  configPath?: string;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  /** Applied last, e.g. CLI flags */
  overrides?: Record<string, unknown>;
};

export type LoadedSettings = {
  path: string;
  exists: boolean;
  settings: Settings;
};

export async function loadSettings(options: LoadSettingsOptions): Promise<LoadedSettings> {
  const { logger } = options;
  const env = options.env ?? process.env;
  const path = resolveConfigPath(selectConfigPath(options.configPath, env));
  const exists = existsSync(path);

  let fileData: unknown = {};
  if (exists) {
    fileData = await loadWithExtends(path, logger);
    logger.debug({ path }, 'Loaded settings file');
  } else {
    logger.debug({ path }, 'Settings file not found, using defaults');
  }

  const merged = mergeLayers([fileData, collectEnvOverrides(env), options.overrides ?? {}]);
  const parsed = safeParseSettings(merged);
  if (!parsed.success) {
    throw new ConfigError(formatConfigError(parsed.error));
  }

  return { path, exists, settings: parsed.data };
}

/**
 * Strip comments and trailing commas from JSONC content
 */
export function stripJsonComments(content: string): string {
  return content
    .replace(/("(?:[^"\\]|\\.)*")|\/\/.*$/gm, '$1')
    .replace(/("(?:[^"\\]|\\.)*")|\/\*[\s\S]*?\*\//g, '$1')
    .replace(
      /("(?:[^"\\]|\\.)*")|,(\s*[}\]])/g,
      (match, quoted: string | undefined, tail: string | undefined) => quoted ?? tail ?? match
    );
}

async function loadWithExtends(
  configPath: string,
  logger: Logger,
  chain: string[] = [],
  depth = 0
): Promise<unknown> {
  const resolvedPath = resolveConfigPath(configPath, chain[chain.length - 1]);

  if (chain.includes(resolvedPath)) {
    throw new ConfigError(
      `Circular reference detected in configuration inheritance: ${[...chain, resolvedPath].join(' -> ')}`
    );
  }
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new ConfigError(
      `Maximum configuration inheritance depth (${MAX_EXTENDS_DEPTH}) exceeded`
    );
  }
  if (!existsSync(resolvedPath)) {
    throw new ConfigError(`Configuration file not found: ${resolvedPath}`);
  }

  const content = await readFile(resolvedPath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(stripJsonComments(content));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in configuration file ${resolvedPath}: ${reason}`);
  }
  if (!isPlainObject(raw)) {
    throw new ConfigError(`Configuration file ${resolvedPath} must contain a JSON object`);
  }

  const { extends: extendsField, ...current } = raw;
  if (extendsField === undefined) {
    return current;
  }

  const parents = Array.isArray(extendsField) ? extendsField : [extendsField];
  let base: unknown = {};
  for (const parent of parents) {
    if (typeof parent !== 'string') {
      throw new ConfigError(
        `Invalid extends value in ${resolvedPath}: must be a string or array of strings`
      );
    }
    logger.debug({ parent }, 'Loading parent settings');
    const parentData = await loadWithExtends(parent, logger, [...chain, resolvedPath], depth + 1);
    base = deepMerge(base, parentData);
  }

  return deepMerge(base, current);
}
