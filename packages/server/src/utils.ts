/**
 * Utility functions
 */

import { defaultSettings, type Settings } from '@koboldgate/core';

export type SettingsCheck = {
  label: string;
  ok: boolean;
  message?: string;
};

/**
 * Default settings file contents
 */
export function generateDefaultConfig(): string {
  return `${JSON.stringify(defaultSettings(), null, 2)}\n`;
}

/**
 * Section checks reported by `config validate`; the schema already rejects most of these
 */
export function checkSettings(settings: Settings): SettingsCheck[] {
  const { backend, server, security } = settings;
  const checks: SettingsCheck[] = [];

  const backendProblems: string[] = [];
  if (!/^https?:\/\//.test(backend.url)) backendProblems.push('URL must use http or https');
  if (backend.timeoutMs <= 0) backendProblems.push('timeout must be positive');
  if (backend.maxRetries < 0) backendProblems.push('retries must not be negative');
  checks.push({
    label: 'Backend configuration',
    ok: backendProblems.length === 0,
    message: backendProblems.join('; ') || undefined
  });

  const portValid = server.port >= 1 && server.port <= 65535;
  checks.push({
    label: 'Server configuration',
    ok: portValid,
    message: portValid ? undefined : 'port must be between 1 and 65535'
  });

  const promptValid = security.maxPromptLength > 0;
  checks.push({
    label: 'Security configuration',
    ok: promptValid,
    message: promptValid ? undefined : 'maxPromptLength must be positive'
  });

  return checks;
}
