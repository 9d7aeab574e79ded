/**
 * Environment variable overrides, applied after the settings file
 */

type EnvOverride = {
  variable: string;
  path: readonly [section: string, key: string];
  /** Keep the raw string instead of coercing booleans and numbers */
  text?: boolean;
  lowercase?: boolean;
};

export const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: 'KOBOLD_URL', path: ['backend', 'url'], text: true },
  { variable: 'KOBOLD_TIMEOUT_MS', path: ['backend', 'timeoutMs'] },
  { variable: 'KOBOLD_MAX_RETRIES', path: ['backend', 'maxRetries'] },
  { variable: 'MCP_HOST', path: ['server', 'host'], text: true },
  { variable: 'MCP_PORT', path: ['server', 'port'] },
  { variable: 'MCP_MAX_CONNECTIONS', path: ['server', 'maxConnections'] },
  { variable: 'LOG_LEVEL', path: ['logging', 'level'], text: true, lowercase: true },
  { variable: 'AUDIT_LOG', path: ['logging', 'auditLog'] },
  { variable: 'AUDIT_FILE', path: ['logging', 'auditFile'], text: true },
  { variable: 'ENABLE_AUTH', path: ['security', 'enableAuth'] },
  { variable: 'AUTH_TOKEN', path: ['security', 'authToken'], text: true },
  { variable: 'MAX_PROMPT_LENGTH', path: ['security', 'maxPromptLength'] },
  { variable: 'MAX_CONCURRENT_REQUESTS', path: ['performance', 'maxConcurrentRequests'] }
];

/**
 * true/false, then integer, then float; anything else stays a string
 */
export function coerceEnvValue(value: string): string | number | boolean {
  const trimmed = value.trim();
  const lower = trimmed.toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return lower === 'true';
  }
  if (/^[+-]?\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  if (/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(trimmed)) {
    return Number.parseFloat(trimmed);
  }
  return value;
}

/**
 * Collect overrides as a partial settings object
 */
export function collectEnvOverrides(
  env: NodeJS.ProcessEnv = process.env
): Record<string, Record<string, unknown>> {
  const overrides: Record<string, Record<string, unknown>> = {};

  for (const { variable, path, text, lowercase } of ENV_OVERRIDES) {
    const raw = env[variable];
    if (raw === undefined) continue;

    const [section, key] = path;
    const value = text ? (lowercase ? raw.toLowerCase() : raw) : coerceEnvValue(raw);
    overrides[section] = { ...overrides[section], [key]: value };
  }

  return overrides;
}
