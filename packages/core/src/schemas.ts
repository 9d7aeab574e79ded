/**
 * Settings schema for koboldgate
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';

export const DEFAULT_BACKEND_URL = 'http://localhost:5001';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_PORT = 8765;
export const MAX_MESSAGE_BYTES = 1024 * 1024;

const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug', 'trace']);

/**
 * Backend endpoint paths, relative to `backend.url`
 */
export const EndpointsSchema = z.object({
  generate: z.string().startsWith('/').default('/api/v1/generate'),
  chat: z.string().startsWith('/').default('/api/v1/chat/completions'),
  model: z.string().startsWith('/').default('/api/v1/model'),
  status: z.string().startsWith('/').default('/api/extra/generate/check')
});

export const BackendSettingsSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value), 'Backend URL must use http:// or https://')
    .default(DEFAULT_BACKEND_URL)
    .describe('Base URL of the KoboldCpp server'),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS).describe('Per-attempt timeout'),
  maxRetries: z.number().int().min(0).max(10).default(3).describe('Retries after the first attempt'),
  retryDelayMs: z.number().min(0).default(1000).describe('Base backoff delay'),
  endpoints: EndpointsSchema.default({}),
  maxConnections: z.number().int().positive().default(10).describe('Pooled connections')
});

export const ServerSettingsSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  maxConnections: z.number().int().positive().default(10).describe('Concurrent sessions'),
  pingIntervalMs: z.number().int().positive().default(20000),
  pingTimeoutMs: z.number().int().positive().default(10000),
  maxMessageBytes: z.number().int().positive().default(MAX_MESSAGE_BYTES)
});

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
  json: z.boolean().default(false),
  auditLog: z.boolean().default(false).describe('Append one JSON line per tool call'),
  auditFile: z.string().min(1).default('audit.log')
});

export const SecuritySettingsSchema = z.object({
  enableAuth: z.boolean().default(false).describe('Read but not enforced'),
  authToken: z.string().optional(),
  allowedOrigins: z.array(z.string()).default(['*']),
  dataSanitization: z.boolean().default(true),
  maxPromptLength: z.number().int().positive().default(8192),
  maxResponseLength: z.number().int().positive().default(4096)
});

export const PerformanceSettingsSchema = z.object({
  maxConcurrentRequests: z.number().int().positive().default(5),
  requestQueueSize: z.number().int().min(0).default(100)
});

/**
 * Main settings schema
 */
export const SettingsSchema = z.object({
  backend: BackendSettingsSchema.default({}),
  server: ServerSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
  security: SecuritySettingsSchema.default({}),
  performance: PerformanceSettingsSchema.default({})
});

export type BackendSettings = z.infer<typeof BackendSettingsSchema>;
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type SecuritySettings = z.infer<typeof SecuritySettingsSchema>;
export type PerformanceSettings = z.infer<typeof PerformanceSettingsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

/**
 * Parse and validate settings; throws ZodError
 */
export function parseSettings(input: unknown): Settings {
  return SettingsSchema.parse(input);
}

export function safeParseSettings(input: unknown) {
  return SettingsSchema.safeParse(input);
}

/**
 * Fully defaulted settings
 */
export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Format Zod error messages for human readability
 */
export function formatConfigError(error: z.ZodError): string {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
  return `Configuration validation failed:\n${messages.join('\n')}`;
}
