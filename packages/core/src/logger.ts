/**
 * Logger contract shared by every koboldgate package.
 *
 * Implementations must never write to stdout: in stdio mode stdout carries protocol frames.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type Logger = {
  level: LogLevel;
  error(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
  trace(obj: unknown, msg?: string): void;
  child?(prefix: string): Logger;
};

/**
 * Numeric weight per level; higher is more verbose
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  json?: boolean;
  /** Sink for formatted lines; records are dropped when omitted */
  output?: (line: string) => void;
  /** Clock override, mainly for tests */
  now?: () => Date;
};

/**
 * Render one record as a text or JSON line.
 * `obj` may be the message itself (string) or structured data with `msg` alongside.
 */
export function formatLogRecord(
  level: LogLevel,
  obj: unknown,
  msg: string | undefined,
  options: { prefix?: string; json?: boolean; time: Date }
): string {
  const text = msg ?? (typeof obj === 'string' ? obj : undefined);
  const data = typeof obj === 'string' && msg === undefined ? undefined : obj;

  if (options.json) {
    const record: Record<string, unknown> = { time: options.time.toISOString(), level };
    if (options.prefix) record.prefix = options.prefix;
    if (text !== undefined) record.msg = text;
    if (data !== undefined && data !== null) record.data = serializeData(data);
    return JSON.stringify(record);
  }

  const prefixPart = options.prefix ? ` ${options.prefix}` : '';
  const textPart = text ?? JSON.stringify(serializeData(data));
  const dataPart =
    text !== undefined && data !== undefined && data !== null && typeof data !== 'string'
      ? ` ${JSON.stringify(serializeData(data))}`
      : '';
  return `[${options.time.toISOString()}] [${level.toUpperCase()}]${prefixPart} ${textPart}${dataPart}`;
}

// Error instances stringify to {} otherwise
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  if (data && typeof data === 'object' && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return out;
  }
  return data;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const prefix = options.prefix ?? '';
  const output = options.output;
  const now = options.now ?? (() => new Date());

  const log = (messageLevel: LogLevel, obj: unknown, msg?: string): void => {
    if (!output || !shouldLog(level, messageLevel)) {
      return;
    }
    output(formatLogRecord(messageLevel, obj, msg, { prefix, json: options.json, time: now() }));
  };

  return {
    level,
    error: (obj, msg) => log('error', obj, msg),
    warn: (obj, msg) => log('warn', obj, msg),
    info: (obj, msg) => log('info', obj, msg),
    debug: (obj, msg) => log('debug', obj, msg),
    trace: (obj, msg) => log('trace', obj, msg),
    child: (childPrefix) =>
      createLogger({ ...options, prefix: `${prefix}[${childPrefix}]` })
  };
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
