/**
 * Process logger
 *
 * Logs to stderr to keep stdout clean for the stdio protocol.
 */

import {
  formatLogRecord,
  isLogLevel,
  type Logger as LoggerContract,
  type LogLevel,
  shouldLog
} from '@koboldgate/core';

export type ProcessLoggerOptions = {
  json?: boolean;
  prefix?: string;
  write?: (line: string) => void;
};

export class Logger implements LoggerContract {
  readonly level: LogLevel;
  private readonly json: boolean;
  private readonly prefix: string | undefined;
  private readonly write: (line: string) => void;

  constructor(level: string = 'info', options: ProcessLoggerOptions = {}) {
    this.level = isLogLevel(level) ? level : 'info';
    this.json = options.json ?? process.env.KOBOLDGATE_LOG === 'json';
    this.prefix = options.prefix;
    this.write = options.write ?? ((line) => console.error(line));
  }

  private log(level: LogLevel, obj: unknown, msg?: string): void {
    // Cheap early return: avoid string building when suppressed
    if (!shouldLog(this.level, level)) return;
    this.write(
      formatLogRecord(level, obj, msg, { prefix: this.prefix, json: this.json, time: new Date() })
    );
  }

  error(obj: unknown, msg?: string): void {
    this.log('error', obj, msg);
  }

  warn(obj: unknown, msg?: string): void {
    this.log('warn', obj, msg);
  }

  info(obj: unknown, msg?: string): void {
    this.log('info', obj, msg);
  }

  debug(obj: unknown, msg?: string): void {
    this.log('debug', obj, msg);
  }

  trace(obj: unknown, msg?: string): void {
    this.log('trace', obj, msg);
  }

  child(prefix: string): Logger {
    return new Logger(this.level, {
      json: this.json,
      prefix: `${this.prefix ?? ''}[${prefix}]`,
      write: this.write
    });
  }
}

/**
 * CLI flag wins, then KOBOLDGATE_LOG_LEVEL, then the settings file
 */
export function resolveLogLevel(
  flag: string | undefined,
  configured: LogLevel,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  if (isLogLevel(flag)) return flag;
  const fromEnv = env.KOBOLDGATE_LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return configured;
}
