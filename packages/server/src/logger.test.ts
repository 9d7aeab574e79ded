/**
 * Tests for the process logger
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger, resolveLogLevel } from './logger.js';

describe('Logger', () => {
  let lines: string[];
  const write = (line: string) => {
    lines.push(line);
  };

  beforeEach(() => {
    lines = [];
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('writes text records with timestamp and level', () => {
    const logger = new Logger('info', { json: false, write });
    logger.info('hello');
    logger.warn({ port: 8765 }, 'Listening');

    expect(lines).toEqual([
      '[2026-01-01T12:00:00.000Z] [INFO] hello',
      '[2026-01-01T12:00:00.000Z] [WARN] Listening {"port":8765}'
    ]);
  });

  it('suppresses records below the level', () => {
    const logger = new Logger('warn', { json: false, write });
    logger.info('hidden');
    logger.debug('hidden');
    logger.error('shown');

    expect(lines).toEqual(['[2026-01-01T12:00:00.000Z] [ERROR] shown']);
  });

  it('writes nothing when silent', () => {
    const logger = new Logger('silent', { json: false, write });
    logger.error('hidden');
    expect(lines).toEqual([]);
  });

  it('falls back to info for an unknown level', () => {
    const logger = new Logger('loud', { json: false, write });
    expect(logger.level).toBe('info');
  });

  it('writes JSON records when enabled', () => {
    const logger = new Logger('debug', { json: true, write });
    logger.debug({ attempt: 2 }, 'Retrying');

    expect(lines).toEqual([
      '{"time":"2026-01-01T12:00:00.000Z","level":"debug","msg":"Retrying","data":{"attempt":2}}'
    ]);
  });

  it('prefixes child loggers', () => {
    const logger = new Logger('info', { json: false, write });
    logger.child('backend').child('pool').info('ready');

    expect(lines).toEqual(['[2026-01-01T12:00:00.000Z] [INFO] [backend][pool] ready']);
  });

  it('writes to stderr by default', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    new Logger('info', { json: false }).info('to stderr');
    expect(consoleError).toHaveBeenCalledWith('[2026-01-01T12:00:00.000Z] [INFO] to stderr');
  });
});

describe('resolveLogLevel', () => {
  it('prefers the flag, then the environment, then settings', () => {
    expect(resolveLogLevel('debug', 'warn', { KOBOLDGATE_LOG_LEVEL: 'trace' })).toBe('debug');
    expect(resolveLogLevel(undefined, 'warn', { KOBOLDGATE_LOG_LEVEL: 'trace' })).toBe('trace');
    expect(resolveLogLevel(undefined, 'warn', {})).toBe('warn');
  });

  it('ignores invalid environment values', () => {
    expect(resolveLogLevel(undefined, 'error', { KOBOLDGATE_LOG_LEVEL: 'chatty' })).toBe('error');
  });
});
