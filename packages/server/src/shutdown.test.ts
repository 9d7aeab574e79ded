import { describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '@koboldgate/core';
import { createShutdown } from './shutdown.js';

describe('createShutdown', () => {
  const logger = createSilentLogger();

  it('stops once and resolves to 0', async () => {
    const stop = vi.fn(async () => undefined);
    const shutdown = createShutdown({ stop, logger, timeoutMs: 1000 });

    const [first, second] = await Promise.all([shutdown('SIGINT'), shutdown('SIGTERM')]);

    expect(first).toBe(0);
    expect(second).toBe(0);
    expect(stop).toHaveBeenCalledTimes(1);
  });

  it('resolves to 1 when stopping fails', async () => {
    const shutdown = createShutdown({
      stop: async () => {
        throw new Error('close failed');
      },
      logger,
      timeoutMs: 1000
    });

    await expect(shutdown('SIGTERM')).resolves.toBe(1);
  });

  it('resolves to 1 when stopping outlives the timeout', async () => {
    const shutdown = createShutdown({
      stop: () => new Promise<void>(() => undefined),
      logger,
      timeoutMs: 10
    });

    await expect(shutdown('SIGTERM')).resolves.toBe(1);
  });
});
