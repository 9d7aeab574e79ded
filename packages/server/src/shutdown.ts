/**
 * Graceful shutdown on SIGINT/SIGTERM
 */

import type { Logger } from '@koboldgate/core';

export type ShutdownOptions = {
  stop: () => Promise<void>;
  logger: Logger;
  timeoutMs?: number;
};

/**
 * Returns a handler that stops once and resolves to the exit code.
 * A stop that outlives the timeout resolves to 1.
 */
export function createShutdown(options: ShutdownOptions): (reason: string) => Promise<number> {
  const { stop, logger } = options;
  const timeoutMs =
    options.timeoutMs ?? Number(process.env.KOBOLDGATE_SHUTDOWN_TIMEOUT_MS ?? 5000);
  let pending: Promise<number> | undefined;

  return (reason) => {
    if (pending) return pending;
    logger.info(`Received ${reason}, starting graceful shutdown (timeout=${timeoutMs}ms)...`);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<number>((resolve) => {
      timer = setTimeout(() => {
        logger.warn('Shutdown timed out');
        resolve(1);
      }, timeoutMs);
    });
    const stopped = stop().then(
      () => {
        logger.info('Shutdown complete');
        return 0;
      },
      (error: unknown) => {
        logger.error({ error }, 'Error during shutdown');
        return 1;
      }
    );

    pending = Promise.race([stopped, timeout]).finally(() => clearTimeout(timer));
    return pending;
  };
}

export function installSignalHandlers(shutdown: (reason: string) => Promise<number>): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal).then((code) => process.exit(code));
    });
  }
}
