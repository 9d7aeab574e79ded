import type { WaitForOptions } from './types.js';

/**
 * Wait for a condition to become truthy
 */
export async function waitFor<T>(
  predicate: () => T | Promise<T>,
  options: WaitForOptions = {}
): Promise<NonNullable<T>> {
  const {
    timeout = 2000,
    interval = 10,
    errorMessage = 'Timeout waiting for condition'
  } = options;

  const startTime = Date.now();
  let lastError: unknown;

  while (Date.now() - startTime < timeout) {
    try {
      const result = await predicate();
      if (result) {
        return result;
      }
    } catch (error) {
      lastError = error;
    }

    await delay(interval);
  }

  const detail = lastError instanceof Error ? `: ${lastError.message}` : '';
  throw new Error(`${errorMessage} (timeout: ${timeout}ms)${detail}`);
}

/**
 * Wait for a specific amount of time
 */
export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
