/**
 * Transient error detection for backend calls
 */

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EPIPE',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET'
]);

/** Gateway-class statuses worth retrying */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([502, 503, 504]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Connection failures and timeouts, including ones wrapped in `cause`
 * (undici's fetch reports "fetch failed" with the socket error as cause).
 */
export function isTransientError(error: unknown, depth = 0): boolean {
  if (!error || depth > 3) return false;

  if (error instanceof Error) {
    if (error.name === 'TimeoutError') return true;
    const code = errorCode(error);
    if (code && TRANSIENT_CODES.has(code)) return true;

    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('socket hang up')
    ) {
      return true;
    }
    return isTransientError(error.cause, depth + 1);
  }

  const code = errorCode(error);
  return code !== undefined && TRANSIENT_CODES.has(code);
}
