/**
 * Backend client errors
 */

import { RETRYABLE_STATUSES } from '@koboldgate/runtime';

const BODY_PREVIEW = 500;

export class BackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendError';
  }
}

/**
 * Non-2xx response; the body is kept for diagnostics
 */
export class BackendHttpError extends BackendError {
  readonly retryable: boolean;

  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(`HTTP ${status}: ${body.slice(0, BODY_PREVIEW)}`);
    this.name = 'BackendHttpError';
    this.retryable = RETRYABLE_STATUSES.has(status);
  }
}

export class BackendTimeoutError extends BackendError {
  constructor(
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Backend request timed out after ${timeoutMs}ms`, options);
    this.name = 'BackendTimeoutError';
  }
}

export class BackendRetryExhaustedError extends BackendError {
  constructor(
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Backend request failed after ${attempts} attempts${detail}`, options);
    this.name = 'BackendRetryExhaustedError';
  }
}

/**
 * Malformed or unusable response body
 */
export class BackendResponseError extends BackendError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendResponseError';
  }
}

export class BackendQueueFullError extends BackendError {
  constructor(
    public readonly queueLimit: number,
    options?: { cause?: unknown }
  ) {
    super(`Backend request queue is full (${queueLimit} waiting)`, options);
    this.name = 'BackendQueueFullError';
  }
}

export class BackendClosedError extends BackendError {
  constructor() {
    super('Backend client is disconnecting');
    this.name = 'BackendClosedError';
  }
}
