/**
 * Runtime error types
 */

import { describeRpcError, type JsonRpcErrorObject } from '@koboldgate/core';

/**
 * A failure that must reach the client as a JSON-RPC error object
 */
export class ProtocolError extends Error {
  constructor(
    public readonly code: number,
    message?: string,
    public readonly data?: unknown
  ) {
    super(message ?? describeRpcError(code));
    this.name = 'ProtocolError';
  }

  toErrorObject(): JsonRpcErrorObject {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

/**
 * A tool's own failure; shown to the client as an `isError` result
 */
export class CapabilityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CapabilityError';
  }
}

export class RegistrySealedError extends Error {
  constructor(kind: string, key: string) {
    super(`Cannot register ${kind} '${key}': registry is sealed`);
    this.name = 'RegistrySealedError';
  }
}

export class DuplicateRegistrationError extends Error {
  constructor(kind: string, key: string) {
    super(`Duplicate ${kind}: ${key}`);
    this.name = 'DuplicateRegistrationError';
  }
}

export class GateQueueFullError extends Error {
  constructor(public readonly queueLimit: number) {
    super(`Request queue is full (${queueLimit} waiting)`);
    this.name = 'GateQueueFullError';
  }
}

export class AbortedError extends Error {
  constructor(message = 'Operation aborted', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AbortedError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`Request failed after ${attempts} attempts`, options);
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Error raised for an aborted signal, keeping an Error reason as cause
 */
export function abortError(signal: AbortSignal): AbortedError {
  const reason: unknown = signal.reason;
  if (reason instanceof AbortedError) {
    return reason;
  }
  const message = reason instanceof Error ? reason.message : 'Operation aborted';
  return new AbortedError(message, { cause: reason });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
