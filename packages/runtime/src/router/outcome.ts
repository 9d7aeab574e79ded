/**
 * Explicit handler outcomes.
 *
 * - success: payload becomes the response `result`
 * - capability_error: the tool reported a problem; still a successful response, flagged `isError`
 * - protocol_fault: the request itself failed; becomes a response `error`
 */

import { ProtocolError } from '../errors.js';

export type HandlerOutcome =
  | { kind: 'success'; result: unknown }
  | { kind: 'capability_error'; message: string }
  | { kind: 'protocol_fault'; error: ProtocolError };

export const success = (result: unknown): HandlerOutcome => ({ kind: 'success', result });

export const capabilityError = (message: string): HandlerOutcome => ({
  kind: 'capability_error',
  message
});

export const protocolFault = (code: number, message?: string, data?: unknown): HandlerOutcome => ({
  kind: 'protocol_fault',
  error: new ProtocolError(code, message, data)
});
