/**
 * @koboldgate/runtime - session protocol machinery
 */

export * from './error-recovery/index.js';
export {
  abortError,
  AbortedError,
  CapabilityError,
  DuplicateRegistrationError,
  errorMessage,
  GateQueueFullError,
  ProtocolError,
  RegistrySealedError,
  RetryExhaustedError
} from './errors.js';
export { createGate, type Gate, type GateOptions, type Release } from './gate/gate.js';
export * from './registry/index.js';
export * from './router/index.js';
export {
  type ClientInfo,
  InvalidTransitionError,
  type SessionPhase,
  SessionState
} from './session/session-state.js';
export { linkSignals, sleep } from './utils/sleep.js';
