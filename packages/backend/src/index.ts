/**
 * @koboldgate/backend - resilient KoboldCpp client
 */

export {
  BackendClient,
  type BackendClientOptions,
  type BatchOptions,
  type DispatcherFactory,
  FAILED_GENERATION
} from './backend-client.js';
export {
  BackendClosedError,
  BackendError,
  BackendHttpError,
  BackendQueueFullError,
  BackendResponseError,
  BackendRetryExhaustedError,
  BackendTimeoutError
} from './errors.js';
export {
  buildChatBody,
  buildGenerateBody,
  DEFAULT_CONTEXT_LENGTH,
  estimateTokens,
  GENERATION_DEFAULTS,
  tokensPerSecond
} from './mapping.js';
