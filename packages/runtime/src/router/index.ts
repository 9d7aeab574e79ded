export { isRpcMethod, RPC_DISPATCH, type RpcHandler } from './dispatch.js';
export type { RouterContext, ToolCallAudit } from './handlers.js';
export { errorToolResult, normalizeToolResult } from './normalize.js';
export {
  capabilityError,
  type HandlerOutcome,
  protocolFault,
  success
} from './outcome.js';
export { ProtocolRouter, type ProtocolRouterOptions } from './protocol-router.js';
