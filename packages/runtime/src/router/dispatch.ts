/**
 * RPC dispatch table
 * Maps method name to handler function.
 */

import { RPC_METHOD, type JsonRpcParams, type RpcMethod } from '@koboldgate/core';
import type { SessionState } from '../session/session-state.js';
import {
  handleInitialize,
  handleResourcesList,
  handleResourcesRead,
  handleToolsCall,
  handleToolsList,
  type RouterContext
} from './handlers.js';
import type { HandlerOutcome } from './outcome.js';

export type RpcHandler = (
  ctx: RouterContext,
  params: JsonRpcParams,
  session: SessionState
) => Promise<HandlerOutcome>;

export const RPC_DISPATCH = {
  [RPC_METHOD.initialize]: handleInitialize,
  [RPC_METHOD.tools_list]: (ctx) => handleToolsList(ctx),
  [RPC_METHOD.tools_call]: handleToolsCall,
  [RPC_METHOD.resources_list]: (ctx) => handleResourcesList(ctx),
  [RPC_METHOD.resources_read]: handleResourcesRead
} as const satisfies Record<RpcMethod, RpcHandler>;

// Type guard for dynamic method strings
export function isRpcMethod(method: string): method is RpcMethod {
  return Object.prototype.hasOwnProperty.call(RPC_DISPATCH, method);
}
