import type { RpcMethod } from '../types/rpc.js';

/**
 * RPC method name constants. Single source of truth.
 * Keep values strictly equal to RpcMethod literals.
 */
export const RPC_METHOD = {
  initialize: 'initialize',
  tools_list: 'tools/list',
  tools_call: 'tools/call',
  resources_list: 'resources/list',
  resources_read: 'resources/read'
} as const satisfies Record<string, RpcMethod>;

export type RpcMethodValue = (typeof RPC_METHOD)[keyof typeof RPC_METHOD];
