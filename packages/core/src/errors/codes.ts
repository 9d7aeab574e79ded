import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

/**
 * JSON-RPC error codes used on the wire.
 * Standard codes follow the MCP SDK; NOT_INITIALIZED is gateway-defined.
 */
export const RPC_ERROR = {
  PARSE_ERROR: ErrorCode.ParseError,
  INVALID_REQUEST: ErrorCode.InvalidRequest,
  METHOD_NOT_FOUND: ErrorCode.MethodNotFound,
  INVALID_PARAMS: ErrorCode.InvalidParams,
  INTERNAL_ERROR: ErrorCode.InternalError,
  NOT_INITIALIZED: -32002
} as const;

export type RpcErrorCode = (typeof RPC_ERROR)[keyof typeof RPC_ERROR];

const RPC_ERROR_NAMES: Record<RpcErrorCode, string> = {
  [RPC_ERROR.PARSE_ERROR]: 'Parse error',
  [RPC_ERROR.INVALID_REQUEST]: 'Invalid request',
  [RPC_ERROR.METHOD_NOT_FOUND]: 'Method not found',
  [RPC_ERROR.INVALID_PARAMS]: 'Invalid params',
  [RPC_ERROR.INTERNAL_ERROR]: 'Internal error',
  [RPC_ERROR.NOT_INITIALIZED]: 'Server not initialized'
};

export function isRpcErrorCode(code: number): code is RpcErrorCode {
  return Object.values(RPC_ERROR).some((value) => value === code);
}

/**
 * Human label for a code, used when a handler supplies no message
 */
export function describeRpcError(code: number): string {
  return isRpcErrorCode(code) ? RPC_ERROR_NAMES[code] : `Unknown error (${code})`;
}
