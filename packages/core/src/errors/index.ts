export { RPC_ERROR, type RpcErrorCode, describeRpcError, isRpcErrorCode } from './codes.js';
