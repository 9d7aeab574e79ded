/**
 * Protocol router - one instance shared by all sessions; per-session state lives in SessionState.
 *
 * Turns one inbound frame into at most one response. Never throws: any failure
 * becomes an error response so a single bad message cannot end the connection.
 */

import {
  isJsonRpcId,
  isRecord,
  RPC_ERROR,
  RPC_METHOD,
  RPC_NOTIFICATION,
  type JsonRpcId,
  type JsonRpcParams,
  type JsonRpcResponse,
  type Logger
} from '@koboldgate/core';
import { errorMessage } from '../errors.js';
import type { ResourceRegistry } from '../registry/resource-registry.js';
import type { ToolRegistry } from '../registry/tool-registry.js';
import type { SessionState } from '../session/session-state.js';
import { isRpcMethod, RPC_DISPATCH } from './dispatch.js';
import type { RouterContext, ToolCallAudit } from './handlers.js';
import { errorToolResult } from './normalize.js';
import { type HandlerOutcome, protocolFault } from './outcome.js';

export type ProtocolRouterOptions = {
  tools: ToolRegistry;
  resources: ResourceRegistry;
  logger: Logger;
  onToolCall?: (audit: ToolCallAudit) => void;
};

function errorResponse(id: JsonRpcId | null, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

export class ProtocolRouter {
  private readonly ctx: RouterContext;

  constructor(options: ProtocolRouterOptions) {
    this.ctx = {
      tools: options.tools,
      resources: options.resources,
      logger: options.logger,
      onToolCall: options.onToolCall
    };
  }

  /**
   * Handle one raw text frame. Returns null when nothing should be sent.
   */
  async handleFrame(frame: string, session: SessionState): Promise<JsonRpcResponse | null> {
    let message: unknown;
    try {
      message = JSON.parse(frame);
    } catch (error) {
      return errorResponse(null, RPC_ERROR.PARSE_ERROR, `Parse error: ${errorMessage(error)}`);
    }
    return this.handleMessage(message, session);
  }

  /**
   * Handle one decoded message
   */
  async handleMessage(message: unknown, session: SessionState): Promise<JsonRpcResponse | null> {
    if (!isRecord(message)) {
      return errorResponse(null, RPC_ERROR.INVALID_REQUEST, 'Invalid request: expected an object');
    }

    const hasId = 'id' in message;
    const id = isJsonRpcId(message.id) ? message.id : null;
    const method = message.method;

    if (typeof method !== 'string') {
      return errorResponse(id, RPC_ERROR.INVALID_REQUEST, 'Invalid request: missing method');
    }
    if (message.params !== undefined && !isRecord(message.params)) {
      if (!hasId) return null;
      return errorResponse(id, RPC_ERROR.INVALID_PARAMS, 'Invalid params: expected an object');
    }
    const params: JsonRpcParams = isRecord(message.params) ? message.params : {};

    if (!hasId) {
      this.handleNotification(method, params, session);
      return null;
    }
    if (id === null) {
      return errorResponse(
        null,
        RPC_ERROR.INVALID_REQUEST,
        'Invalid request: id must be a string or number'
      );
    }

    try {
      return this.toResponse(id, await this.dispatch(method, params, session));
    } catch (error) {
      this.ctx.logger.error({ method, error }, 'Request handler error');
      return errorResponse(id, RPC_ERROR.INTERNAL_ERROR, `Internal error: ${errorMessage(error)}`);
    }
  }

  private async dispatch(
    method: string,
    params: JsonRpcParams,
    session: SessionState
  ): Promise<HandlerOutcome> {
    // Guards every handler except the handshake, known method or not
    if (method !== RPC_METHOD.initialize && !session.initialized) {
      return protocolFault(RPC_ERROR.NOT_INITIALIZED);
    }
    if (!isRpcMethod(method)) {
      return protocolFault(RPC_ERROR.METHOD_NOT_FOUND, `Method not found: ${method}`);
    }
    return RPC_DISPATCH[method](this.ctx, params, session);
  }

  private toResponse(id: JsonRpcId, outcome: HandlerOutcome): JsonRpcResponse {
    switch (outcome.kind) {
      case 'success':
        return { jsonrpc: '2.0', id, result: outcome.result };
      case 'capability_error':
        return { jsonrpc: '2.0', id, result: errorToolResult(outcome.message) };
      case 'protocol_fault':
        return { jsonrpc: '2.0', id, error: outcome.error.toErrorObject() };
    }
  }

  private handleNotification(method: string, params: JsonRpcParams, session: SessionState): void {
    switch (method) {
      case RPC_NOTIFICATION.initialized:
        this.ctx.logger.info({ sessionId: session.id }, 'Client initialized');
        return;
      case RPC_NOTIFICATION.cancelled:
        this.ctx.logger.debug(
          { sessionId: session.id, requestId: params.requestId },
          'Client cancelled request'
        );
        return;
      default:
        this.ctx.logger.warn({ sessionId: session.id, method }, 'Unknown notification dropped');
    }
  }
}
