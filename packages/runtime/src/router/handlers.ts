/**
 * JSON-RPC method handlers. Each returns an explicit HandlerOutcome.
 */

import {
  isRecord,
  PROTOCOL_VERSION,
  RPC_ERROR,
  SERVER_CAPABILITIES,
  SERVER_INFO,
  type CapabilityContext,
  type JsonRpcParams,
  type Logger
} from '@koboldgate/core';
import type { ResourceRegistry } from '../registry/resource-registry.js';
import type { ToolRegistry } from '../registry/tool-registry.js';
import { errorMessage } from '../errors.js';
import type { ClientInfo, SessionState } from '../session/session-state.js';
import { normalizeToolResult } from './normalize.js';
import { capabilityError, type HandlerOutcome, protocolFault, success } from './outcome.js';

export type ToolCallAudit = {
  sessionId: string;
  tool: string;
  arguments: Record<string, unknown>;
  outcome: 'success' | 'error';
};

export type RouterContext = {
  tools: ToolRegistry;
  resources: ResourceRegistry;
  logger: Logger;
  onToolCall?: (audit: ToolCallAudit) => void;
};

function capabilityContext(ctx: RouterContext, session: SessionState): CapabilityContext {
  return {
    sessionId: session.id,
    signal: session.signal,
    logger: ctx.logger.child?.(session.id.slice(0, 8)) ?? ctx.logger
  };
}

export async function handleInitialize(
  ctx: RouterContext,
  params: JsonRpcParams,
  session: SessionState
): Promise<HandlerOutcome> {
  const version = params.protocolVersion;
  if (version !== PROTOCOL_VERSION) {
    return protocolFault(
      RPC_ERROR.INVALID_PARAMS,
      `Unsupported protocol version: ${typeof version === 'string' ? version : String(version)}`
    );
  }

  const capabilities = isRecord(params.capabilities) ? params.capabilities : {};
  const clientInfo: ClientInfo | undefined = isRecord(params.clientInfo)
    ? params.clientInfo
    : undefined;
  const reinit = session.initialized;

  session.markInitialized({ protocolVersion: version, capabilities, clientInfo });
  ctx.logger.info(
    { sessionId: session.id, client: clientInfo?.name ?? 'unknown', reinit },
    'Session initialized'
  );

  return success({
    protocolVersion: PROTOCOL_VERSION,
    capabilities: SERVER_CAPABILITIES,
    serverInfo: SERVER_INFO
  });
}

export async function handleToolsList(ctx: RouterContext): Promise<HandlerOutcome> {
  return success({ tools: ctx.tools.list() });
}

export async function handleToolsCall(
  ctx: RouterContext,
  params: JsonRpcParams,
  session: SessionState
): Promise<HandlerOutcome> {
  const name = params.name;
  if (typeof name !== 'string') {
    return protocolFault(RPC_ERROR.INVALID_PARAMS, 'Missing required parameter: name');
  }
  const args = params.arguments ?? {};
  if (!isRecord(args)) {
    return protocolFault(RPC_ERROR.INVALID_PARAMS, 'Tool arguments must be an object');
  }

  const entry = ctx.tools.get(name);
  if (!entry) {
    return protocolFault(RPC_ERROR.METHOD_NOT_FOUND, `Tool not found: ${name}`);
  }

  try {
    const value = await entry.handler(args, capabilityContext(ctx, session));
    ctx.onToolCall?.({ sessionId: session.id, tool: name, arguments: args, outcome: 'success' });
    return success(normalizeToolResult(value));
  } catch (error) {
    ctx.logger.error({ tool: name, error }, 'Tool execution error');
    ctx.onToolCall?.({ sessionId: session.id, tool: name, arguments: args, outcome: 'error' });
    return capabilityError(`Tool execution failed: ${errorMessage(error)}`);
  }
}

export async function handleResourcesList(ctx: RouterContext): Promise<HandlerOutcome> {
  return success({ resources: ctx.resources.list() });
}

export async function handleResourcesRead(
  ctx: RouterContext,
  params: JsonRpcParams,
  session: SessionState
): Promise<HandlerOutcome> {
  const uri = params.uri;
  if (typeof uri !== 'string' || uri === '') {
    return protocolFault(RPC_ERROR.INVALID_PARAMS, 'Missing required parameter: uri');
  }

  const entry = ctx.resources.get(uri);
  if (!entry) {
    return protocolFault(RPC_ERROR.METHOD_NOT_FOUND, `Resource not found: ${uri}`);
  }

  try {
    const contents = await entry.handler(uri, capabilityContext(ctx, session));
    return success({ contents: [contents] });
  } catch (error) {
    ctx.logger.error({ uri, error }, 'Resource read error');
    return protocolFault(RPC_ERROR.INTERNAL_ERROR, `Resource read failed: ${errorMessage(error)}`);
  }
}
