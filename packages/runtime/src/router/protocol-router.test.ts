/**
 * Tests for the protocol router
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createSilentLogger, type JsonRpcResponse } from '@koboldgate/core';
import { ResourceRegistry } from '../registry/resource-registry.js';
import { ToolRegistry } from '../registry/tool-registry.js';
import { SessionState } from '../session/session-state.js';
import type { ToolCallAudit } from './handlers.js';
import { ProtocolRouter } from './protocol-router.js';

const INIT = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2024-11-05',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' }
  }
};

function errorCode(response: JsonRpcResponse | null): number | undefined {
  return response && 'error' in response ? response.error.code : undefined;
}

function resultOf(response: JsonRpcResponse | null): unknown {
  return response && 'result' in response ? response.result : undefined;
}

describe('ProtocolRouter', () => {
  let tools: ToolRegistry;
  let resources: ResourceRegistry;
  let audits: ToolCallAudit[];
  let router: ProtocolRouter;
  let session: SessionState;

  beforeEach(() => {
    tools = new ToolRegistry();
    resources = new ResourceRegistry();
    audits = [];

    tools.register(
      { name: 'echo', description: 'Echo text', inputSchema: { type: 'object' } },
      async (args) => ({ type: 'text', text: String(args.text) })
    );
    tools.register(
      { name: 'pair', description: 'Two items', inputSchema: { type: 'object' } },
      async () => [{ type: 'text', text: 'a' }, 'b']
    );
    tools.register(
      { name: 'count', description: 'Number', inputSchema: { type: 'object' } },
      async () => 42
    );
    tools.register(
      { name: 'broken', description: 'Fails', inputSchema: { type: 'object' } },
      async () => {
        throw new Error('Prompt too long');
      }
    );
    resources.register({ uri: 'test://info', name: 'Info' }, async (uri) => ({
      uri,
      mimeType: 'application/json',
      text: '{"ok":true}'
    }));
    resources.register({ uri: 'test://down', name: 'Down' }, async () => {
      throw new Error('backend offline');
    });
    tools.seal();
    resources.seal();

    router = new ProtocolRouter({
      tools,
      resources,
      logger: createSilentLogger(),
      onToolCall: (audit) => audits.push(audit)
    });
    session = new SessionState('session-1');
  });

  const send = (message: unknown) => router.handleMessage(message, session);
  const initialize = () => send(INIT);

  describe('handshake', () => {
    it('advertises the server capabilities', async () => {
      const response = await initialize();

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: {
          protocolVersion: '2024-11-05',
          capabilities: { tools: { listChanged: true }, resources: { listChanged: true } },
          serverInfo: { name: 'koboldgate', version: '0.1.0' }
        }
      });
      expect(session.phase).toBe('initialized');
      expect(session.clientInfo).toEqual({ name: 'test-client', version: '1.0.0' });
    });

    it('rejects an unsupported version and stays uninitialized', async () => {
      const response = await send({
        ...INIT,
        params: { ...INIT.params, protocolVersion: '1999-01-01' }
      });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        error: { code: -32602, message: 'Unsupported protocol version: 1999-01-01' }
      });
      expect(session.initialized).toBe(false);

      expect(resultOf(await initialize())).toBeDefined();
    });

    it('accepts a repeated initialize', async () => {
      await initialize();
      const again = await send({ ...INIT, id: 2 });
      expect(resultOf(again)).toEqual(resultOf(await send({ ...INIT, id: 3 })));
    });

    it.each(['tools/list', 'tools/call', 'resources/list', 'resources/read', 'no/such'])(
      'rejects %s before initialize with -32002',
      async (method) => {
        const response = await send({ jsonrpc: '2.0', id: 'x', method, params: {} });
        expect(response).toEqual({
          jsonrpc: '2.0',
          id: 'x',
          error: { code: -32002, message: 'Server not initialized' }
        });
      }
    );
  });

  describe('framing', () => {
    it('returns -32700 with a null id for malformed JSON', async () => {
      const response = await router.handleFrame('{"jsonrpc": "2.0", "id": 5', session);
      expect(response && 'error' in response ? response.id : 'missing').toBeNull();
      expect(errorCode(response)).toBe(-32700);
    });

    it('returns -32600 for non-object messages', async () => {
      expect(await send([1, 2])).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32600, message: 'Invalid request: expected an object' }
      });
    });

    it('returns -32600 echoing the id when method is missing', async () => {
      const response = await send({ jsonrpc: '2.0', id: 9 });
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 9,
        error: { code: -32600, message: 'Invalid request: missing method' }
      });
    });

    it('never answers notifications', async () => {
      expect(await send({ jsonrpc: '2.0', method: 'notifications/initialized' })).toBeNull();
      expect(await send({ jsonrpc: '2.0', method: 'notifications/unknown' })).toBeNull();
      expect(await send({ jsonrpc: '2.0', method: 'tools/call', params: { name: 'x' } })).toBeNull();
    });

    it('returns -32601 for unknown methods once initialized', async () => {
      await initialize();
      const response = await send({ jsonrpc: '2.0', id: 2, method: 'prompts/list' });
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 2,
        error: { code: -32601, message: 'Method not found: prompts/list' }
      });
    });
  });

  describe('tools', () => {
    beforeEach(async () => {
      await initialize();
    });

    it('lists every registered declaration idempotently', async () => {
      const first = resultOf(await send({ jsonrpc: '2.0', id: 2, method: 'tools/list' }));
      const second = resultOf(await send({ jsonrpc: '2.0', id: 3, method: 'tools/list' }));

      expect(first).toEqual({ tools: tools.list() });
      expect(second).toEqual(first);
    });

    it('wraps a mapping as a single content item', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'echo', arguments: { text: 'hi' } }
      });
      expect(resultOf(response)).toEqual({ content: [{ type: 'text', text: 'hi' }] });
      expect(audits).toEqual([
        { sessionId: 'session-1', tool: 'echo', arguments: { text: 'hi' }, outcome: 'success' }
      ]);
    });

    it('maps a sequence to multiple content items', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'pair' }
      });
      expect(resultOf(response)).toEqual({
        content: [
          { type: 'text', text: 'a' },
          { type: 'text', text: 'b' }
        ]
      });
    });

    it('stringifies scalars', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'count', arguments: {} }
      });
      expect(resultOf(response)).toEqual({ content: [{ type: 'text', text: '42' }] });
    });

    it('reports tool failures as isError results', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'broken', arguments: {} }
      });
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 2,
        result: {
          content: [{ type: 'text', text: 'Tool execution failed: Prompt too long' }],
          isError: true
        }
      });
      expect(audits[0]?.outcome).toBe('error');
    });

    it('returns -32601 for unknown tools', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'missing' }
      });
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 2,
        error: { code: -32601, message: 'Tool not found: missing' }
      });
    });

    it('returns -32602 for a missing name or non-object arguments', async () => {
      const noName = await send({ jsonrpc: '2.0', id: 2, method: 'tools/call', params: {} });
      const badArgs = await send({
        jsonrpc: '2.0',
        id: 3,
        method: 'tools/call',
        params: { name: 'echo', arguments: 'text' }
      });
      expect(errorCode(noName)).toBe(-32602);
      expect(errorCode(badArgs)).toBe(-32602);
    });

    it('passes the session signal to handlers', async () => {
      const seen = vi.fn();
      const registry = new ToolRegistry();
      registry.register(
        { name: 'probe', inputSchema: { type: 'object' } },
        async (_args, ctx) => {
          seen(ctx.sessionId, ctx.signal.aborted);
          return 'ok';
        }
      );
      const probeRouter = new ProtocolRouter({
        tools: registry,
        resources,
        logger: createSilentLogger()
      });
      await probeRouter.handleMessage(
        { jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'probe' } },
        session
      );
      expect(seen).toHaveBeenCalledWith('session-1', false);
    });
  });

  describe('resources', () => {
    beforeEach(async () => {
      await initialize();
    });

    it('lists resources', async () => {
      const response = await send({ jsonrpc: '2.0', id: 2, method: 'resources/list' });
      expect(resultOf(response)).toEqual({
        resources: [
          { uri: 'test://info', name: 'Info' },
          { uri: 'test://down', name: 'Down' }
        ]
      });
    });

    it('reads a registered resource', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 2,
        method: 'resources/read',
        params: { uri: 'test://info' }
      });
      expect(resultOf(response)).toEqual({
        contents: [{ uri: 'test://info', mimeType: 'application/json', text: '{"ok":true}' }]
      });
    });

    it('returns -32602 without a uri', async () => {
      const response = await send({ jsonrpc: '2.0', id: 2, method: 'resources/read', params: {} });
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 2,
        error: { code: -32602, message: 'Missing required parameter: uri' }
      });
    });

    it('treats an empty uri as missing', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 3,
        method: 'resources/read',
        params: { uri: '' }
      });
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 3,
        error: { code: -32602, message: 'Missing required parameter: uri' }
      });
    });

    it('returns -32601 for unknown uris', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 2,
        method: 'resources/read',
        params: { uri: 'test://nope' }
      });
      expect(errorCode(response)).toBe(-32601);
    });

    it('returns -32603 when the handler fails', async () => {
      const response = await send({
        jsonrpc: '2.0',
        id: 2,
        method: 'resources/read',
        params: { uri: 'test://down' }
      });
      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 2,
        error: { code: -32603, message: 'Resource read failed: backend offline' }
      });
    });
  });
});
