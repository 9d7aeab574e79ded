import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '@koboldgate/core';
import { ProtocolRouter, ResourceRegistry, ToolRegistry } from '@koboldgate/runtime';
import { createMemorySession, waitFor } from '@koboldgate/test-utils';
import { SessionSupervisor } from './supervisor.js';

const INIT = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: { protocolVersion: '2024-11-05', capabilities: {}, clientInfo: { name: 'test' } }
};

function call(id: number, name: string) {
  return { jsonrpc: '2.0', id, method: 'tools/call', params: { name, arguments: {} } };
}

describe('SessionSupervisor', () => {
  let router: ProtocolRouter;
  let supervisor: SessionSupervisor;
  let release: (() => void) | undefined;
  let waitStarted: boolean;
  let waitAborted: boolean;

  beforeEach(() => {
    release = undefined;
    waitStarted = false;
    waitAborted = false;

    const tools = new ToolRegistry();
    const schema = { type: 'object' as const };
    tools.register({ name: 'fast', inputSchema: schema }, async () => 'fast');
    tools.register({ name: 'slow', inputSchema: schema }, async () => {
      await new Promise<void>((resolve) => {
        release = resolve;
      });
      return 'slow';
    });
    tools.register(
      { name: 'wait', inputSchema: schema },
      (_args, ctx) =>
        new Promise((resolve) => {
          waitStarted = true;
          ctx.signal.addEventListener('abort', () => {
            waitAborted = true;
            resolve('cancelled');
          });
        })
    );
    tools.seal();

    const resources = new ResourceRegistry();
    resources.seal();

    const logger = createSilentLogger();
    router = new ProtocolRouter({ tools, resources, logger });
    supervisor = new SessionSupervisor({ router, logger });
  });

  it('answers requests until the transport ends', async () => {
    const session = createMemorySession();
    const attached = supervisor.attach(session);

    session.push(INIT);
    session.push({ jsonrpc: '2.0', method: 'notifications/initialized' });
    session.push({ jsonrpc: '2.0', id: 2, method: 'tools/list' });
    const messages = await session.waitForSent(2);
    session.end();
    await attached;

    expect(messages).toHaveLength(2);
    expect(messages[0]).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { protocolVersion: '2024-11-05' }
    });
    expect(messages[1]).toMatchObject({
      id: 2,
      result: { tools: [{ name: 'fast' }, { name: 'slow' }, { name: 'wait' }] }
    });
  });

  it('dispatches concurrently so responses may complete out of order', async () => {
    const session = createMemorySession();
    const attached = supervisor.attach(session);

    session.push(INIT);
    await session.waitForSent(1);
    session.push(call(2, 'slow'));
    session.push(call(3, 'fast'));

    const early = await session.waitForSent(2);
    expect(early[1]).toMatchObject({
      id: 3,
      result: { content: [{ type: 'text', text: 'fast' }] }
    });

    const resume = await waitFor(() => release);
    resume();
    const all = await session.waitForSent(3);
    expect(all[2]).toMatchObject({
      id: 2,
      result: { content: [{ type: 'text', text: 'slow' }] }
    });

    session.end();
    await attached;
  });

  it('turns an escaped failure into an internal error frame', async () => {
    const session = createMemorySession();
    vi.spyOn(router, 'handleFrame').mockRejectedValueOnce(new Error('boom'));
    const attached = supervisor.attach(session);

    session.push({ jsonrpc: '2.0', id: 7, method: 'tools/list' });
    const [message] = await session.waitForSent(1);
    session.end();
    await attached;

    expect(message).toEqual({
      jsonrpc: '2.0',
      id: 7,
      error: { code: -32603, message: 'Internal error: boom' }
    });
  });

  it('cancels in-flight calls and drops their responses when the session closes', async () => {
    const session = createMemorySession();
    const attached = supervisor.attach(session);

    session.push(INIT);
    await session.waitForSent(1);
    session.push(call(2, 'wait'));
    await waitFor(() => waitStarted);

    session.end();
    await attached;

    expect(waitAborted).toBe(true);
    expect(session.sent).toHaveLength(1);
  });

  it('tracks active sessions', async () => {
    const session = createMemorySession();
    const attached = supervisor.attach(session);
    expect(supervisor.activeSessions).toBe(1);

    session.end();
    await attached;
    expect(supervisor.activeSessions).toBe(0);
  });

  it('closes every transport on shutdown', async () => {
    const first = createMemorySession('first');
    const second = createMemorySession('second');
    const attached = [supervisor.attach(first), supervisor.attach(second)];

    await supervisor.closeAll();
    await Promise.all(attached);

    expect(first.closedWith).toEqual({ code: 1001, reason: 'Server shutting down' });
    expect(second.closedWith).toEqual({ code: 1001, reason: 'Server shutting down' });
    expect(supervisor.activeSessions).toBe(0);
  });

  it('keeps reading after a failed send', async () => {
    const session = createMemorySession();
    const attached = supervisor.attach(session);
    const handleFrame = vi.spyOn(router, 'handleFrame');

    session.failSends(new Error('socket closed'));
    session.push(INIT);
    session.push({ jsonrpc: '2.0', id: 2, method: 'tools/list' });
    await waitFor(() => handleFrame.mock.calls.length === 2);

    session.end();
    await expect(attached).resolves.toBeUndefined();
    expect(session.sent).toHaveLength(0);
  });
});
