import { describe, expect, it } from 'vitest';
import { InvalidTransitionError, SessionState } from './session-state.js';

describe('SessionState', () => {
  it('starts connected with a generated id', () => {
    const session = new SessionState();
    expect(session.phase).toBe('connected');
    expect(session.initialized).toBe(false);
    expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('records the handshake', () => {
    const session = new SessionState('s1');
    session.markInitialized({
      protocolVersion: '2024-11-05',
      capabilities: { sampling: {} },
      clientInfo: { name: 'client', version: '1.0' }
    });

    expect(session.phase).toBe('initialized');
    expect(session.protocolVersion).toBe('2024-11-05');
    expect(session.clientCapabilities).toEqual({ sampling: {} });
    expect(session.clientInfo?.name).toBe('client');
  });

  it('allows re-initialize', () => {
    const session = new SessionState('s1');
    session.markInitialized({ protocolVersion: '2024-11-05', capabilities: {} });
    session.markInitialized({ protocolVersion: '2024-11-05', capabilities: { roots: {} } });
    expect(session.clientCapabilities).toEqual({ roots: {} });
  });

  it('aborts its signal on close and stays closed', () => {
    const session = new SessionState('s1');
    session.close('transport gone');

    expect(session.closed).toBe(true);
    expect(session.signal.aborted).toBe(true);
    session.close();
    expect(() =>
      session.markInitialized({ protocolVersion: '2024-11-05', capabilities: {} })
    ).toThrow(InvalidTransitionError);
  });
});
