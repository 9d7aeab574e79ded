/**
 * Session supervisor: one SessionState per transport, concurrent dispatch,
 * failures turned into error frames instead of ending the session.
 */

import {
  isJsonRpcId,
  RPC_ERROR,
  type JsonRpcId,
  type JsonRpcResponse,
  type Logger,
  type TransportSession
} from '@koboldgate/core';
import { errorMessage, type ProtocolRouter, SessionState } from '@koboldgate/runtime';

export type SessionSupervisorOptions = {
  router: ProtocolRouter;
  logger: Logger;
};

type Attached = {
  state: SessionState;
  transport: TransportSession;
};

/**
 * Best-effort id recovery for a frame the router failed on
 */
function peekId(frame: string): JsonRpcId | null {
  try {
    const message: unknown = JSON.parse(frame);
    if (typeof message === 'object' && message !== null && 'id' in message) {
      return isJsonRpcId(message.id) ? message.id : null;
    }
  } catch {
    // unparseable frame: id unknown
  }
  return null;
}

export class SessionSupervisor {
  private readonly router: ProtocolRouter;
  private readonly logger: Logger;
  private readonly sessions = new Map<string, Attached>();

  constructor(options: SessionSupervisorOptions) {
    this.router = options.router;
    this.logger = options.logger;
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  /**
   * Drive one transport until it closes. Resolves after in-flight requests settle.
   */
  async attach(transport: TransportSession): Promise<void> {
    const state = new SessionState();
    this.sessions.set(state.id, { state, transport });
    this.logger.info({ sessionId: state.id, transport: transport.label }, 'Session opened');

    const inFlight = new Set<Promise<void>>();
    try {
      for (;;) {
        const frame = await transport.receive();
        if (frame === null) break;

        // Not awaited: a slow request must not hold up later frames
        const task: Promise<void> = this.process(frame, state, transport).then(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);
      }
    } catch (error) {
      this.logger.warn({ sessionId: state.id, error }, 'Transport read failed');
    } finally {
      state.close('Transport closed');
      this.sessions.delete(state.id);
      await Promise.all(inFlight);
      this.logger.info({ sessionId: state.id }, 'Session closed');
    }
  }

  /**
   * Close every session, e.g. on shutdown
   */
  async closeAll(code = 1001, reason = 'Server shutting down'): Promise<void> {
    const attached = Array.from(this.sessions.values());
    await Promise.all(
      attached.map(async ({ state, transport }) => {
        state.close(reason);
        try {
          await transport.close(code, reason);
        } catch (error) {
          this.logger.warn({ sessionId: state.id, error }, 'Failed to close transport');
        }
      })
    );
  }

  private async process(
    frame: string,
    state: SessionState,
    transport: TransportSession
  ): Promise<void> {
    let response: JsonRpcResponse | null;
    try {
      response = await this.router.handleFrame(frame, state);
    } catch (error) {
      this.logger.error({ sessionId: state.id, error }, 'Unhandled error processing message');
      response = {
        jsonrpc: '2.0',
        id: peekId(frame),
        error: { code: RPC_ERROR.INTERNAL_ERROR, message: `Internal error: ${errorMessage(error)}` }
      };
    }

    if (!response) return;
    if (state.closed) {
      this.logger.debug({ sessionId: state.id }, 'Discarding response for closed session');
      return;
    }

    try {
      await transport.send(JSON.stringify(response));
    } catch (error) {
      this.logger.debug({ sessionId: state.id, error }, 'Failed to send response');
    }
  }
}
