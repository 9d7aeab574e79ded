/**
 * Per-connection protocol state.
 *
 * connected ──initialize──▶ initialized ──initialize──▶ initialized
 *     └────────────close──────────┴──────────▶ closed
 */

import { randomUUID } from 'node:crypto';

export type SessionPhase = 'connected' | 'initialized' | 'closed';

const VALID_TRANSITIONS: Record<SessionPhase, SessionPhase[]> = {
  connected: ['initialized', 'closed'],
  initialized: ['initialized', 'closed'],
  closed: []
};

/** Opaque client-reported info (name, version, ...) */
export type ClientInfo = Record<string, unknown>;

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: SessionPhase,
    public readonly to: SessionPhase
  ) {
    super(`Invalid session transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class SessionState {
  readonly id: string;
  private _phase: SessionPhase = 'connected';
  private _protocolVersion: string | undefined;
  private _clientCapabilities: Record<string, unknown> = {};
  private _clientInfo: ClientInfo | undefined;
  private readonly controller = new AbortController();

  constructor(id: string = randomUUID()) {
    this.id = id;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  get initialized(): boolean {
    return this._phase === 'initialized';
  }

  get closed(): boolean {
    return this._phase === 'closed';
  }

  get protocolVersion(): string | undefined {
    return this._protocolVersion;
  }

  get clientCapabilities(): Readonly<Record<string, unknown>> {
    return this._clientCapabilities;
  }

  get clientInfo(): ClientInfo | undefined {
    return this._clientInfo;
  }

  /** Aborts when the session closes */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  canTransition(to: SessionPhase): boolean {
    return VALID_TRANSITIONS[this._phase].includes(to);
  }

  /**
   * Record the handshake; allowed again on an initialized session
   */
  markInitialized(params: {
    protocolVersion: string;
    capabilities: Record<string, unknown>;
    clientInfo?: ClientInfo;
  }): void {
    this.transition('initialized');
    this._protocolVersion = params.protocolVersion;
    this._clientCapabilities = params.capabilities;
    this._clientInfo = params.clientInfo;
  }

  /**
   * Terminal; aborts in-flight work tied to this session. Idempotent.
   */
  close(reason = 'Session closed'): void {
    if (this._phase === 'closed') return;
    this.transition('closed');
    this.controller.abort(new Error(reason));
  }

  private transition(to: SessionPhase): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this._phase, to);
    }
    this._phase = to;
  }
}
