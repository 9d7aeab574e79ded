/**
 * WebSocket mode: one session per connection, health check on plain HTTP
 */

import { createServer } from 'node:http';
import { getRequestListener } from '@hono/node-server';
import type { Logger, Settings } from '@koboldgate/core';
import type { SessionSupervisor } from '@koboldgate/gateway';
import { WebSocketServer } from 'ws';
import { createHealthApp } from './health.js';
import { createWebSocketSession } from './transport/ws-session.js';

export const CLOSE_POLICY_VIOLATION = 1008;
export const CLOSE_TRY_AGAIN_LATER = 1013;

export type WebSocketServerOptions = {
  settings: Settings;
  supervisor: SessionSupervisor;
  logger: Logger;
  startedAt?: number;
};

export type WebSocketServerHandle = {
  readonly host: string;
  readonly port: number;
  close(): Promise<void>;
};

/**
 * `*` allows any origin; requests without an Origin header are not from browsers
 */
export function isOriginAllowed(origin: string | undefined, allowed: readonly string[]): boolean {
  if (allowed.includes('*') || origin === undefined) return true;
  return allowed.includes(origin);
}

export async function startWebSocketServer(
  options: WebSocketServerOptions
): Promise<WebSocketServerHandle> {
  const { settings, supervisor, logger } = options;
  const { host, port, maxConnections, maxMessageBytes, pingIntervalMs, pingTimeoutMs } =
    settings.server;

  const app = createHealthApp({
    sessions: supervisor,
    maxConnections,
    backendUrl: settings.backend.url,
    startedAt: options.startedAt ?? Date.now()
  });
  const server = createServer(getRequestListener(app.fetch));
  const wss = new WebSocketServer({ server, maxPayload: maxMessageBytes });

  wss.on('connection', (socket, request) => {
    const label = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
    const origin = request.headers.origin;

    if (!isOriginAllowed(origin, settings.security.allowedOrigins)) {
      logger.warn({ label, origin }, 'Rejected connection from disallowed origin');
      socket.close(CLOSE_POLICY_VIOLATION, 'Origin not allowed');
      return;
    }
    if (supervisor.activeSessions >= maxConnections) {
      logger.warn({ label, maxConnections }, 'Connection limit reached');
      socket.close(CLOSE_TRY_AGAIN_LATER, 'Server at capacity');
      return;
    }

    const session = createWebSocketSession(socket, label, {
      pingIntervalMs,
      pingTimeoutMs,
      logger
    });
    supervisor.attach(session).catch((error: unknown) => {
      logger.error({ label, error }, 'Session ended with an error');
    });
  });

  wss.on('error', (error) => {
    logger.error({ error }, 'WebSocket server error');
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;

  logger.info(`koboldgate listening on ws://${host}:${boundPort}`);
  logger.info(`Health check: http://${host}:${boundPort}/health`);

  return {
    host,
    port: boundPort,
    async close() {
      await supervisor.closeAll();
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      });
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
  };
}
