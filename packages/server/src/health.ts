/**
 * Health endpoint served on the same HTTP server as the WebSocket upgrade
 */

import { Hono } from 'hono';

export type HealthOptions = {
  sessions: { readonly activeSessions: number };
  maxConnections: number;
  backendUrl: string;
  startedAt: number;
  now?: () => number;
};

export function createHealthApp(options: HealthOptions): Hono {
  const now = options.now ?? Date.now;
  const app = new Hono();

  app.get('/health', (c) =>
    c.json({
      status: 'healthy',
      activeSessions: options.sessions.activeSessions,
      maxConnections: options.maxConnections,
      backendUrl: options.backendUrl,
      uptime: (now() - options.startedAt) / 1000
    })
  );

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}
