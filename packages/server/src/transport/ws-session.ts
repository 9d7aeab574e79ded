/**
 * WebSocket connection as a TransportSession, with ping/pong keepalive
 */

import type { EventEmitter } from 'node:events';
import type { Logger, TransportSession } from '@koboldgate/core';
import { WebSocket } from 'ws';
import { createFrameQueue } from './frame-queue.js';

/** The parts of a `ws` socket the session uses */
export type SocketLike = EventEmitter & {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  ping(): void;
  terminate(): void;
};

export type WebSocketSessionOptions = {
  pingIntervalMs: number;
  pingTimeoutMs: number;
  logger: Logger;
};

function toText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((part): part is Buffer => Buffer.isBuffer(part))).toString(
      'utf8'
    );
  }
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return String(data);
}

export function createWebSocketSession(
  socket: SocketLike,
  label: string,
  options: WebSocketSessionOptions
): TransportSession {
  const { logger } = options;
  const queue = createFrameQueue();
  let pongTimer: NodeJS.Timeout | undefined;

  const clearPongTimer = (): void => {
    if (pongTimer) {
      clearTimeout(pongTimer);
      pongTimer = undefined;
    }
  };

  const keepalive = setInterval(() => {
    if (socket.readyState !== WebSocket.OPEN) return;
    clearPongTimer();
    socket.ping();
    pongTimer = setTimeout(() => {
      logger.warn({ label }, 'Ping timeout, terminating connection');
      socket.terminate();
    }, options.pingTimeoutMs);
  }, options.pingIntervalMs);
  keepalive.unref();

  const stop = (): void => {
    clearInterval(keepalive);
    clearPongTimer();
    queue.end();
  };

  socket.on('message', (data: unknown) => {
    queue.push(toText(data));
  });
  socket.on('pong', clearPongTimer);
  socket.on('close', stop);
  socket.on('error', (error: unknown) => {
    logger.warn({ label, error }, 'WebSocket error');
  });

  return {
    label,

    receive: () => queue.receive(),

    send(frame) {
      if (socket.readyState !== WebSocket.OPEN) {
        return Promise.reject(new Error('WebSocket is not open'));
      }
      return new Promise((resolve, reject) => {
        socket.send(frame, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },

    async close(code = 1000, reason = 'Normal closure') {
      stop();
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
        socket.close(code, reason);
      }
    }
  };
}
