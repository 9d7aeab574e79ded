import type { MemorySession } from './types.js';

/**
 * In-memory transport session. Frames pushed before `receive` is called are queued.
 */
export function createMemorySession(label = 'memory'): MemorySession {
  const inbound: string[] = [];
  const sent: string[] = [];
  let readers: Array<(frame: string | null) => void> = [];
  let sentWaiters: Array<() => void> = [];
  let ended = false;
  let closedWith: { code?: number; reason?: string } | null = null;
  let sendError: Error | null = null;

  const end = (): void => {
    ended = true;
    const waiting = readers;
    readers = [];
    for (const reader of waiting) reader(null);
  };

  const messages = (): unknown[] => sent.map((frame): unknown => JSON.parse(frame));

  return {
    label,
    get sent() {
      return sent;
    },
    get closedWith() {
      return closedWith;
    },

    push(frame) {
      const text = typeof frame === 'string' ? frame : JSON.stringify(frame);
      const reader = readers.shift();
      if (reader) {
        reader(text);
      } else {
        inbound.push(text);
      }
    },

    end,

    receive() {
      const next = inbound.shift();
      if (next !== undefined) return Promise.resolve(next);
      if (ended) return Promise.resolve(null);
      return new Promise((resolve) => {
        readers.push(resolve);
      });
    },

    async send(frame) {
      if (sendError) throw sendError;
      sent.push(frame);
      const waiting = sentWaiters;
      sentWaiters = [];
      for (const wake of waiting) wake();
    },

    async close(code, reason) {
      closedWith = { code, reason };
      end();
    },

    messages,

    async waitForSent(count) {
      while (sent.length < count) {
        await new Promise<void>((resolve) => {
          sentWaiters.push(resolve);
        });
      }
      return messages();
    },

    failSends(error) {
      sendError = error;
    }
  };
}
