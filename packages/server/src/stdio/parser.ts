import type { Logger } from '@koboldgate/core';

/**
 * NDJSON line buffer with periodic cleanup of stale partial lines
 */
export type LineBuffer = {
  onData: (chunk: Buffer | string) => void;
  stop: () => void;
};

export function createLineBuffer(options: {
  logger: Logger;
  timeoutMs?: number;
  onLine: (line: string) => void;
}): LineBuffer {
  const { logger, onLine } = options;
  let timeoutMs = 60000;
  if (typeof options.timeoutMs === 'number' && Number.isFinite(options.timeoutMs)) {
    timeoutMs = options.timeoutMs;
  }

  let buffer = '';
  let lastMessageTime = Date.now();
  const interval = setInterval(() => {
    if (buffer.length > 0 && Date.now() - lastMessageTime > timeoutMs) {
      logger.warn('Clearing incomplete message buffer after timeout');
      buffer = '';
    }
  }, 10000);
  interval.unref();

  function onData(chunk: Buffer | string) {
    lastMessageTime = Date.now();
    buffer += chunk.toString();
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      onLine(trimmed);
    }
  }

  function stop() {
    clearInterval(interval);
  }

  return { onData, stop };
}
