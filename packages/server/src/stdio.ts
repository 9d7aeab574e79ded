/**
 * stdio mode: one session over newline-delimited JSON on stdin/stdout
 */

import type { Readable, Writable } from 'node:stream';
import type { Logger, TransportSession } from '@koboldgate/core';
import { createLineBuffer } from './stdio/parser.js';
import { writeFrame } from './stdio/writer.js';
import { createFrameQueue } from './transport/frame-queue.js';

export type StdioSessionOptions = {
  input: Readable;
  output: Writable;
  logger: Logger;
};

export function createStdioSession(options: StdioSessionOptions): TransportSession {
  const { input, output, logger } = options;
  const queue = createFrameQueue();
  const lineBuffer = createLineBuffer({ logger, onLine: (line) => queue.push(line) });

  const finish = (): void => {
    lineBuffer.stop();
    queue.end();
  };

  input.on('data', (chunk: Buffer | string) => {
    lineBuffer.onData(chunk);
  });
  input.on('end', () => {
    logger.info('STDIN closed');
    finish();
  });
  input.on('error', (error: unknown) => {
    logger.error({ error }, 'STDIN error');
    finish();
  });
  input.resume();

  return {
    label: 'stdio',
    receive: () => queue.receive(),
    send: (frame) => writeFrame(output, frame),
    async close() {
      finish();
      input.pause();
    }
  };
}
