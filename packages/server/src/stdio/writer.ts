import { once } from 'node:events';
import type { Writable } from 'node:stream';

/**
 * Write one newline-delimited frame, waiting for drain under backpressure
 */
export async function writeFrame(stream: Writable, frame: string): Promise<void> {
  if (!stream.write(`${frame}\n`)) {
    await once(stream, 'drain');
  }
}
