import type { TransportSession } from '@koboldgate/core';

export type WaitForOptions = {
  timeout?: number;
  interval?: number;
  errorMessage?: string;
};

/**
 * Transport session driven from the test side
 */
export type MemorySession = TransportSession & {
  /** Deliver a frame as if the client sent it */
  push(frame: string | object): void;
  /** Simulate the client disconnecting */
  end(): void;
  /** Frames the server sent, in order */
  readonly sent: string[];
  /** Sent frames parsed as JSON */
  messages(): unknown[];
  /** Resolves once at least `count` frames have been sent */
  waitForSent(count: number): Promise<unknown[]>;
  readonly closedWith: { code?: number; reason?: string } | null;
  /** Make the next `send` calls reject */
  failSends(error: Error): void;
};
