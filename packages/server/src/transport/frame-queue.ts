/**
 * Inbound frame queue behind `TransportSession.receive`
 */
export type FrameQueue = {
  push(frame: string): void;
  end(): void;
  receive(): Promise<string | null>;
  readonly ended: boolean;
};

export function createFrameQueue(): FrameQueue {
  const frames: string[] = [];
  let readers: Array<(frame: string | null) => void> = [];
  let ended = false;

  return {
    get ended() {
      return ended;
    },

    push(frame) {
      if (ended) return;
      const reader = readers.shift();
      if (reader) {
        reader(frame);
      } else {
        frames.push(frame);
      }
    },

    end() {
      if (ended) return;
      ended = true;
      const waiting = readers;
      readers = [];
      for (const reader of waiting) reader(null);
    },

    receive() {
      const next = frames.shift();
      if (next !== undefined) return Promise.resolve(next);
      if (ended) return Promise.resolve(null);
      return new Promise((resolve) => {
        readers.push(resolve);
      });
    }
  };
}
