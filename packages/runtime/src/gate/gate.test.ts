/**
 * Tests for the concurrency gate
 */

import { describe, expect, it } from 'vitest';
import { AbortedError, GateQueueFullError } from '../errors.js';
import { createGate } from './gate.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('createGate', () => {
  it('rejects invalid limits', () => {
    expect(() => createGate(0)).toThrow(RangeError);
  });

  it('admits up to the limit immediately', async () => {
    const gate = createGate(2);
    const first = await gate.acquire();
    await gate.acquire();

    expect(gate.active).toBe(2);
    first();
    expect(gate.active).toBe(1);
  });

  it('never exceeds the limit under load', async () => {
    const gate = createGate(3);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 10 }, () =>
        gate.run(async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise((resolve) => setTimeout(resolve, 5));
          running--;
        })
      )
    );

    expect(peak).toBe(3);
    expect(gate.active).toBe(0);
  });

  it('hands slots to waiters in FIFO order', async () => {
    const gate = createGate(1);
    const order: number[] = [];
    const release = await gate.acquire();

    const waiting = [1, 2, 3].map((n) => gate.run(() => order.push(n)));
    expect(gate.pending).toBe(3);

    release();
    await Promise.all(waiting);
    expect(order).toEqual([1, 2, 3]);
  });

  it('releases the slot when the task throws', async () => {
    const gate = createGate(1);
    await expect(gate.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(gate.active).toBe(0);
  });

  it('ignores a second release call', async () => {
    const gate = createGate(2);
    const release = await gate.acquire();
    await gate.acquire();
    release();
    release();
    expect(gate.active).toBe(1);
  });

  it('rejects waiters beyond the queue limit', async () => {
    const gate = createGate(1, { queueLimit: 1 });
    const release = await gate.acquire();
    const queued = gate.acquire();

    await expect(gate.acquire()).rejects.toBeInstanceOf(GateQueueFullError);

    release();
    const next = await queued;
    next();
    expect(gate.active).toBe(0);
  });

  it('removes an aborted waiter from the queue', async () => {
    const gate = createGate(1);
    const release = await gate.acquire();
    const controller = new AbortController();

    const waiting = gate.acquire(controller.signal);
    await tick();
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(AbortedError);
    expect(gate.pending).toBe(0);
    release();
    expect(gate.active).toBe(0);
  });
});
