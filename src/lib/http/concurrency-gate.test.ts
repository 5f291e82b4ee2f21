import { describe, expect, it } from 'vitest';

import { createConcurrencyGate } from '@/lib/http/concurrency-gate';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createConcurrencyGate', () => {
  it('never admits more than the limit at once', async () => {
    const gate = createConcurrencyGate(2);
    let current = 0;
    let peak = 0;

    const tasks = Array.from({ length: 6 }, (_, i) =>
      gate.run(async () => {
        current += 1;
        peak = Math.max(peak, current);
        await new Promise((r) => setTimeout(r, 5));
        current -= 1;
        return i;
      }),
    );

    expect(await Promise.all(tasks)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
    expect(gate.inFlight()).toBe(0);
  });

  it('queues callers once saturated and admits them in order', async () => {
    const gate = createConcurrencyGate(1);
    const first = deferred();
    const order: string[] = [];

    const a = gate.run(async () => {
      order.push('a');
      await first.promise;
    });
    const b = gate.run(async () => {
      order.push('b');
    });
    const c = gate.run(async () => {
      order.push('c');
    });

    await Promise.resolve();
    expect(gate.inFlight()).toBe(1);
    expect(gate.waiting()).toBe(2);

    first.resolve();
    await Promise.all([a, b, c]);
    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('releases the slot when the task throws', async () => {
    const gate = createConcurrencyGate(1);
    await expect(gate.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await gate.run(async () => 'next')).toBe('next');
  });

  it('treats a non-positive limit as one', () => {
    expect(createConcurrencyGate(0).limit).toBe(1);
  });
});
