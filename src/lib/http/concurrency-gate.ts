export type ConcurrencyGate = {
  readonly limit: number;
  run: <T>(fn: () => Promise<T>) => Promise<T>;
  inFlight: () => number;
  waiting: () => number;
};

/**
 * Counting semaphore bounding in-flight work for one connector session.
 * Waiters are admitted in FIFO order.
 */
export function createConcurrencyGate(limit: number): ConcurrencyGate {
  const capacity = Math.max(1, Math.floor(limit));
  let active = 0;
  const queue: Array<() => void> = [];

  function acquire(): Promise<void> {
    if (active < capacity) {
      active += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      // The releasing task hands its slot over directly, so `active` stays unchanged.
      queue.push(resolve);
    });
  }

  function release() {
    const next = queue.shift();
    if (next) {
      next();
      return;
    }
    active -= 1;
  }

  async function run<T>(fn: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  return {
    limit: capacity,
    run,
    inFlight: () => active,
    waiting: () => queue.length,
  };
}
