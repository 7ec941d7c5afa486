/**
 * Keyed exclusive locks for in-process stores.
 *
 * Each key keeps a tail promise; an acquirer chains behind the current tail
 * and becomes the new tail. Waiters are served in arrival order.
 */

export class LockTimeoutError extends Error {
  constructor(
    readonly key: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${key}`);
    this.name = 'LockTimeoutError';
  }
}

export type ReleaseLock = () => void;

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async acquire(key: string, timeoutMs: number): Promise<ReleaseLock> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseSlot: () => void = () => undefined;
    const slot = new Promise<void>((resolve) => {
      releaseSlot = resolve;
    });
    const tail = previous.then(() => slot);
    this.tails.set(key, tail);

    let released = false;
    const release: ReleaseLock = () => {
      if (released) return;
      released = true;
      releaseSlot();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const outcome = await Promise.race([previous.then(() => 'acquired' as const), timedOut]);
      if (outcome === 'timeout') {
        // The slot stays chained behind the current holder so later waiters
        // still queue after it; resolving it only skips this caller's turn.
        released = true;
        releaseSlot();
        void tail.then(() => {
          if (this.tails.get(key) === tail) {
            this.tails.delete(key);
          }
        });
        throw new LockTimeoutError(key, timeoutMs);
      }
      return release;
    } finally {
      clearTimeout(timer);
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
