/**
 * Resolves once `previous` settles, or rejects with the signal's reason if the
 * caller gives up first. The abort listener never outlives the wait.
 */
function acquire(previous: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return previous;
  signal.throwIfAborted();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void previous.then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
  });
}

/**
 * Promise-chained mutual exclusion. Callers run one at a time, in arrival order.
 * A caller whose signal aborts while queued leaves the queue without blocking
 * the callers behind it.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => current);
    this.pending++;

    try {
      await acquire(previous, signal);
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}
