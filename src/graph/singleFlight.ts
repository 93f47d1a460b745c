/**
 * In-flight request table. Concurrent calls sharing a key observe the same
 * promise, and therefore the same result or failure; the entry is dropped once
 * it settles so a later call starts afresh.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, operation: () => Promise<T>): Promise<T> {
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }
    const promise = (async () => {
      try {
        return await operation();
      } finally {
        this.inFlight.delete(key);
      }
    })();
    this.inFlight.set(key, promise);
    return promise;
  }
}

/** Simple async mutex providing coarse-grained critical sections. */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const { previous, release } = this.enqueue();
    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }

  private enqueue(): { previous: Promise<void>; release: () => void } {
    let release: () => void = () => {};
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => wait);
    return { previous, release };
  }
}
