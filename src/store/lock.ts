/**
 * Promise-chained mutual exclusion. Each `run` waits for the previous holder to
 * settle, whatever its outcome, before starting.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;

    try {
      return await operation();
    } finally {
      release();
    }
  }
}

/** Serializes operations sharing a key; different keys run independently. */
export class KeyedQueue {
  private readonly chains = new Map<string, Promise<void>>();

  async run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => next);
    this.chains.set(key, tail);
    await previous;

    try {
      return await operation();
    } finally {
      release();
      if (this.chains.get(key) === tail) {
        this.chains.delete(key);
      }
    }
  }

  pending(): number {
    return this.chains.size;
  }
}
