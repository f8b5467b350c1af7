/**
 * Per-key promise chain. Work for the same key runs one at a time in arrival
 * order; different keys never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previousTail = this.tails.get(key) ?? Promise.resolve();

    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const currentTail = previousTail.then(() => gate);
    this.tails.set(key, currentTail);

    await previousTail;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === currentTail) {
        this.tails.delete(key);
      }
    }
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
