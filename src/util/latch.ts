/**
 * Promise-chain mutex. Callers queue behind the previous holder and get a
 * release function back; only one holder runs at a time.
 */
export class Latch {
  private tail: Promise<void> = Promise.resolve();

  async acquire(): Promise<() => void> {
    const previous = this.tail;

    let release!: () => void;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = next;

    await previous;
    return release;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
