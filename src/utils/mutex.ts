/**
 * Promise-chain lock. Callers queue behind whoever holds it, in arrival order.
 */

export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.chain;
    this.chain = gate;

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
