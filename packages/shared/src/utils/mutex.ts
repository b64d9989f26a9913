/**
 * Promise-chain mutex. Each holder runs after the previous one settles,
 * and the lock is released on every exit path of the critical section.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(critical: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => held);

    await previous;
    try {
      return await critical();
    } finally {
      release();
    }
  }
}
