/**
 * Promise-chain mutex. Callers queue behind the previous holder and run
 * one at a time, in the order they asked.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  get isLocked(): boolean {
    return this.held > 0;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previousCall = this.tail;

    let release: () => void = () => {};
    const next = new Promise<void>(res => { release = res });

    this.tail = previousCall.then(() => next);
    this.held++;

    await previousCall;

    try {
      return await fn();
    } finally {
      this.held--;
      release();
    }
  }
}
