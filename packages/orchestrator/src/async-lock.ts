/**
 * Promise-chain mutex. Callers run strictly one after another in call order.
 * A rejected critical section does not poison the lock.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(criticalSection: () => Promise<T>): Promise<T> {
    const result = this.tail.then(criticalSection);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
