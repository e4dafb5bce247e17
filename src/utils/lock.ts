/**
 * Promise-chained exclusive lock.
 *
 * Each critical section starts only after every section queued before it has
 * settled. A rejected section does not block the ones behind it.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
