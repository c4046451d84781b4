/**
 * Serializes async critical sections within one process. Each task starts
 * only after every previously queued task has settled.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
