/**
 * In-process critical section: each queued operation starts only after the
 * previous one has settled, whether or not its caller awaited it.
 *
 * A rejected operation rejects only its own caller; the queue keeps going.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(operation: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(operation);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
