const settle = (): void => {};

/**
 * Runs posted tasks one at a time, in the order they were posted. A task that
 * throws rejects its own promise and does not hold up the tasks behind it.
 */
export class Mailbox {
  private tail: Promise<void> = Promise.resolve();

  post<T>(task: () => T): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(settle, settle);
    return run;
  }
}
