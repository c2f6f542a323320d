/**
 * Serializes access to one session. Tasks run in arrival order; a failed
 * task does not block the ones queued behind it.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
