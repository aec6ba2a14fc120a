/**
 * Exclusive async lock. Tasks run one at a time in the order they were queued.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run a task once every earlier task has settled
   */
  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }

  private release(): void {
    this.pending--;
  }
}
