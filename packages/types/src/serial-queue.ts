/**
 * SerialQueue — one mutual-exclusion boundary per state-holding instance.
 *
 * Every mutating entry point of MintAuthority and Equity runs through
 * `run()`. Tasks start strictly in submission order and each one runs to
 * completion (including its awaited I/O) before the next one starts.
 *
 * A task that throws rejects only its own promise; the queue moves on.
 * A task must never await another `run()` on the same queue: that call
 * would wait behind the task itself.
 */

export class SerialQueue {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Schedule `task` after every previously scheduled task has settled.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this._pending += 1;
    const result = this._tail.then(task);
    const settle = (): void => {
      this._pending -= 1;
    };
    // The caller observes the task's outcome through `result`; the tail
    // only orders the next task after this one.
    this._tail = result.then(settle, settle);
    return result;
  }

  /** Number of tasks submitted and not yet settled. */
  get pending(): number {
    return this._pending;
  }

  /** Resolves once every task submitted so far has settled. */
  drain(): Promise<void> {
    return this._tail;
  }
}
