/**
 * serial-queue.ts — Run async event handlers one at a time, in arrival order.
 */

export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private waiting = 0;

  /** Number of tasks queued or running. */
  get size(): number {
    return this.waiting;
  }

  /**
   * Schedule `task` after every task queued before it. The returned promise
   * settles with the task's own result; a failing task does not stop the
   * tasks queued after it.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(task).finally(() => {
      this.waiting--;
    });
    this.tail = result.catch(() => undefined);
    return result;
  }
}
