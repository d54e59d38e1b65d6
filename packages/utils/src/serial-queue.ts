/**
 * Single-writer task queue.
 *
 * Tasks run strictly one after another in submission order, so a component
 * that funnels every state mutation through `run()` never observes two
 * mutations interleaving across an `await`.
 *
 * @example
 * ```typescript
 * const queue = new SerialQueue();
 * queue.run(async () => { state = await step1(state); });
 * queue.run(async () => { state = await step2(state); }); // starts after step1
 * await queue.idle();
 * ```
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private count = 0;

  /**
   * Number of tasks queued or running.
   */
  get pending(): number {
    return this.count;
  }

  /**
   * Schedule a task.
   *
   * The returned promise settles with the task's own result. A failing
   * task rejects only its own promise; later tasks still run.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.count++;
    const result = this.tail.then(() => task());
    const settle = () => {
      this.count--;
    };
    this.tail = result.then(settle, settle);
    return result;
  }

  /**
   * Resolve once every task submitted so far, and any task those tasks
   * submitted in turn, has settled.
   */
  async idle(): Promise<void> {
    while (this.count > 0) {
      await this.tail;
    }
  }
}
