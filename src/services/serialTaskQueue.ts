/**
 * Serial Task Queue
 *
 * Runs async tasks one at a time in submission order by chaining them on a
 * single promise. A failed task rejects only its own caller; the chain
 * carries on with the next task.
 */

export class SerialTaskQueue {
  private tail: Promise<void> = Promise.resolve()
  private pending: number = 0

  /**
   * Queue a task and resolve with its result once every earlier task settled
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++
    const result = this.tail.then(task)

    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    )

    return result
  }

  /**
   * Number of queued or running tasks
   */
  get size(): number {
    return this.pending
  }

  /**
   * Resolves once everything queued so far has settled
   */
  async drain(): Promise<void> {
    await this.tail
  }

  private settle(): void {
    this.pending--
  }
}
