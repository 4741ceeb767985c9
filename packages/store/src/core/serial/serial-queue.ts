/**
 * FIFO executor that runs at most one task at a time.
 *
 * A task starts only after the previous task's promise has settled and the
 * first reactions registered on it have run, so a caller awaiting task N sees
 * its result before task N+1 begins. A rejected task does not stop the queue.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  /** Number of tasks submitted and not yet settled, including the running one. */
  get size(): number {
    return this.pending
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++

    const run = this.tail.then(task)
    this.tail = run.then(this.settle, this.settle)

    return run
  }

  /** Resolves once every task submitted so far has settled. */
  onIdle(): Promise<void> {
    return this.tail
  }

  private readonly settle = (): void => {
    this.pending--
  }
}
