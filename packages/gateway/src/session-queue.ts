/**
 * KeyedQueue -- runs tasks one at a time per key.
 *
 * Dispatches for the same session are chained so their appends never
 * interleave; tasks under different keys run in parallel. A failed task
 * does not block the ones queued behind it.
 */

export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    // Drop the entry once nothing is queued behind this task.
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }

  /** Keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
