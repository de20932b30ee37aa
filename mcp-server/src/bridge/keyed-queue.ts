/**
 * Keyed Queue
 *
 * Single writer per key: tasks sharing a key run one after another in
 * submission order, tasks on different keys run concurrently. Used to
 * serialize history recordings per system.
 */

const settle = (): void => undefined;

export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run a task once every earlier task on the same key has settled.
   * The task's own result or failure is delivered to this caller only;
   * a failed task does not block the tasks queued behind it.
   */
  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(settle, settle);

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Keys with queued or running tasks */
  get pendingKeys(): number {
    return this.tails.size;
  }
}
