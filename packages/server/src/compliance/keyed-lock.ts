/**
 * Serializes async work per key: tasks for one key run strictly in arrival
 * order, tasks for different keys interleave freely.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(() => undefined, () => undefined);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** Keys with queued or running work */
  get pending(): number {
    return this.tails.size;
  }
}
