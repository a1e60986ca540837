/**
 * Serializes tasks per key. A task waits for every earlier task that shares
 * one of its keys; tasks with disjoint keys run concurrently.
 */
export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  get pending(): number {
    return this.tails.size;
  }

  run<T>(keys: string[], task: () => Promise<T>): Promise<T> {
    const unique = [...new Set(keys)];
    const previous = unique.map((key) => this.tails.get(key) ?? Promise.resolve());
    const result = Promise.all(previous).then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    for (const key of unique) this.tails.set(key, tail);
    void tail.then(() => {
      for (const key of unique) {
        if (this.tails.get(key) === tail) this.tails.delete(key);
      }
    });

    return result;
  }

  /** Resolves once every queued task has settled. */
  async idle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }
}
