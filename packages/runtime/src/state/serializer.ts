// Per-key task serialization
//
// Tasks sharing a key run one after another in submission order; tasks with
// different keys run independently. A failed task does not block the next.

export class KeyedSerializer {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.tails.set(key, tail);

    return result;
  }

  /**
   * Queue a task without waiting for it. The task handles its own failures;
   * a rejection only releases the key.
   */
  enqueue(key: string, task: () => Promise<void>): void {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const tail: Promise<void> = previous.then(task).then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.tails.set(key, tail);
  }

  /**
   * Resolves once no key has queued or running tasks, including tasks
   * queued while waiting.
   */
  async idle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(Array.from(this.tails.values()));
    }
  }

  /** Number of keys with queued or running tasks */
  get pending(): number {
    return this.tails.size;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
