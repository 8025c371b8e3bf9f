/**
 * Serialises async tasks that share a key.
 *
 * Conflict detection and seat allocation are check-then-act sequences
 * over an async store; running them under a per-aggregate key keeps
 * two concurrent requests from reading the same state. Tasks on
 * different keys run independently.
 */
export class KeyedMutex {
  private readonly tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);

    // The queue only tracks completion; the task's own outcome goes to the caller.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running tasks. */
  get pendingKeys(): number {
    return this.tails.size;
  }
}
