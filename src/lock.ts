const settle = (): void => undefined;

/**
 * Runs tasks one at a time per key. Tasks for different keys never wait on
 * each other. A failed task does not block the ones queued behind it.
 */
export class KeyedMutex<K> {
  private tails: Map<K, Promise<void>> = new Map();

  async run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(settle, settle);
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
