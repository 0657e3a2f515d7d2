export interface KeyedLock {
  run: <T>(key: string, task: () => Promise<T>) => Promise<T>;
}

/**
 * Serializes tasks that share a key. Tasks under different keys run
 * concurrently. A failed task does not stop the ones queued behind it.
 */
export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<unknown>>();

  return {
    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const next = previous.then(task, task);
      tails.set(key, next);

      try {
        return await next;
      } finally {
        if (tails.get(key) === next) {
          tails.delete(key);
        }
      }
    },
  };
}
