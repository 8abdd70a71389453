export type KeyedMutex = {
  run: <T>(key: string, task: () => T | Promise<T>) => Promise<T>;
};

/**
 * Promise-chain mutex: tasks sharing a key run one after another, tasks on
 * different keys interleave freely.
 */
export const createKeyedMutex = (): KeyedMutex => {
  const tails = new Map<string, Promise<void>>();

  const run = async <T>(key: string, task: () => T | Promise<T>): Promise<T> => {
    const previous = tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => gate);
    tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (tails.get(key) === tail) {
        tails.delete(key);
      }
    }
  };

  return { run };
};
