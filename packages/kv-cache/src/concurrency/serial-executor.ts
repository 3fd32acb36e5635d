/**
 * Runs async tasks one at a time, in submission order.
 *
 * Each stateful store owns one executor so that concurrent callers never
 * interleave partial file operations on the same instance.
 */
export interface SerialExecutor {
  /**
   * Queues a task behind every previously submitted task.
   * @param task - Work to run once the executor is free
   * @returns The task's own promise outcome
   */
  readonly run: <T>(task: () => Promise<T>) => Promise<T>;
}

/**
 * Creates a serial executor backed by a promise chain.
 *
 * A rejected task settles its own caller's promise and leaves the chain
 * intact for the next task.
 *
 * @example
 * ```typescript
 * const executor = createSerialExecutor();
 * const [a, b] = await Promise.all([
 *   executor.run(() => readFile(path)),
 *   executor.run(() => writeFile(path, data)), // starts after the read settles
 * ]);
 * ```
 */
export const createSerialExecutor = (): SerialExecutor => {
  let tail: Promise<void> = Promise.resolve();

  const run = <T>(task: () => Promise<T>): Promise<T> => {
    const result = tail.then(task);
    tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  };

  return { run };
};
