/**
 * Auth Module - Exclusive Lock
 *
 * Promise-chain mutex. Tasks run one at a time in call order; the lock
 * is released when the task settles, whether it resolves or rejects.
 */

export type Lock = Readonly<{
  runExclusive<T>(task: () => Promise<T>): Promise<T>;
}>;

export function createLock(): Lock {
  let tail: Promise<unknown> = Promise.resolve();

  return {
    runExclusive<T>(task: () => Promise<T>): Promise<T> {
      const run = tail.then(task);
      // Next task waits for this one to settle, never for its outcome
      tail = run.catch(() => undefined);
      return run;
    },
  };
}
