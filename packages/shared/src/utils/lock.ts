/**
 * Serializes rewrites of one file within this process.
 *
 * The tag store re-reads its tags file, merges one room's namespace and
 * writes it back; two of those on the same path must not interleave.
 * Callers queue in arrival order per path. Other paths proceed independently.
 */

const tails = new Map<string, Promise<void>>();

export async function withFileLock<T>(path: string, fn: () => Promise<T>): Promise<T> {
  const previous = tails.get(path) ?? Promise.resolve();
  let release = (): void => {};
  const held = new Promise<void>((resolve) => {
    release = resolve;
  });
  const tail = previous.then(() => held);
  tails.set(path, tail);

  await previous;
  try {
    return await fn();
  } finally {
    release();
    if (tails.get(path) === tail) {
      tails.delete(path);
    }
  }
}
