/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 * Items are dispatched in order; dispatch stops when the signal aborts or a
 * worker throws. The first error is rethrown once every running worker has
 * settled.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let next = 0;
  let failed = false;
  let firstError: unknown;

  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (next < items.length && !failed && !signal?.aborted) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        await worker(item, index);
      } catch (error: unknown) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  });

  await Promise.all(lanes);
  if (failed) throw firstError;
}
