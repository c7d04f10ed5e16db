/**
 * Run `fn` over `items` with at most `concurrency` calls in flight. Items are
 * taken in order; each worker pulls the next item when its current one settles.
 * `fn` is expected to handle its own errors: a rejection fails the whole run.
 */
export async function withConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(Math.max(1, concurrency), items.length); i++) {
    workers.push(
      (async () => {
        while (next < items.length) {
          const index = next++;
          const item = items[index];
          if (item !== undefined) {
            await fn(item, index);
          }
        }
      })(),
    );
  }

  await Promise.all(workers);
}
