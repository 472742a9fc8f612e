/**
 * Bounded worker pool: `concurrency` async slots pull items in order until
 * the list is drained. Each item is handled by exactly one slot.
 */
export async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}
