/**
 * Bounded async worker pool and event-loop helpers.
 */

/**
 * Run `processor` over `items` with at most `concurrency` in flight.
 * Results keep input order regardless of completion order. Once `signal`
 * aborts, no further items are started.
 */
export async function processPooled<T, R>(
  items: readonly T[],
  processor: (item: T) => Promise<R>,
  concurrency: number,
  signal?: AbortSignal,
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (nextIndex < items.length) {
      if (signal?.aborted) return;
      const idx = nextIndex++;
      results[idx] = await processor(items[idx]);
    }
  });

  await Promise.all(workers);
  return results;
}

/** Give timers and other tasks a turn. */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Recursively freeze a plain object/array graph. Already-frozen nodes are
 * still descended into.
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): Readonly<T> {
  if (value !== null && typeof value === "object" && !seen.has(value)) {
    seen.add(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested, seen);
    }
    Object.freeze(value);
  }
  return value;
}
