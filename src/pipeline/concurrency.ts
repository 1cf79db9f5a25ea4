import pLimit from "p-limit";

/**
 * Run `task` over `items` with at most `limit` in flight.
 * A slot is held from the task's start until it settles; one rejection
 * never cancels the others.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const gate = pLimit(Math.max(1, Math.floor(limit)));
  return Promise.allSettled(items.map((item, index) => gate(() => task(item, index))));
}
