import { defer, from, lastValueFrom, map, mergeMap, toArray } from 'rxjs';

/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the input order. The first rejection fails the whole batch
 * and no further items are started.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (items.length === 0) return [];

  const settled = await lastValueFrom(
    from(items.map((item, index) => ({ item, index }))).pipe(
      mergeMap(
        ({ item, index }) =>
          defer(() => fn(item, index)).pipe(
            map((result) => ({ index, result })),
          ),
        Math.max(1, concurrency),
      ),
      toArray(),
    ),
  );

  return settled.sort((a, b) => a.index - b.index).map(({ result }) => result);
}
