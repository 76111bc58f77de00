/**
 * Yields every combination of exactly `size` elements, in lexicographic index
 * order: combinations([a, b, c], 2) -> [a, b], [a, c], [b, c].
 *
 * Recursive backtracking over a shared buffer; each yielded array is a copy.
 * The count is C(n, size), so callers bound n.
 */
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
  if (size < 0 || size > items.length) return;

  const combo: T[] = [];

  function* combine(start: number): Generator<T[]> {
    if (combo.length === size) {
      yield [...combo];
      return;
    }

    // Stop early when not enough elements remain to fill the combination
    for (let i = start; i <= items.length - (size - combo.length); i++) {
      combo.push(items[i]);
      yield* combine(i + 1);
      combo.pop();
    }
  }

  yield* combine(0);
}

export function binomial(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  let result = 1;
  for (let i = 1; i <= Math.min(k, n - k); i++) {
    result = (result * (n - i + 1)) / i;
  }
  return Math.round(result);
}
