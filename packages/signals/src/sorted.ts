// Sorted array helpers used by Signal's slot order

export type Comparator<T> = (a: T, b: T) => number;

// First index whose element sorts after `item` (bisect right)
export function insertionIndex<T>(
  items: readonly T[],
  item: T,
  compare: Comparator<T>
): number {
  let low = 0;
  let high = items.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (compare(items[mid], item) <= 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

// Index of an element comparing equal to `item`, or -1
export function indexOfSorted<T>(
  items: readonly T[],
  item: T,
  compare: Comparator<T>
): number {
  const index = insertionIndex(items, item, compare) - 1;
  return index >= 0 && compare(items[index], item) === 0 ? index : -1;
}

/**
 * Copy of `items` with `item` inserted in order.
 *
 * The search is O(log n) but the copy is O(n). Signals trade slower
 * registration for dispatch over a plain, never-mutated array.
 */
export function withInserted<T>(
  items: readonly T[],
  item: T,
  compare: Comparator<T>
): T[] {
  const index = insertionIndex(items, item, compare);
  const next = items.slice();
  next.splice(index, 0, item);
  return next;
}

// Copy of `items` without the element at `index`
export function withoutIndex<T>(items: readonly T[], index: number): T[] {
  const next = items.slice();
  next.splice(index, 1);
  return next;
}
