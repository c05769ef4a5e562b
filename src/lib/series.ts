export function groupBy<T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const grouped = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const list = grouped.get(key);
    if (list) {
      list.push(item);
    } else {
      grouped.set(key, [item]);
    }
  }
  return grouped;
}

/**
 * Carries the last non-null value forward through `rows`, which must already be
 * in time order and belong to a single group. Leading nulls stay null.
 */
export function forwardFill<T, V>(
  rows: readonly T[],
  read: (row: T) => V | null,
  write: (row: T, value: V | null) => T
): T[] {
  let lastKnown: V | null = null;
  return rows.map((row) => {
    const value = read(row);
    if (value !== null) {
      lastKnown = value;
      return row;
    }
    return write(row, lastKnown);
  });
}

export function firstBy<T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T> {
  const firstSeen = new Map<K, T>();
  for (const item of items) {
    const key = keyOf(item);
    if (!firstSeen.has(key)) firstSeen.set(key, item);
  }
  return firstSeen;
}

const DIGITS_RE = /^\d+$/;

/** Plain UTF-16 code unit order, independent of the host locale. */
export function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Item ids are compared numerically when both are digit strings, otherwise by
 * code point, so ordering never depends on the host locale.
 */
export function compareItemIds(a: string, b: string): number {
  if (DIGITS_RE.test(a) && DIGITS_RE.test(b)) {
    const left = a.replace(/^0+(?=\d)/, "");
    const right = b.replace(/^0+(?=\d)/, "");
    if (left.length !== right.length) return left.length - right.length;
    const byValue = compareCodePoints(left, right);
    if (byValue !== 0) return byValue;
    return compareCodePoints(a, b);
  }
  return compareCodePoints(a, b);
}

export function compareItemDate(
  a: { item_id: string; date: string },
  b: { item_id: string; date: string }
): number {
  const byItem = compareItemIds(a.item_id, b.item_id);
  if (byItem !== 0) return byItem;
  return compareCodePoints(a.date, b.date);
}

export function sumNullable(values: Iterable<number | null>): number {
  let total = 0;
  for (const value of values) {
    if (value !== null) total += value;
  }
  return total;
}
