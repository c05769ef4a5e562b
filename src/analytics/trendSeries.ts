import { compareCodePoints, compareItemIds } from "../lib/series";
import type { CanonicalRow } from "../listing/types";

export type RevenueTrendPoint = {
  date: string;
  item_id: string | null;
  revenue: number;
};

export type PriceTrendPoint = {
  date: string;
  avg_price: number | null;
};

/**
 * Portfolio revenue per date, or one line per selected item. Expects rows
 * deduplicated on (item_id, date).
 */
export const buildRevenueTrend = (
  rows: readonly CanonicalRow[],
  items: readonly string[] = []
): RevenueTrendPoint[] => {
  if (items.length) {
    const selected = new Set(items);
    return rows
      .filter((row) => selected.has(row.item_id))
      .sort((a, b) => compareCodePoints(a.date, b.date) || compareItemIds(a.item_id, b.item_id))
      .map((row) => ({ date: row.date, item_id: row.item_id, revenue: row.revenue ?? 0 }));
  }

  const totals = new Map<string, number>();
  rows.forEach((row) => {
    totals.set(row.date, (totals.get(row.date) ?? 0) + (row.revenue ?? 0));
  });
  return Array.from(totals.entries())
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([date, revenue]) => ({ date, item_id: null, revenue }));
};

/** Mean price per date across every variant row that carries a price. */
export const buildPriceTrend = (
  rows: readonly CanonicalRow[],
  items: readonly string[] = []
): PriceTrendPoint[] => {
  const selected = new Set(items);
  const buckets = new Map<string, { total: number; count: number }>();

  rows.forEach((row) => {
    if (selected.size && !selected.has(row.item_id)) return;
    const bucket = buckets.get(row.date) ?? { total: 0, count: 0 };
    if (row.price !== null) {
      bucket.total += row.price;
      bucket.count += 1;
    }
    buckets.set(row.date, bucket);
  });

  return Array.from(buckets.entries())
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([date, bucket]) => ({
      date,
      avg_price: bucket.count > 0 ? bucket.total / bucket.count : null,
    }));
};
