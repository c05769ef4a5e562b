import { compareItemDate, compareItemIds, forwardFill, groupBy } from "../lib/series";
import type { FlatSeriesRow, ReconciledRow } from "./types";

type JoinSlot = {
  revenue: number | null;
  price: number | null;
};

function slotKey(itemId: string, date: string): string {
  return `${itemId}\u0000${date}`;
}

/**
 * Full outer join of the two series on (item_id, date). Repeated samples for the
 * same key (variant rows share an item's history) keep the first non-null value.
 */
export function outerJoinSeries(
  revenueRows: readonly FlatSeriesRow[],
  priceRows: readonly FlatSeriesRow[]
): ReconciledRow[] {
  const slots = new Map<string, ReconciledRow>();

  const slotFor = (row: FlatSeriesRow): ReconciledRow => {
    const key = slotKey(row.item_id, row.date);
    const existing = slots.get(key);
    if (existing) return existing;
    const created: ReconciledRow = { item_id: row.item_id, date: row.date, revenue: null, price: null };
    slots.set(key, created);
    return created;
  };

  const assign = (rows: readonly FlatSeriesRow[], field: keyof JoinSlot) => {
    for (const row of rows) {
      const slot = slotFor(row);
      if (slot[field] === null && row.value !== null) slot[field] = row.value;
    }
  };

  assign(revenueRows, "revenue");
  assign(priceRows, "price");

  return Array.from(slots.values()).sort(compareItemDate);
}

/**
 * Joins revenue and price samples and forward-fills price inside each item.
 * Revenue is never filled; leading rows without a prior price stay null.
 */
export function reconcileSeries(
  revenueRows: readonly FlatSeriesRow[],
  priceRows: readonly FlatSeriesRow[]
): ReconciledRow[] {
  const joined = outerJoinSeries(revenueRows, priceRows);
  const byItem = groupBy(joined, (row) => row.item_id);
  const itemIds = Array.from(byItem.keys()).sort(compareItemIds);

  const reconciled: ReconciledRow[] = [];
  for (const itemId of itemIds) {
    const itemRows = [...(byItem.get(itemId) ?? [])].sort(compareItemDate);
    const filled = forwardFill(
      itemRows,
      (row) => row.price,
      (row, price) => ({ ...row, price })
    );
    reconciled.push(...filled);
  }
  return reconciled;
}
