import { compareItemDate } from "../lib/series";
import type { EnrichedRow } from "./joinMetadata";
import type { CanonicalRow } from "./types";

function toFloat(value: number | null): number | null {
  if (value === null) return null;
  return Number.isFinite(value) ? value : null;
}

function toInt(value: number | null): number | null {
  if (value === null || !Number.isFinite(value)) return null;
  return Math.trunc(value);
}

export function toCanonicalRow(row: EnrichedRow): CanonicalRow {
  return {
    item_id: row.item_id,
    unique_identifier: row.unique_identifier,
    brand_name: row.brand_name,
    title: row.title,
    category: row.category,
    vertical: row.vertical,
    sub_category: row.sub_category,
    super_category: row.super_category,
    date: row.date,
    revenue: toFloat(row.revenue),
    price: toFloat(row.price),
    rating: toFloat(row.rating),
    rating_count: toInt(row.rating_count),
    variations_count: toInt(row.variations_count),
  };
}

/**
 * Fixes the persisted column set and order. Rows are sorted by (item_id, date);
 * nearest-date and snapshot logic downstream depend on that ordering.
 */
export function buildCanonicalTable(rows: readonly EnrichedRow[]): CanonicalRow[] {
  return rows.map(toCanonicalRow).sort(compareItemDate);
}
