import type { CanonicalRow, RawListingRecord } from "../../src/listing/types";

export function makeRecord(overrides: Partial<RawListingRecord> & { item_id: string }): RawListingRecord {
  return {
    unique_identifier: `U-${overrides.item_id}`,
    brand_name: "Acme",
    rating: 4.2,
    rating_count: 150,
    variations_count: 1,
    page_content: JSON.stringify({ title: `Item ${overrides.item_id}`, category: "Kitchen" }),
    monthly_revenue_history: null,
    promotion_history: null,
    ...overrides,
  };
}

export function revenueHistory(entries: Array<[string, number | null]>): string {
  return JSON.stringify(entries.map(([date, revenue]) => ({ date, avg_monthly_revenue: revenue })));
}

export function promotionHistory(entries: Array<[string, number | null]>): string {
  return JSON.stringify(entries.map(([date, value]) => ({ date, value })));
}

export function makeCanonicalRow(
  overrides: Partial<CanonicalRow> & { item_id: string; date: string }
): CanonicalRow {
  return {
    unique_identifier: null,
    brand_name: "Acme",
    title: null,
    category: null,
    vertical: null,
    sub_category: null,
    super_category: null,
    revenue: null,
    price: null,
    rating: 4.5,
    rating_count: 100,
    variations_count: 1,
    ...overrides,
  };
}
