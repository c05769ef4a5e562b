export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;
export type JsonObject = { [key: string]: JsonValue };
export type JsonArray = JsonValue[];

/** One row of the raw listing export, one per (item, brand/variant). */
export type RawListingRecord = {
  item_id: string;
  unique_identifier: string | null;
  brand_name: string | null;
  rating: number | null;
  rating_count: number | null;
  variations_count: number | null;
  page_content: unknown;
  monthly_revenue_history: unknown;
  promotion_history: unknown;
};

export type HistoryField = "monthly_revenue_history" | "promotion_history";

export type SeriesKind = "revenue" | "price";

export type FlatSeriesRow = {
  item_id: string;
  date: string;
  value: number | null;
};

export type ReconciledRow = {
  item_id: string;
  date: string;
  revenue: number | null;
  price: number | null;
};

export type ContentFields = {
  title: string | null;
  category: string | null;
  vertical: string | null;
  sub_category: string | null;
  super_category: string | null;
};

export type ItemMetadata = ContentFields & {
  item_id: string;
  unique_identifier: string | null;
  brand_name: string | null;
  rating: number | null;
  rating_count: number | null;
  variations_count: number | null;
};

export const CANONICAL_COLUMNS = [
  "item_id",
  "unique_identifier",
  "brand_name",
  "title",
  "category",
  "vertical",
  "sub_category",
  "super_category",
  "date",
  "revenue",
  "price",
  "rating",
  "rating_count",
  "variations_count",
] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

export type CanonicalRow = {
  item_id: string;
  unique_identifier: string | null;
  brand_name: string | null;
  title: string | null;
  category: string | null;
  vertical: string | null;
  sub_category: string | null;
  super_category: string | null;
  date: string;
  revenue: number | null;
  price: number | null;
  rating: number | null;
  rating_count: number | null;
  variations_count: number | null;
};

/** The persisted fact table. Shared read-only across every KPI query. */
export type CanonicalTable = readonly Readonly<CanonicalRow>[];
