import type { CanonicalRow, CanonicalTable } from "../listing/types";
import { computeListingKpis, type ListingKpis } from "./computeListingKpis";
import {
  getObservedDateRange,
  resolveFilterConfig,
  validateFilterConfig,
  type FilterConfig,
  type FilterConfigInput,
} from "./filterConfig";
import { buildWindow, filterCanonicalTable, filterVariantRows, type SnapshotWindow } from "./filterWindow";
import { buildPriceTrend, buildRevenueTrend, type PriceTrendPoint, type RevenueTrendPoint } from "./trendSeries";

export type ListingSummary = {
  recordCount: number;
  itemCount: number;
  brandCount: number;
  activeItemsOnLatest: number;
};

export type ListingKpiQueryResult = {
  config: FilterConfig;
  filtered: CanonicalRow[];
  window: SnapshotWindow;
  kpis: ListingKpis;
  summary: ListingSummary;
  revenueTrend: RevenueTrendPoint[];
  priceTrend: PriceTrendPoint[];
};

export type ListingKpiQueryOptions = {
  /** Items to break the trend series out by; empty means portfolio totals. */
  trendItems?: readonly string[];
};

const countDistinct = (values: Iterable<string | null>): number => {
  const seen = new Set<string>();
  for (const value of values) {
    if (value !== null) seen.add(value);
  }
  return seen.size;
};

/**
 * Validates the filters, then derives every table and KPI from the canonical
 * table without modifying it. Throws FilterConfigError on invalid filters.
 */
export function queryListingKpis(
  table: CanonicalTable,
  input: FilterConfigInput = {},
  options: ListingKpiQueryOptions = {}
): ListingKpiQueryResult {
  const config = validateFilterConfig(resolveFilterConfig(table, input), getObservedDateRange(table));

  const filtered = filterCanonicalTable(table, config);
  const window = buildWindow(filtered);
  const kpis = computeListingKpis(window, config);
  const trendItems = options.trendItems ?? [];

  return {
    config,
    filtered,
    window,
    kpis,
    summary: {
      recordCount: filtered.length,
      itemCount: countDistinct(filtered.map((row) => row.item_id)),
      brandCount: countDistinct(filtered.map((row) => row.brand_name)),
      activeItemsOnLatest: countDistinct(window.latest.map((row) => row.item_id)),
    },
    revenueTrend: buildRevenueTrend(filtered, trendItems),
    priceTrend: buildPriceTrend(filterVariantRows(table, config), trendItems),
  };
}
