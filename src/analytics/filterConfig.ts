import { isIsoDate } from "../lib/dateIso";
import { compareCodePoints, compareItemIds } from "../lib/series";
import type { CanonicalTable } from "../listing/types";
import { FilterConfigError } from "./FilterConfigError";

export type KpiThresholds = {
  minRating: number;
  minRatingCount: number;
  growthThresholdPct: number;
};

/** Immutable per-query filter value. Changing filters means building a new one. */
export type FilterConfig = Readonly<
  KpiThresholds & {
    startDate: string;
    endDate: string;
    brands: readonly string[];
    items: readonly string[];
  }
>;

export type FilterConfigInput = Partial<FilterConfig>;

export type DateRange = {
  start: string;
  end: string;
};

export const DEFAULT_THRESHOLDS: Readonly<KpiThresholds> = {
  minRating: 4.0,
  minRatingCount: 200,
  growthThresholdPct: 20,
};

export const THRESHOLD_BOUNDS = {
  minRating: { min: 1.0, max: 5.0 },
  minRatingCount: { min: 0, max: Number.POSITIVE_INFINITY },
  growthThresholdPct: { min: 0, max: 100 },
} as const;

export function getObservedDateRange(table: CanonicalTable): DateRange | null {
  let start: string | null = null;
  let end: string | null = null;
  for (const row of table) {
    if (start === null || row.date < start) start = row.date;
    if (end === null || row.date > end) end = row.date;
  }
  if (start === null || end === null) return null;
  return { start, end };
}

export function resolveFilterConfig(
  table: CanonicalTable,
  input: FilterConfigInput = {}
): FilterConfig {
  const observed = getObservedDateRange(table);
  return {
    startDate: input.startDate ?? observed?.start ?? "",
    endDate: input.endDate ?? observed?.end ?? "",
    brands: [...(input.brands ?? [])],
    items: [...(input.items ?? [])],
    minRating: input.minRating ?? DEFAULT_THRESHOLDS.minRating,
    minRatingCount: input.minRatingCount ?? DEFAULT_THRESHOLDS.minRatingCount,
    growthThresholdPct: input.growthThresholdPct ?? DEFAULT_THRESHOLDS.growthThresholdPct,
  };
}

function requireDate(value: string, field: "startDate" | "endDate"): void {
  if (!isIsoDate(value)) {
    throw new FilterConfigError(
      "invalid_date",
      field,
      `Invalid ${field}: "${value}". Expected YYYY-MM-DD.`
    );
  }
}

function requireWithin(
  value: number,
  field: keyof KpiThresholds,
  opts: { integer?: boolean } = {}
): void {
  const bounds = THRESHOLD_BOUNDS[field];
  const inDomain =
    Number.isFinite(value) &&
    value >= bounds.min &&
    value <= bounds.max &&
    (!opts.integer || Number.isInteger(value));
  if (!inDomain) {
    const range = Number.isFinite(bounds.max) ? `${bounds.min}-${bounds.max}` : `>= ${bounds.min}`;
    throw new FilterConfigError(
      "threshold_out_of_range",
      field,
      `Invalid ${field}: ${value}. Expected ${opts.integer ? "an integer " : ""}${range}.`
    );
  }
}

/**
 * Rejects the configuration before any KPI work happens. Dates must be real
 * calendar dates, ordered, and (for a non-empty table) inside the observed range.
 */
export function validateFilterConfig(config: FilterConfig, observed: DateRange | null): FilterConfig {
  for (const field of ["startDate", "endDate"] as const) {
    // Without observed dates an unset bound stays empty.
    if (observed !== null || config[field] !== "") requireDate(config[field], field);
  }

  if (config.startDate && config.endDate && config.startDate > config.endDate) {
    throw new FilterConfigError(
      "start_after_end",
      "startDate",
      "Start Date must be before End Date."
    );
  }

  if (observed) {
    for (const field of ["startDate", "endDate"] as const) {
      const value = config[field];
      if (value < observed.start || value > observed.end) {
        throw new FilterConfigError(
          "date_out_of_range",
          field,
          `${field} ${value} is outside the observed range ${observed.start} to ${observed.end}.`
        );
      }
    }
  }

  requireWithin(config.minRating, "minRating");
  requireWithin(config.minRatingCount, "minRatingCount", { integer: true });
  requireWithin(config.growthThresholdPct, "growthThresholdPct");

  return config;
}

export type FilterOptions = {
  dateRange: DateRange | null;
  brands: string[];
  items: string[];
};

/** Brand and item choices; items are scoped to the selected brands. */
export function getFilterOptions(
  table: CanonicalTable,
  selectedBrands: readonly string[] = []
): FilterOptions {
  const brandSet = new Set<string>();
  const itemSet = new Set<string>();
  const activeBrands = new Set(selectedBrands);

  for (const row of table) {
    if (row.brand_name !== null) brandSet.add(row.brand_name);
    const brandMatches =
      activeBrands.size === 0 || (row.brand_name !== null && activeBrands.has(row.brand_name));
    if (brandMatches) itemSet.add(row.item_id);
  }

  return {
    dateRange: getObservedDateRange(table),
    brands: Array.from(brandSet).sort(compareCodePoints),
    items: Array.from(itemSet).sort(compareItemIds),
  };
}
