import { addDaysUtc, diffDaysUtc } from "../lib/dateIso";
import { firstBy } from "../lib/series";
import type { CanonicalRow, CanonicalTable } from "../listing/types";
import type { FilterConfig } from "./filterConfig";

export const REFERENCE_WINDOW_WEEKS = 4;

export type SnapshotWindow = {
  latestDate: string | null;
  referenceTarget: string | null;
  referenceDate: string | null;
  latest: CanonicalRow[];
  reference: CanonicalRow[];
};

/**
 * Revenue is recorded per item, so variant rows repeat it. Any sum or mean over
 * revenue has to run on this view, keyed by (item_id, date), first row wins.
 */
export function dedupeByItemDate(rows: readonly CanonicalRow[]): CanonicalRow[] {
  return Array.from(firstBy(rows, (row) => `${row.item_id}\u0000${row.date}`).values());
}

function buildRowPredicate(config: FilterConfig) {
  const brands = new Set(config.brands);
  const items = new Set(config.items);
  return (row: Readonly<CanonicalRow>): boolean => {
    if (row.date < config.startDate || row.date > config.endDate) return false;
    if (brands.size && (row.brand_name === null || !brands.has(row.brand_name))) return false;
    if (items.size && !items.has(row.item_id)) return false;
    return true;
  };
}

/**
 * Date range, brand and item predicates (inclusive), without deduplication.
 * Matching rows are copied out of the shared table.
 */
export function filterVariantRows(table: CanonicalTable, config: FilterConfig): CanonicalRow[] {
  return table.filter(buildRowPredicate(config)).map((row) => ({ ...row }));
}

export function filterCanonicalTable(table: CanonicalTable, config: FilterConfig): CanonicalRow[] {
  return dedupeByItemDate(filterVariantRows(table, config));
}

export function distinctDates(rows: readonly CanonicalRow[]): string[] {
  return Array.from(new Set(rows.map((row) => row.date))).sort();
}

/** Nearest date by absolute day distance; ties go to the earlier date. */
export function selectNearestDate(dates: readonly string[], target: string): string | null {
  let best: string | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const date of [...dates].sort()) {
    const distance = Math.abs(diffDaysUtc(date, target));
    if (distance < bestDistance) {
      best = date;
      bestDistance = distance;
    }
  }
  return best;
}

export function buildWindow(
  filtered: readonly CanonicalRow[],
  referenceWeeks = REFERENCE_WINDOW_WEEKS
): SnapshotWindow {
  const dates = distinctDates(filtered);
  const latestDate = dates[dates.length - 1] ?? null;
  if (latestDate === null) {
    return { latestDate: null, referenceTarget: null, referenceDate: null, latest: [], reference: [] };
  }

  const referenceTarget = addDaysUtc(latestDate, -referenceWeeks * 7);
  const referenceDate = selectNearestDate(dates, referenceTarget);

  return {
    latestDate,
    referenceTarget,
    referenceDate,
    latest: filtered.filter((row) => row.date === latestDate),
    reference: filtered.filter((row) => row.date === referenceDate),
  };
}
