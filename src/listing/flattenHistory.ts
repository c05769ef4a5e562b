import { parseDateFlexible } from "../lib/dateIso";
import { decodeJsonPayload, isJsonArray, isJsonObject } from "./safeJson";
import { parseNumberSafe } from "./valueParsers";
import type { FlatSeriesRow, HistoryField, JsonValue, RawListingRecord, SeriesKind } from "./types";

export type HistorySpec = {
  series: SeriesKind;
  payloadField: HistoryField;
  /** Key of the sample value inside each history element. */
  valueKey: string;
};

export const REVENUE_HISTORY: HistorySpec = {
  series: "revenue",
  payloadField: "monthly_revenue_history",
  valueKey: "avg_monthly_revenue",
};

export const PROMOTION_HISTORY: HistorySpec = {
  series: "price",
  payloadField: "promotion_history",
  valueKey: "value",
};

export type ElementSkipReason = "not_object" | "invalid_date";

export type ElementResult =
  | { ok: true; row: FlatSeriesRow }
  | { ok: false; reason: ElementSkipReason };

export type FlattenStats = {
  recordsSeen: number;
  recordsSkipped: number;
  elementsSkipped: number;
  skipReasons: Record<ElementSkipReason, number>;
};

export type FlattenResult = {
  series: SeriesKind;
  rows: FlatSeriesRow[];
  stats: FlattenStats;
};

export function flattenHistoryElement(
  itemId: string,
  element: JsonValue,
  valueKey: string
): ElementResult {
  if (!isJsonObject(element)) return { ok: false, reason: "not_object" };
  const date = parseDateFlexible(element.date);
  if (!date) return { ok: false, reason: "invalid_date" };
  return {
    ok: true,
    row: { item_id: itemId, date, value: parseNumberSafe(element[valueKey]) },
  };
}

export function flattenHistory(
  records: readonly RawListingRecord[],
  spec: HistorySpec
): FlattenResult {
  const rows: FlatSeriesRow[] = [];
  const stats: FlattenStats = {
    recordsSeen: 0,
    recordsSkipped: 0,
    elementsSkipped: 0,
    skipReasons: { not_object: 0, invalid_date: 0 },
  };

  for (const record of records) {
    stats.recordsSeen += 1;
    const parsed = decodeJsonPayload(record[spec.payloadField]);
    if (!isJsonArray(parsed)) {
      stats.recordsSkipped += 1;
      continue;
    }

    const results = parsed.map((element) =>
      flattenHistoryElement(record.item_id, element, spec.valueKey)
    );
    for (const result of results) {
      if (result.ok) {
        rows.push(result.row);
      } else {
        stats.elementsSkipped += 1;
        stats.skipReasons[result.reason] += 1;
      }
    }
  }

  return { series: spec.series, rows, stats };
}
