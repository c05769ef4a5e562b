import { describe, expect, it } from "vitest";
import {
  flattenHistory,
  flattenHistoryElement,
  PROMOTION_HISTORY,
  REVENUE_HISTORY,
} from "../src/listing/flattenHistory";
import { makeRecord, promotionHistory, revenueHistory } from "./utils/listingFixtures";

describe("flattenHistory", () => {
  it("emits one row per history element with the value renamed", () => {
    const records = [
      makeRecord({
        item_id: "100",
        monthly_revenue_history: revenueHistory([
          ["2024-01-01", 5000],
          ["2024-02-01", 6500.5],
        ]),
      }),
    ];

    const result = flattenHistory(records, REVENUE_HISTORY);
    expect(result.series).toBe("revenue");
    expect(result.rows).toEqual([
      { item_id: "100", date: "2024-01-01", value: 5000 },
      { item_id: "100", date: "2024-02-01", value: 6500.5 },
    ]);
    expect(result.stats.recordsSkipped).toBe(0);
  });

  it("skips malformed or null payloads without touching sibling records", () => {
    const good = makeRecord({
      item_id: "1",
      promotion_history: promotionHistory([
        ["2024-01-05", 299],
        ["2024-01-20", 249],
      ]),
    });
    const records = [
      makeRecord({ item_id: "2", promotion_history: "[{\"date\": \"2024-01-05\", " }),
      good,
      makeRecord({ item_id: "3", promotion_history: null }),
      makeRecord({ item_id: "4", promotion_history: '{"date":"2024-01-05","value":10}' }),
    ];

    const alone = flattenHistory([good], PROMOTION_HISTORY);
    const mixed = flattenHistory(records, PROMOTION_HISTORY);

    expect(mixed.rows).toEqual(alone.rows);
    expect(mixed.rows).toHaveLength(2);
    expect(mixed.stats.recordsSeen).toBe(4);
    expect(mixed.stats.recordsSkipped).toBe(3);
  });

  it("drops bad elements individually and keeps the rest of the sequence", () => {
    const records = [
      makeRecord({
        item_id: "7",
        monthly_revenue_history: JSON.stringify([
          { date: "2024-03-01", avg_monthly_revenue: 100 },
          "garbage",
          { date: "not a date", avg_monthly_revenue: 5 },
          { date: "2024-04-01T00:00:00", avg_monthly_revenue: "250" },
          { date: "2024-05-01" },
        ]),
      }),
    ];

    const result = flattenHistory(records, REVENUE_HISTORY);
    expect(result.rows).toEqual([
      { item_id: "7", date: "2024-03-01", value: 100 },
      { item_id: "7", date: "2024-04-01", value: 250 },
      { item_id: "7", date: "2024-05-01", value: null },
    ]);
    expect(result.stats.elementsSkipped).toBe(2);
    expect(result.stats.skipReasons).toEqual({ not_object: 1, invalid_date: 1 });
  });
});

describe("flattenHistoryElement", () => {
  it("reports a skip instead of throwing", () => {
    expect(flattenHistoryElement("1", [1, 2], "value")).toEqual({ ok: false, reason: "not_object" });
    expect(flattenHistoryElement("1", { value: 3 }, "value")).toEqual({
      ok: false,
      reason: "invalid_date",
    });
    expect(flattenHistoryElement("1", { date: "2024-02-29", value: 3 }, "value")).toEqual({
      ok: true,
      row: { item_id: "1", date: "2024-02-29", value: 3 },
    });
  });
});
