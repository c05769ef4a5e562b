import { describe, expect, it } from "vitest";
import { queryListingKpis } from "../src/analytics/queryListingKpis";
import { buildInsights, formatInr, formatSignedPct, renderKpiReport } from "../src/analytics/renderKpiReport";
import { makeCanonicalRow } from "./utils/listingFixtures";

const table = [
  makeCanonicalRow({ item_id: "X", date: "2024-01-01", revenue: 400 }),
  makeCanonicalRow({ item_id: "X", date: "2024-01-29", revenue: 500 }),
  makeCanonicalRow({ item_id: "Y", date: "2024-01-01", brand_name: "Beta", revenue: 100 }),
  makeCanonicalRow({ item_id: "Y", date: "2024-01-29", brand_name: "Beta", revenue: null }),
];

describe("formatInr", () => {
  it("abbreviates crore, lakh and thousand amounts", () => {
    expect(formatInr(12_345_678)).toBe("₹1.23 Cr");
    expect(formatInr(250_000)).toBe("₹2.50 L");
    expect(formatInr(4_500)).toBe("₹4.5 K");
    expect(formatInr(999)).toBe("₹999");
    expect(formatInr(0)).toBe("₹0");
  });
});

describe("formatSignedPct", () => {
  it("signs non-negative values and prints N/A for undefined growth", () => {
    expect(formatSignedPct(12.34)).toBe("+12.3%");
    expect(formatSignedPct(0)).toBe("+0.0%");
    expect(formatSignedPct(-5)).toBe("-5.0%");
    expect(formatSignedPct(null)).toBe("N/A");
  });
});

describe("buildInsights", () => {
  it("describes growth and brand concentration", () => {
    expect(buildInsights(queryListingKpis(table))).toEqual([
      {
        tone: "growth",
        title: "Growth Opportunity",
        message: "1 item(s) growing >20% with rating >= 4, contributing ₹500 (100.0% of portfolio).",
      },
      {
        tone: "risk",
        title: "Concentration Warning",
        message: "Top 3 brands (Acme, Beta) account for 100.0% of total revenue.",
      },
    ]);
  });
});

describe("renderKpiReport", () => {
  const lines = renderKpiReport(queryListingKpis(table)).split("\n");

  it("prints the headline KPIs", () => {
    expect(lines.slice(0, 9)).toEqual([
      "# Listing KPI Report",
      "Filters: 2024-01-01 to 2024-01-29 · brands: all · items: all",
      "Records: 4 · Items: 2 · Brands: 2 · Latest date: 2024-01-29 · Reference date: 2024-01-01 · Active on latest: 2",
      "",
      "Total Revenue (Latest): ₹500",
      "Portfolio 4W Growth: +0.0%",
      "Revenue At Risk: ₹0 (0 item(s))",
      "High-Scaling Items: 1 (₹500)",
      "Avg Portfolio Rating: 4.50",
    ]);
  });

  it("prints item and brand tables", () => {
    expect(lines).toContain("No items currently at risk with the selected filters.");
    expect(lines).toContain("X | Acme | ₹500 | ₹400 | +25.0% | 4.5 | 100");
    expect(lines).toContain("Acme | ₹500 | 100.0%");
    expect(lines).toContain("Beta | ₹0 | 0.0%");
    expect(lines[lines.length - 1]).toBe("");
  });
});
