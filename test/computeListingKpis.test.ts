import { describe, expect, it } from "vitest";
import {
  classifyItem,
  computeBrandConcentration,
  computeGrowthPct,
  computeListingKpis,
  computePortfolioGrowthPct,
} from "../src/analytics/computeListingKpis";
import { DEFAULT_THRESHOLDS } from "../src/analytics/filterConfig";
import { buildWindow } from "../src/analytics/filterWindow";
import { makeCanonicalRow } from "./utils/listingFixtures";

const LATEST = "2024-02-29";
const REFERENCE = "2024-02-01";

describe("growth", () => {
  it("computes percentage change against a positive reference", () => {
    expect(computeGrowthPct(150, 100)).toBe(50);
    expect(computeGrowthPct(50, 100)).toBe(-50);
  });

  it("is undefined for a missing, zero or negative reference", () => {
    expect(computeGrowthPct(150, null)).toBeNull();
    expect(computeGrowthPct(150, 0)).toBeNull();
    expect(computeGrowthPct(150, -10)).toBeNull();
    expect(computeGrowthPct(null, 100)).toBeNull();
  });

  it("reports neutral portfolio growth when the reference total is zero", () => {
    expect(computePortfolioGrowthPct(1000, 0)).toBe(0);
    expect(computePortfolioGrowthPct(1200, 1000)).toBeCloseTo(20);
  });
});

describe("classifyItem", () => {
  it("never labels an at-risk item High-Scaling", () => {
    const result = classifyItem({ rating: 3.5, rating_count: 500, growth_pct: 40 }, DEFAULT_THRESHOLDS);
    expect(result).toEqual({ atRisk: true, highScaling: false, declining: false, label: "At Risk" });
  });

  it("labels fast growers with a good rating High-Scaling", () => {
    const result = classifyItem({ rating: 4.0, rating_count: 500, growth_pct: 20.5 }, DEFAULT_THRESHOLDS);
    expect(result.label).toBe("High-Scaling");
    expect(classifyItem({ rating: 4.0, rating_count: 500, growth_pct: 20 }, DEFAULT_THRESHOLDS).label).toBe(
      "Stable"
    );
  });

  it("flags declining independently of the label", () => {
    const result = classifyItem({ rating: 3.2, rating_count: 900, growth_pct: -12 }, DEFAULT_THRESHOLDS);
    expect(result).toEqual({ atRisk: true, highScaling: false, declining: true, label: "At Risk" });
  });

  it("needs both rating and rating count for At Risk", () => {
    expect(classifyItem({ rating: 3.2, rating_count: null, growth_pct: null }, DEFAULT_THRESHOLDS).label).toBe(
      "Stable"
    );
    expect(classifyItem({ rating: 3.2, rating_count: 200, growth_pct: null }, DEFAULT_THRESHOLDS).label).toBe(
      "Stable"
    );
  });
});

describe("computeBrandConcentration", () => {
  it("flags when the top three brands exceed 60% of revenue", () => {
    const latest = [
      makeCanonicalRow({ item_id: "1", date: LATEST, brand_name: "A", revenue: 500 }),
      makeCanonicalRow({ item_id: "2", date: LATEST, brand_name: "B", revenue: 200 }),
      makeCanonicalRow({ item_id: "3", date: LATEST, brand_name: "C", revenue: 100 }),
      makeCanonicalRow({ item_id: "4", date: LATEST, brand_name: "D", revenue: 50 }),
      makeCanonicalRow({ item_id: "5", date: LATEST, brand_name: null, revenue: 150 }),
    ];
    const concentration = computeBrandConcentration(latest);
    expect(concentration.topBrands.map((b) => b.brand_name)).toEqual(["A", "B", "(no brand)"]);
    expect(concentration.topSharePct).toBeCloseTo(85);
    expect(concentration.overConcentrated).toBe(true);
  });

  it("breaks revenue ties by code point", () => {
    const latest = [
      makeCanonicalRow({ item_id: "1", date: LATEST, brand_name: "alpha", revenue: 100 }),
      makeCanonicalRow({ item_id: "2", date: LATEST, brand_name: "Zeta", revenue: 100 }),
    ];
    expect(computeBrandConcentration(latest).brands.map((b) => b.brand_name)).toEqual(["Zeta", "alpha"]);
  });

  it("does not flag exactly 60%", () => {
    const latest = ["A", "B", "C", "D", "E"].map((brand, i) =>
      makeCanonicalRow({ item_id: String(i), date: LATEST, brand_name: brand, revenue: 100 })
    );
    const concentration = computeBrandConcentration(latest);
    expect(concentration.topSharePct).toBe(60);
    expect(concentration.overConcentrated).toBe(false);
  });
});

describe("computeListingKpis", () => {
  const rows = [
    makeCanonicalRow({ item_id: "1", date: REFERENCE, revenue: 1000, rating: 3.5, rating_count: 400 }),
    makeCanonicalRow({ item_id: "1", date: LATEST, revenue: 800, rating: 3.5, rating_count: 400 }),
    makeCanonicalRow({ item_id: "2", date: REFERENCE, revenue: 1000, rating: 4.6, rating_count: 50 }),
    makeCanonicalRow({ item_id: "2", date: LATEST, revenue: 1500, rating: 4.6, rating_count: 50 }),
    makeCanonicalRow({ item_id: "3", date: REFERENCE, revenue: 0, rating: null, rating_count: null }),
    makeCanonicalRow({ item_id: "3", date: LATEST, revenue: 700, rating: null, rating_count: null }),
    makeCanonicalRow({ item_id: "4", date: LATEST, revenue: 500, rating: 4.1, rating_count: 10 }),
  ];

  const kpis = computeListingKpis(buildWindow(rows), DEFAULT_THRESHOLDS);

  it("sums revenue on both snapshots", () => {
    expect(kpis.totalRevenueLatest).toBe(3500);
    expect(kpis.totalRevenueReference).toBe(2000);
    expect(kpis.portfolioGrowthPct).toBe(75);
  });

  it("computes per-item growth with null where the reference is not positive", () => {
    expect(kpis.items.map((item) => [item.item_id, item.growth_pct])).toEqual([
      ["1", -20],
      ["2", 50],
      ["3", null],
      ["4", null],
    ]);
  });

  it("lists at-risk, high-scaling and declining items", () => {
    expect(kpis.atRisk.map((item) => item.item_id)).toEqual(["1"]);
    expect(kpis.revenueAtRisk).toBe(800);
    expect(kpis.revenueAtRiskSharePct).toBeCloseTo((800 / 3500) * 100);
    expect(kpis.highScaling.map((item) => item.item_id)).toEqual(["2"]);
    expect(kpis.highScalingRevenue).toBe(1500);
    expect(kpis.declining.map((item) => item.item_id)).toEqual(["1"]);
    expect(kpis.stars.map((item) => item.item_id)).toEqual(["2"]);
  });

  it("averages ratings over items that have one", () => {
    expect(kpis.avgRating).toBeCloseTo((3.5 + 4.6 + 4.1) / 3);
  });

  it("reports zero shares and no average rating for an empty window", () => {
    const empty = computeListingKpis(buildWindow([]), DEFAULT_THRESHOLDS);
    expect(empty.totalRevenueLatest).toBe(0);
    expect(empty.portfolioGrowthPct).toBe(0);
    expect(empty.revenueAtRiskSharePct).toBe(0);
    expect(empty.avgRating).toBeNull();
    expect(empty.brandConcentration.overConcentrated).toBe(false);
  });
});
