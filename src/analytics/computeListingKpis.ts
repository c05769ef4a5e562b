import { compareCodePoints, compareItemIds, firstBy, sumNullable } from "../lib/series";
import type { CanonicalRow } from "../listing/types";
import type { KpiThresholds } from "./filterConfig";
import type { SnapshotWindow } from "./filterWindow";

export const CONCENTRATION_TOP_N = 3;
export const CONCENTRATION_THRESHOLD_PCT = 60;
export const STARS_LIMIT = 10;

export type ClassificationLabel = "At Risk" | "High-Scaling" | "Stable";

export type ItemClassification = {
  atRisk: boolean;
  highScaling: boolean;
  declining: boolean;
  label: ClassificationLabel;
};

export type ItemKpi = ItemClassification & {
  item_id: string;
  brand_name: string | null;
  title: string | null;
  rating: number | null;
  rating_count: number | null;
  revenue_latest: number | null;
  revenue_reference: number | null;
  growth_pct: number | null;
};

export type BrandRevenue = {
  brand_name: string;
  revenue: number;
  share_pct: number;
};

export type BrandConcentration = {
  brands: BrandRevenue[];
  topBrands: BrandRevenue[];
  topSharePct: number;
  overConcentrated: boolean;
};

export type ListingKpis = {
  items: ItemKpi[];
  totalRevenueLatest: number;
  totalRevenueReference: number;
  portfolioGrowthPct: number;
  atRisk: ItemKpi[];
  revenueAtRisk: number;
  revenueAtRiskSharePct: number;
  highScaling: ItemKpi[];
  highScalingRevenue: number;
  highScalingSharePct: number;
  declining: ItemKpi[];
  stars: ItemKpi[];
  avgRating: number | null;
  brandConcentration: BrandConcentration;
};

const UNBRANDED = "(no brand)";

/** Per-item growth. Undefined (null) without a positive reference revenue. */
export function computeGrowthPct(latest: number | null, reference: number | null): number | null {
  if (latest === null || reference === null || reference <= 0) return null;
  return ((latest - reference) / reference) * 100;
}

/** Portfolio growth. A zero reference total reports neutral growth, not null. */
export function computePortfolioGrowthPct(latestTotal: number, referenceTotal: number): number {
  if (referenceTotal === 0) return 0;
  return ((latestTotal - referenceTotal) / referenceTotal) * 100;
}

/** Share of `total`; 0 when the total is 0. */
export function sharePct(part: number, total: number): number {
  if (total === 0) return 0;
  return (part / total) * 100;
}

export function classifyItem(
  item: { rating: number | null; rating_count: number | null; growth_pct: number | null },
  thresholds: KpiThresholds
): ItemClassification {
  const { rating, rating_count: ratingCount, growth_pct: growth } = item;
  const atRisk =
    rating !== null &&
    ratingCount !== null &&
    rating < thresholds.minRating &&
    ratingCount > thresholds.minRatingCount;
  const highScaling =
    growth !== null &&
    rating !== null &&
    growth > thresholds.growthThresholdPct &&
    rating >= thresholds.minRating;
  const declining = growth !== null && growth < 0;

  let label: ClassificationLabel = "Stable";
  if (atRisk) label = "At Risk";
  else if (highScaling) label = "High-Scaling";

  return { atRisk, highScaling, declining, label };
}

export function buildItemKpis(
  window: SnapshotWindow,
  thresholds: KpiThresholds
): ItemKpi[] {
  const latestByItem = firstBy(window.latest, (row) => row.item_id);
  const referenceByItem = firstBy(window.reference, (row) => row.item_id);

  return Array.from(latestByItem.values())
    .sort((a, b) => compareItemIds(a.item_id, b.item_id))
    .map((row) => {
      const revenueReference = referenceByItem.get(row.item_id)?.revenue ?? null;
      const growth = computeGrowthPct(row.revenue, revenueReference);
      const base = {
        item_id: row.item_id,
        brand_name: row.brand_name,
        title: row.title,
        rating: row.rating,
        rating_count: row.rating_count,
        revenue_latest: row.revenue,
        revenue_reference: revenueReference,
        growth_pct: growth,
      };
      return { ...base, ...classifyItem(base, thresholds) };
    });
}

export function computeBrandConcentration(latest: readonly CanonicalRow[]): BrandConcentration {
  const totals = new Map<string, number>();
  for (const row of latest) {
    const brand = row.brand_name ?? UNBRANDED;
    totals.set(brand, (totals.get(brand) ?? 0) + (row.revenue ?? 0));
  }
  const total = sumNullable(totals.values());

  const brands = Array.from(totals.entries())
    .map(([brand_name, revenue]) => ({ brand_name, revenue, share_pct: sharePct(revenue, total) }))
    .sort((a, b) => b.revenue - a.revenue || compareCodePoints(a.brand_name, b.brand_name));

  const topBrands = brands.slice(0, CONCENTRATION_TOP_N);
  const topSharePct = sharePct(sumNullable(topBrands.map((b) => b.revenue)), total);

  return {
    brands,
    topBrands,
    topSharePct,
    overConcentrated: topSharePct > CONCENTRATION_THRESHOLD_PCT,
  };
}

const byGrowthDesc = (a: ItemKpi, b: ItemKpi) => (b.growth_pct ?? 0) - (a.growth_pct ?? 0);
const byGrowthAsc = (a: ItemKpi, b: ItemKpi) => (a.growth_pct ?? 0) - (b.growth_pct ?? 0);

/**
 * KPIs over a snapshot window whose rows are already deduplicated on
 * (item_id, date).
 */
export function computeListingKpis(window: SnapshotWindow, thresholds: KpiThresholds): ListingKpis {
  const items = buildItemKpis(window, thresholds);

  const totalRevenueLatest = sumNullable(window.latest.map((row) => row.revenue));
  const totalRevenueReference = sumNullable(window.reference.map((row) => row.revenue));

  const atRisk = items.filter((item) => item.atRisk);
  const revenueAtRisk = sumNullable(atRisk.map((item) => item.revenue_latest));

  const highScaling = items.filter((item) => item.label === "High-Scaling").sort(byGrowthDesc);
  const highScalingRevenue = sumNullable(highScaling.map((item) => item.revenue_latest));

  const declining = items.filter((item) => item.declining).sort(byGrowthAsc);

  const stars = items
    .filter((item) => item.growth_pct !== null && item.growth_pct > 0)
    .sort((a, b) => (b.revenue_latest ?? 0) - (a.revenue_latest ?? 0))
    .slice(0, STARS_LIMIT);

  const ratings = window.latest
    .map((row) => row.rating)
    .filter((rating): rating is number => rating !== null);
  const avgRating = ratings.length ? sumNullable(ratings) / ratings.length : null;

  return {
    items,
    totalRevenueLatest,
    totalRevenueReference,
    portfolioGrowthPct: computePortfolioGrowthPct(totalRevenueLatest, totalRevenueReference),
    atRisk,
    revenueAtRisk,
    revenueAtRiskSharePct: sharePct(revenueAtRisk, totalRevenueLatest),
    highScaling,
    highScalingRevenue,
    highScalingSharePct: sharePct(highScalingRevenue, totalRevenueLatest),
    declining,
    stars,
    avgRating,
    brandConcentration: computeBrandConcentration(window.latest),
  };
}
