import { CONCENTRATION_TOP_N, type ItemKpi } from "./computeListingKpis";
import { REFERENCE_WINDOW_WEEKS } from "./filterWindow";
import type { ListingKpiQueryResult } from "./queryListingKpis";

export type InsightTone = "risk" | "growth" | "info";

export type Insight = {
  tone: InsightTone;
  title: string;
  message: string;
};

const groupedInteger = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export function formatInr(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1e7) return `₹${(value / 1e7).toFixed(2)} Cr`;
  if (abs >= 1e5) return `₹${(value / 1e5).toFixed(2)} L`;
  if (abs >= 1e3) return `₹${(value / 1e3).toFixed(1)} K`;
  return `₹${groupedInteger.format(value)}`;
}

export function formatSignedPct(value: number | null): string {
  if (value === null) return "N/A";
  const sign = value >= 0 ? "+" : "";
  return `${sign}${value.toFixed(1)}%`;
}

export function buildInsights(result: ListingKpiQueryResult): Insight[] {
  const { kpis, config } = result;
  const insights: Insight[] = [];
  const weeks = `${REFERENCE_WINDOW_WEEKS} weeks`;

  if (kpis.revenueAtRisk > 0) {
    insights.push({
      tone: "risk",
      title: "Revenue at Risk",
      message:
        `${formatInr(kpis.revenueAtRisk)} (${kpis.revenueAtRiskSharePct.toFixed(1)}% of portfolio) ` +
        `sits in ${kpis.atRisk.length} item(s) with rating < ${config.minRating} and ` +
        `> ${config.minRatingCount} reviews.`,
    });
  }

  if (kpis.highScaling.length > 0) {
    insights.push({
      tone: "growth",
      title: "Growth Opportunity",
      message:
        `${kpis.highScaling.length} item(s) growing >${config.growthThresholdPct}% with rating >= ` +
        `${config.minRating}, contributing ${formatInr(kpis.highScalingRevenue)} ` +
        `(${kpis.highScalingSharePct.toFixed(1)}% of portfolio).`,
    });
  }

  if (kpis.portfolioGrowthPct < 0) {
    insights.push({
      tone: "risk",
      title: "Portfolio Declining",
      message: `Overall revenue fell ${kpis.portfolioGrowthPct.toFixed(1)}% over ${weeks}.`,
    });
  } else if (kpis.portfolioGrowthPct > 0) {
    insights.push({
      tone: "info",
      title: "Portfolio Health",
      message:
        `Revenue grew ${kpis.portfolioGrowthPct.toFixed(1)}% over ${weeks} from ` +
        `${formatInr(kpis.totalRevenueReference)} to ${formatInr(kpis.totalRevenueLatest)}.`,
    });
  }

  const concentration = kpis.brandConcentration;
  if (concentration.brands.length) {
    const share = concentration.topSharePct.toFixed(1);
    insights.push(
      concentration.overConcentrated
        ? {
            tone: "risk",
            title: "Concentration Warning",
            message:
              `Top ${CONCENTRATION_TOP_N} brands (${concentration.topBrands.map((b) => b.brand_name).join(", ")}) ` +
              `account for ${share}% of total revenue.`,
          }
        : {
            tone: "growth",
            title: "Healthy Diversification",
            message: `Top ${CONCENTRATION_TOP_N} brands contribute ${share}% of total revenue.`,
          }
    );
  }

  return insights;
}

function itemLine(item: ItemKpi): string {
  return [
    item.item_id,
    item.brand_name ?? "-",
    formatInr(item.revenue_latest ?? 0),
    item.revenue_reference === null ? "-" : formatInr(item.revenue_reference),
    formatSignedPct(item.growth_pct),
    item.rating === null ? "-" : item.rating.toFixed(1),
    item.rating_count === null ? "-" : String(item.rating_count),
  ].join(" | ");
}

function section(title: string, items: ItemKpi[], empty: string): string[] {
  const lines = ["", `## ${title}`];
  if (!items.length) {
    lines.push(empty);
    return lines;
  }
  lines.push("item | brand | revenue | revenue (ref) | growth | rating | reviews");
  items.forEach((item) => lines.push(itemLine(item)));
  return lines;
}

export function renderKpiReport(result: ListingKpiQueryResult): string {
  const { kpis, summary, window, config } = result;
  const lines: string[] = [
    "# Listing KPI Report",
    `Filters: ${config.startDate} to ${config.endDate} · brands: ${config.brands.length ? config.brands.join(", ") : "all"} · items: ${config.items.length ? config.items.join(", ") : "all"}`,
    `Records: ${summary.recordCount} · Items: ${summary.itemCount} · Brands: ${summary.brandCount} · ` +
      `Latest date: ${window.latestDate ?? "N/A"} · Reference date: ${window.referenceDate ?? "N/A"} · ` +
      `Active on latest: ${summary.activeItemsOnLatest}`,
    "",
    `Total Revenue (Latest): ${formatInr(kpis.totalRevenueLatest)}`,
    `Portfolio ${REFERENCE_WINDOW_WEEKS}W Growth: ${formatSignedPct(kpis.portfolioGrowthPct)}`,
    `Revenue At Risk: ${formatInr(kpis.revenueAtRisk)} (${kpis.atRisk.length} item(s))`,
    `High-Scaling Items: ${kpis.highScaling.length} (${formatInr(kpis.highScalingRevenue)})`,
    `Avg Portfolio Rating: ${kpis.avgRating === null ? "N/A" : kpis.avgRating.toFixed(2)}`,
  ];

  const insights = buildInsights(result);
  if (insights.length) {
    lines.push("", "## Insights");
    insights.forEach((insight) => lines.push(`[${insight.tone}] ${insight.title}: ${insight.message}`));
  }

  lines.push(...section("At Risk", kpis.atRisk, "No items currently at risk with the selected filters."));
  lines.push(...section("Declining", kpis.declining, "No declining items in the selected period."));
  lines.push(
    ...section("High-Scaling", kpis.highScaling, "No items meet the high-scaling criteria.")
  );
  lines.push(...section(`Portfolio Stars (Top ${kpis.stars.length})`, kpis.stars, "No items with positive growth."));

  lines.push("", "## Brands");
  if (!kpis.brandConcentration.brands.length) {
    lines.push("No brand revenue on the latest date.");
  }
  kpis.brandConcentration.brands.forEach((brand) => {
    lines.push(`${brand.brand_name} | ${formatInr(brand.revenue)} | ${brand.share_pct.toFixed(1)}%`);
  });

  return `${lines.join("\n")}\n`;
}
