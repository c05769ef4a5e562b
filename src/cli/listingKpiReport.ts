import { isFilterConfigError } from "../analytics/FilterConfigError";
import { queryListingKpis } from "../analytics/queryListingKpis";
import { buildInsights, renderKpiReport } from "../analytics/renderKpiReport";
import { resolveCanonicalPath } from "../fs/listingLocator";
import { readCanonicalTable } from "../listing/canonicalTableIo";
import { filterInputFromArgs, getArg, getArgs, hasFlag } from "./args";

function usage() {
  console.log(
    "Usage: npm run report:kpi -- [--input <canonical.csv>] [--start YYYY-MM-DD] [--end YYYY-MM-DD]\n" +
      "  [--brand <name>]... [--item <id>]... [--trend-item <id>]...\n" +
      "  [--min-rating 4.0] [--min-rating-count 200] [--growth-threshold 20] [--json]"
  );
}

async function main() {
  if (hasFlag("--help")) {
    usage();
    return;
  }

  const inputPath = resolveCanonicalPath(getArg("--input"));
  const { rows, skippedRows } = readCanonicalTable(inputPath);
  if (skippedRows) {
    console.warn(`Skipped ${skippedRows} canonical row(s) without item_id or date.`);
  }

  try {
    const result = queryListingKpis(rows, filterInputFromArgs(process.argv), {
      trendItems: getArgs("--trend-item"),
    });
    if (hasFlag("--json")) {
      const payload = {
        config: result.config,
        summary: result.summary,
        latestDate: result.window.latestDate,
        referenceDate: result.window.referenceDate,
        kpis: result.kpis,
        insights: buildInsights(result),
        revenueTrend: result.revenueTrend,
        priceTrend: result.priceTrend,
      };
      console.log(JSON.stringify(payload, null, 2));
      return;
    }
    process.stdout.write(renderKpiReport(result));
  } catch (err) {
    if (isFilterConfigError(err)) {
      console.error(`Invalid filters: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
