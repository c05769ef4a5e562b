import { resolveCanonicalPath, resolveRawInputPath } from "../fs/listingLocator";
import { processListingFile } from "../pipeline/runListingPipeline";
import { getArg, hasFlag } from "./args";

function usage() {
  console.log(
    "Usage: npm run pipeline:listing -- [--input <raw.csv|raw.xlsx>] [--output <canonical.csv|canonical.xlsx>]\n" +
      "Defaults come from LISTING_RAW_FILE / LISTING_CANONICAL_FILE under LISTING_DATA_ROOT (.env.local)."
  );
}

async function main() {
  if (hasFlag("--help")) {
    usage();
    return;
  }

  const inputPath = resolveRawInputPath(getArg("--input"));
  const outputPath = resolveCanonicalPath(getArg("--output"));

  const result = processListingFile({ inputPath, outputPath });

  console.log("Done.");
  console.log({
    outputPath: result.outputPath,
    outputSha256: result.outputSha256,
    records: result.stats.records,
    uniqueItems: result.stats.uniqueItems,
    canonicalRows: result.stats.canonicalRows,
    skippedInputRows: result.skippedInputRows,
    skippedRevenueRecords: result.stats.revenue.recordsSkipped,
    skippedPriceRecords: result.stats.price.recordsSkipped,
    itemsWithoutMetadata: result.stats.itemsWithoutMetadata,
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
