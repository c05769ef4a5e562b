import { buildCanonicalTable } from "../listing/buildCanonicalTable";
import { writeCanonicalTable } from "../listing/canonicalTableIo";
import { flattenHistory, PROMOTION_HISTORY, REVENUE_HISTORY, type FlattenStats } from "../listing/flattenHistory";
import { buildItemMetadata, joinMetadata } from "../listing/joinMetadata";
import { readListingTable } from "../listing/parseListingTable";
import { reconcileSeries } from "../listing/reconcileSeries";
import type { CanonicalRow, RawListingRecord } from "../listing/types";
import { hashFileSha256 } from "../lib/fileHash";

export type PipelineLogger = Pick<Console, "log" | "warn">;

export type PipelineStats = {
  records: number;
  uniqueItems: number;
  revenueRows: number;
  priceRows: number;
  revenue: FlattenStats;
  price: FlattenStats;
  reconciledRows: number;
  itemsWithoutMetadata: number;
  itemsWithoutSeries: number;
  canonicalRows: number;
};

export type PipelineResult = {
  rows: CanonicalRow[];
  stats: PipelineStats;
};

export type RunListingPipelineOptions = {
  logger?: PipelineLogger;
};

function warnSkipped(logger: PipelineLogger, label: string, stats: FlattenStats) {
  if (!stats.recordsSkipped && !stats.elementsSkipped) return;
  logger.warn(
    `  ${label}: skipped ${stats.recordsSkipped} malformed record(s), ` +
      `${stats.elementsSkipped} element(s) (not_object=${stats.skipReasons.not_object}, ` +
      `invalid_date=${stats.skipReasons.invalid_date})`
  );
}

export function runListingPipeline(
  records: readonly RawListingRecord[],
  options: RunListingPipelineOptions = {}
): PipelineResult {
  const logger = options.logger ?? console;

  logger.log("Extracting page_content + metadata...");
  const metadata = buildItemMetadata(records);
  logger.log(`  Extracted metadata for ${metadata.size} unique items`);

  logger.log("Flattening revenue history...");
  const revenue = flattenHistory(records, REVENUE_HISTORY);
  logger.log(`  Revenue rows: ${revenue.rows.length}`);
  warnSkipped(logger, "revenue history", revenue.stats);

  logger.log("Flattening promotion history...");
  const price = flattenHistory(records, PROMOTION_HISTORY);
  logger.log(`  Promotion rows: ${price.rows.length}`);
  warnSkipped(logger, "promotion history", price.stats);

  logger.log("Reconciling revenue and price series...");
  const reconciled = reconcileSeries(revenue.rows, price.rows);
  logger.log(`  Reconciled rows: ${reconciled.length}`);

  logger.log("Joining item metadata...");
  const joined = joinMetadata(reconciled, metadata);
  if (joined.itemsWithoutMetadata || joined.itemsWithoutSeries) {
    logger.warn(
      `  Join gaps: ${joined.itemsWithoutMetadata} item(s) without metadata, ` +
        `${joined.itemsWithoutSeries} item(s) without series rows`
    );
  }

  const rows = buildCanonicalTable(joined.rows);
  logger.log(`  Canonical rows: ${rows.length}`);

  return {
    rows,
    stats: {
      records: records.length,
      uniqueItems: metadata.size,
      revenueRows: revenue.rows.length,
      priceRows: price.rows.length,
      revenue: revenue.stats,
      price: price.stats,
      reconciledRows: reconciled.length,
      itemsWithoutMetadata: joined.itemsWithoutMetadata,
      itemsWithoutSeries: joined.itemsWithoutSeries,
      canonicalRows: rows.length,
    },
  };
}

export type ProcessListingFileResult = {
  outputPath: string;
  outputSha256: string;
  skippedInputRows: number;
  stats: PipelineStats;
};

export function processListingFile(params: {
  inputPath: string;
  outputPath: string;
  logger?: PipelineLogger;
}): ProcessListingFileResult {
  const { inputPath, outputPath } = params;
  const logger = params.logger ?? console;

  logger.log(`Loading listing table: ${inputPath}`);
  const { records, skippedRows } = readListingTable(inputPath);
  logger.log(`  Loaded ${records.length} rows`);
  if (skippedRows) {
    logger.warn(`  Skipped ${skippedRows} row(s) without an item_id`);
  }

  const { rows, stats } = runListingPipeline(records, { logger });

  logger.log(`Saving to ${outputPath}...`);
  writeCanonicalTable(rows, outputPath);
  const outputSha256 = hashFileSha256(outputPath);
  logger.log(`  Saved ${rows.length} rows to ${outputPath}`);

  return { outputPath, outputSha256, skippedInputRows: skippedRows, stats };
}
