import { firstBy } from "../lib/series";
import { EMPTY_CONTENT_FIELDS, extractContentFields } from "./extractContentFields";
import type { ContentFields, ItemMetadata, RawListingRecord, ReconciledRow } from "./types";

type RecordMetadata = Pick<
  ItemMetadata,
  "item_id" | "unique_identifier" | "brand_name" | "rating" | "rating_count" | "variations_count"
>;

export type EnrichedRow = ReconciledRow & Omit<ItemMetadata, "item_id">;

export type JoinResult = {
  rows: EnrichedRow[];
  itemsWithoutMetadata: number;
  itemsWithoutSeries: number;
};

const EMPTY_METADATA: Omit<ItemMetadata, "item_id"> = {
  ...EMPTY_CONTENT_FIELDS,
  unique_identifier: null,
  brand_name: null,
  rating: null,
  rating_count: null,
  variations_count: null,
};

export function extractContentByItem(
  records: readonly RawListingRecord[]
): Map<string, ContentFields & { item_id: string }> {
  const content = new Map<string, ContentFields & { item_id: string }>();
  for (const [itemId, record] of firstBy(records, (r) => r.item_id)) {
    content.set(itemId, { item_id: itemId, ...extractContentFields(record.page_content) });
  }
  return content;
}

export function dedupeRecordMetadata(
  records: readonly RawListingRecord[]
): Map<string, RecordMetadata> {
  const metadata = new Map<string, RecordMetadata>();
  for (const [itemId, record] of firstBy(records, (r) => r.item_id)) {
    metadata.set(itemId, {
      item_id: itemId,
      unique_identifier: record.unique_identifier,
      brand_name: record.brand_name,
      rating: record.rating,
      rating_count: record.rating_count,
      variations_count: record.variations_count,
    });
  }
  return metadata;
}

/** One metadata row per item; the first record seen for an item wins. */
export function buildItemMetadata(records: readonly RawListingRecord[]): Map<string, ItemMetadata> {
  const content = extractContentByItem(records);
  const recordMetadata = dedupeRecordMetadata(records);

  const combined = new Map<string, ItemMetadata>();
  for (const [itemId, fields] of content) {
    const meta = recordMetadata.get(itemId);
    combined.set(itemId, {
      ...EMPTY_METADATA,
      ...fields,
      ...(meta ?? {}),
      item_id: itemId,
    });
  }
  return combined;
}

export function joinMetadata(
  rows: readonly ReconciledRow[],
  metadata: ReadonlyMap<string, ItemMetadata>
): JoinResult {
  const missing = new Set<string>();
  const seriesItems = new Set<string>();

  const joined = rows.map((row): EnrichedRow => {
    seriesItems.add(row.item_id);
    const meta = metadata.get(row.item_id);
    if (!meta) {
      missing.add(row.item_id);
      return { ...EMPTY_METADATA, ...row };
    }
    return { ...meta, ...row };
  });

  let itemsWithoutSeries = 0;
  for (const itemId of metadata.keys()) {
    if (!seriesItems.has(itemId)) itemsWithoutSeries += 1;
  }

  return { rows: joined, itemsWithoutMetadata: missing.size, itemsWithoutSeries };
}
