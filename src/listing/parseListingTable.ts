import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { normalizeHeader, parseIntSafe, parseNumberSafe, parseTextCell } from "./valueParsers";
import type { RawListingRecord } from "./types";

export type ListingTableParseResult = {
  records: RawListingRecord[];
  skippedRows: number;
};

type RawField = keyof RawListingRecord;
type Cell = unknown;

const HEADER_ALIASES: Record<RawField, string[]> = {
  item_id: ["item id", "itemid", "product id", "sku"],
  unique_identifier: ["unique identifier", "uniqueidentifier", "unique id"],
  brand_name: ["brand name", "brandname", "brand"],
  rating: ["rating", "avg rating", "average rating"],
  rating_count: ["rating count", "ratingcount", "ratings count", "review count"],
  variations_count: ["variations count", "variation count", "variationscount", "variations"],
  page_content: ["page content", "pagecontent", "content"],
  monthly_revenue_history: [
    "monthly revenue history",
    "monthlyrevenuehistory",
    "revenue history",
  ],
  promotion_history: ["promotion history", "promotionhistory", "price history"],
};

const RAW_FIELDS: RawField[] = [
  "item_id",
  "unique_identifier",
  "brand_name",
  "rating",
  "rating_count",
  "variations_count",
  "page_content",
  "monthly_revenue_history",
  "promotion_history",
];

export function mapHeaders(headers: readonly Cell[]): Partial<Record<RawField, number>> {
  const normalized = headers.map((h) => normalizeHeader(String(h ?? "")));
  const indexMap: Partial<Record<RawField, number>> = {};
  for (const field of RAW_FIELDS) {
    const aliases = HEADER_ALIASES[field];
    for (let i = 0; i < normalized.length; i += 1) {
      if (aliases.includes(normalized[i])) {
        indexMap[field] = i;
        break;
      }
    }
  }
  return indexMap;
}

export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i];
    if (char === '"') {
      const next = content[i + 1];
      if (inQuotes && next === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "," && !inQuotes) {
      current.push(field);
      field = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && content[i + 1] === "\n") {
        i += 1;
      }
      current.push(field);
      field = "";
      if (current.length > 1 || current[0]?.trim()) {
        rows.push(current);
      }
      current = [];
      continue;
    }

    field += char;
  }

  if (field.length || current.length) {
    current.push(field);
    if (current.length > 1 || current[0]?.trim()) rows.push(current);
  }

  return rows;
}

export function recordsFromRows(rows: readonly (readonly Cell[])[]): ListingTableParseResult {
  if (!rows.length) return { records: [], skippedRows: 0 };

  const headerMap = mapHeaders(rows[0] ?? []);
  if (headerMap.item_id === undefined) {
    throw new Error("Listing table is missing the item_id column.");
  }

  const cell = (row: readonly Cell[], field: RawField): Cell => {
    const idx = headerMap[field];
    return idx === undefined ? null : row[idx] ?? null;
  };

  const records: RawListingRecord[] = [];
  let skippedRows = 0;

  for (let i = 1; i < rows.length; i += 1) {
    const row = rows[i] ?? [];
    const itemId = parseTextCell(cell(row, "item_id"));
    if (!itemId) {
      skippedRows += 1;
      continue;
    }

    records.push({
      item_id: itemId,
      unique_identifier: parseTextCell(cell(row, "unique_identifier")),
      brand_name: parseTextCell(cell(row, "brand_name")),
      rating: parseNumberSafe(cell(row, "rating")),
      rating_count: parseIntSafe(cell(row, "rating_count")),
      variations_count: parseIntSafe(cell(row, "variations_count")),
      page_content: cell(row, "page_content"),
      monthly_revenue_history: cell(row, "monthly_revenue_history"),
      promotion_history: cell(row, "promotion_history"),
    });
  }

  return { records, skippedRows };
}

/** Parses CSV text, or the contents of a `.csv` path. */
export function parseListingTable(input: string): ListingTableParseResult {
  const content = fs.existsSync(input) ? fs.readFileSync(input, "utf8") : input;
  return recordsFromRows(parseCsv(content));
}

export function readListingWorkbook(filePath: string): ListingTableParseResult {
  const workbook = XLSX.readFile(filePath, { dense: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new Error(`Workbook has no sheets: ${filePath}`);
  }
  const rows = XLSX.utils.sheet_to_json<Cell[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  return recordsFromRows(rows);
}

export function readListingTable(filePath: string): ListingTableParseResult {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Listing file not found: ${filePath}`);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".csv") return recordsFromRows(parseCsv(fs.readFileSync(filePath, "utf8")));
  if (ext === ".xlsx" || ext === ".xls") return readListingWorkbook(filePath);
  throw new Error(`Unsupported listing file type "${ext}": ${filePath}`);
}
