import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { compareItemDate } from "../lib/series";
import { parseCsv } from "./parseListingTable";
import { normalizeHeader, parseDateCell, parseIntSafe, parseNumberSafe, parseTextCell } from "./valueParsers";
import { CANONICAL_COLUMNS, type CanonicalColumn, type CanonicalRow } from "./types";

export const CANONICAL_SHEET_NAME = "canonical";

export type CanonicalTableParseResult = {
  rows: CanonicalRow[];
  skippedRows: number;
};

type CellValue = string | number | null;

const escapeCsv = (value: string): string => {
  if (value.includes('"')) {
    value = value.replace(/"/g, '""');
  }
  if (value.includes(",") || value.includes("\n") || value.includes("\r") || value.includes('"')) {
    return `"${value}"`;
  }
  return value;
};

function cellText(value: CellValue): string {
  if (value === null) return "";
  return typeof value === "number" ? String(value) : value;
}

export function canonicalRowToCells(row: CanonicalRow): CellValue[] {
  return CANONICAL_COLUMNS.map((column) => row[column]);
}

export function serializeCanonicalCsv(rows: readonly CanonicalRow[]): string {
  const lines = [CANONICAL_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(canonicalRowToCells(row).map((cell) => escapeCsv(cellText(cell))).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function writeCanonicalTable(rows: readonly CanonicalRow[], outputPath: string): string {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const ext = path.extname(outputPath).toLowerCase();
  if (ext === ".csv") {
    fs.writeFileSync(outputPath, serializeCanonicalCsv(rows), "utf8");
    return outputPath;
  }
  if (ext === ".xlsx") {
    const aoa: CellValue[][] = [[...CANONICAL_COLUMNS], ...rows.map(canonicalRowToCells)];
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(aoa), CANONICAL_SHEET_NAME);
    XLSX.writeFile(workbook, outputPath);
    return outputPath;
  }
  throw new Error(`Unsupported canonical output type "${ext}": ${outputPath}`);
}

function mapCanonicalHeaders(headers: readonly unknown[]): Map<CanonicalColumn, number> {
  const normalized = headers.map((h) => normalizeHeader(String(h ?? "")));
  const indexMap = new Map<CanonicalColumn, number>();
  const missing: string[] = [];
  for (const column of CANONICAL_COLUMNS) {
    const idx = normalized.indexOf(normalizeHeader(column));
    if (idx === -1) {
      missing.push(column);
      continue;
    }
    indexMap.set(column, idx);
  }
  if (missing.length) {
    throw new Error(`Canonical table missing required columns: ${missing.join(", ")}`);
  }
  return indexMap;
}

export function canonicalRowsFromCells(
  cells: readonly (readonly unknown[])[]
): CanonicalTableParseResult {
  if (!cells.length) return { rows: [], skippedRows: 0 };
  const headerMap = mapCanonicalHeaders(cells[0] ?? []);
  const at = (row: readonly unknown[], column: CanonicalColumn): unknown => {
    const idx = headerMap.get(column);
    return idx === undefined ? null : row[idx] ?? null;
  };

  const rows: CanonicalRow[] = [];
  let skippedRows = 0;
  for (let i = 1; i < cells.length; i += 1) {
    const row = cells[i] ?? [];
    const itemId = parseTextCell(at(row, "item_id"));
    const date = parseDateCell(at(row, "date"));
    if (!itemId || !date) {
      skippedRows += 1;
      continue;
    }
    rows.push({
      item_id: itemId,
      unique_identifier: parseTextCell(at(row, "unique_identifier")),
      brand_name: parseTextCell(at(row, "brand_name")),
      title: parseTextCell(at(row, "title")),
      category: parseTextCell(at(row, "category")),
      vertical: parseTextCell(at(row, "vertical")),
      sub_category: parseTextCell(at(row, "sub_category")),
      super_category: parseTextCell(at(row, "super_category")),
      date,
      revenue: parseNumberSafe(at(row, "revenue")),
      price: parseNumberSafe(at(row, "price")),
      rating: parseNumberSafe(at(row, "rating")),
      rating_count: parseIntSafe(at(row, "rating_count")),
      variations_count: parseIntSafe(at(row, "variations_count")),
    });
  }

  rows.sort(compareItemDate);
  return { rows, skippedRows };
}

export function parseCanonicalCsv(content: string): CanonicalTableParseResult {
  return canonicalRowsFromCells(parseCsv(content));
}

export function readCanonicalTable(filePath: string): CanonicalTableParseResult {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Canonical table not found: ${filePath}`);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".csv") return parseCanonicalCsv(fs.readFileSync(filePath, "utf8"));
  if (ext === ".xlsx") {
    const workbook = XLSX.readFile(filePath, { dense: true });
    const sheet = workbook.Sheets[CANONICAL_SHEET_NAME] ?? workbook.Sheets[workbook.SheetNames[0] ?? ""];
    if (!sheet) {
      throw new Error(`Workbook has no canonical sheet: ${filePath}`);
    }
    const cells = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
    return canonicalRowsFromCells(cells);
  }
  throw new Error(`Unsupported canonical table type "${ext}": ${filePath}`);
}
