import * as XLSX from "xlsx";
import { formatUtcDate, parseDateFlexible } from "../lib/dateIso";

export function normalizeHeader(value: string): string {
  const trimmed = value.replace(/^\uFEFF/, "");
  return trimmed
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function parseTextCell(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") {
    const raw = value.trim();
    return raw ? raw : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "boolean") return String(value);
  return null;
}

export function parseNumberSafe(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const raw = value.trim();
  if (!raw) return null;
  const cleaned = raw.replace(/,/g, "");
  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
}

export function parseIntSafe(value: unknown): number | null {
  const num = parseNumberSafe(value);
  if (num === null) return null;
  return Math.trunc(num);
}

/** Dates arrive as text in CSV exports and as serial numbers in spreadsheets. */
export function parseDateCell(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return formatUtcDate(value);
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    const dateCode = XLSX.SSF.parse_date_code(value);
    if (!dateCode) return null;
    const year = String(dateCode.y).padStart(4, "0");
    const month = String(dateCode.m).padStart(2, "0");
    const day = String(dateCode.d).padStart(2, "0");
    return `${year}-${month}-${day}`;
  }
  return parseDateFlexible(value);
}
