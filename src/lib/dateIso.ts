const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;
const SLASH_DATE_RE = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= lastDay;
}

function toIso(year: number, month: number, day: number): string | null {
  if (!isValidCalendarDate(year, month, day)) return null;
  const yearStr = String(year).padStart(4, "0");
  const monthStr = String(month).padStart(2, "0");
  const dayStr = String(day).padStart(2, "0");
  return `${yearStr}-${monthStr}-${dayStr}`;
}

export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Normalizes a history or table date to `YYYY-MM-DD`.
 *
 * Accepts ISO dates and timestamps (time part dropped), `M/D/YYYY` and
 * `D/M/YYYY`. Returns null for anything that is not a real calendar date.
 */
export function parseDateFlexible(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatUtcDate(value);
  }
  if (typeof value !== "string") return null;
  const raw = value.trim();
  if (!raw) return null;

  const isoMatch = raw.match(ISO_DATE_RE);
  if (isoMatch) {
    return toIso(Number(isoMatch[1]), Number(isoMatch[2]), Number(isoMatch[3]));
  }

  const slashMatch = raw.match(SLASH_DATE_RE);
  if (slashMatch) {
    const first = Number.parseInt(slashMatch[1], 10);
    const second = Number.parseInt(slashMatch[2], 10);
    const year = Number.parseInt(slashMatch[3], 10);
    let month = first;
    let day = second;

    // If the first number exceeds 12, treat as DD/MM/YYYY.
    // Otherwise, default to MM/DD/YYYY for ambiguous cases.
    if (first > 12 && second <= 12) {
      day = first;
      month = second;
    }
    return toIso(year, month, day);
  }

  return null;
}

export function parseISODate(value: string): Date {
  const [year, month, day] = value.split("-").map(Number);
  return new Date(Date.UTC(year, (month ?? 1) - 1, day ?? 1));
}

export function addDaysUtc(dateIso: string, days: number): string {
  const next = new Date(parseISODate(dateIso).getTime() + days * DAY_MS);
  return formatUtcDate(next);
}

export function diffDaysUtc(a: string, b: string): number {
  return Math.round((parseISODate(a).getTime() - parseISODate(b).getTime()) / DAY_MS);
}

export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && parseDateFlexible(value) === value;
}
