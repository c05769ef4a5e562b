import type { FilterConfigInput } from "../analytics/filterConfig";

export function getArg(flag: string, argv: readonly string[] = process.argv): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

export function getArgs(flag: string, argv: readonly string[] = process.argv): string[] {
  const values: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    if (argv[i] !== flag) continue;
    const value = argv[i + 1];
    if (value !== undefined && !value.startsWith("--")) values.push(value);
  }
  return values;
}

export function hasFlag(flag: string, argv: readonly string[] = process.argv): boolean {
  return argv.includes(flag);
}

export function parseNumberArg(flag: string, argv: readonly string[] = process.argv): number | undefined {
  const raw = getArg(flag, argv);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid number for ${flag}: ${raw}`);
  }
  return value;
}

export function filterInputFromArgs(argv: readonly string[]): FilterConfigInput {
  return {
    startDate: getArg("--start", argv),
    endDate: getArg("--end", argv),
    brands: getArgs("--brand", argv),
    items: getArgs("--item", argv),
    minRating: parseNumberArg("--min-rating", argv),
    minRatingCount: parseNumberArg("--min-rating-count", argv),
    growthThresholdPct: parseNumberArg("--growth-threshold", argv),
  };
}
