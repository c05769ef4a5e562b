import path from "node:path";
import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

export const DEFAULT_RAW_FILE = "listingdata.csv";
export const DEFAULT_CANONICAL_FILE = "listingdata_canonical.csv";

export function getDataRoot(): string {
  return process.env.LISTING_DATA_ROOT ?? process.cwd();
}

/** Bare file names resolve against LISTING_DATA_ROOT; paths resolve against cwd. */
export function resolveListingPath(input: string): string {
  if (path.isAbsolute(input)) return input;
  if (input.includes("/") || input.includes("\\")) return path.resolve(process.cwd(), input);
  return path.join(getDataRoot(), input);
}

export function resolveRawInputPath(input?: string): string {
  return resolveListingPath(input ?? process.env.LISTING_RAW_FILE ?? DEFAULT_RAW_FILE);
}

export function resolveCanonicalPath(input?: string): string {
  return resolveListingPath(input ?? process.env.LISTING_CANONICAL_FILE ?? DEFAULT_CANONICAL_FILE);
}
