import type { JsonArray, JsonObject } from "./types";

export type DecodedJson = JsonObject | JsonArray | null;

export function isJsonObject(value: unknown): value is JsonObject {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isJsonArray(value: unknown): value is JsonArray {
  return Array.isArray(value);
}

/**
 * Decodes an embedded JSON payload. Accepts JSON text or an already-parsed
 * object/array and returns null for anything else, including malformed text
 * and JSON scalars. Never throws.
 */
export function decodeJsonPayload(raw: unknown): DecodedJson {
  if (raw === null || raw === undefined) return null;
  if (isJsonArray(raw) || isJsonObject(raw)) return raw;
  if (typeof raw !== "string") return null;

  const text = raw.trim();
  if (!text) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (isJsonArray(parsed) || isJsonObject(parsed)) return parsed;
  return null;
}
