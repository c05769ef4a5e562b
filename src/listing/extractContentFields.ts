import { decodeJsonPayload, isJsonObject } from "./safeJson";
import type { ContentFields } from "./types";
import { parseTextCell } from "./valueParsers";

const CONTENT_KEYS: Record<keyof ContentFields, string> = {
  title: "title",
  category: "category",
  vertical: "vertical",
  sub_category: "subCategory",
  super_category: "superCategory",
};

export const EMPTY_CONTENT_FIELDS: ContentFields = {
  title: null,
  category: null,
  vertical: null,
  sub_category: null,
  super_category: null,
};

export function extractContentFields(raw: unknown): ContentFields {
  const parsed = decodeJsonPayload(raw);
  if (!isJsonObject(parsed)) return { ...EMPTY_CONTENT_FIELDS };

  return {
    title: parseTextCell(parsed[CONTENT_KEYS.title]),
    category: parseTextCell(parsed[CONTENT_KEYS.category]),
    vertical: parseTextCell(parsed[CONTENT_KEYS.vertical]),
    sub_category: parseTextCell(parsed[CONTENT_KEYS.sub_category]),
    super_category: parseTextCell(parsed[CONTENT_KEYS.super_category]),
  };
}
