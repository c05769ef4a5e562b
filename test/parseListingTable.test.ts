import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  mapHeaders,
  parseCsv,
  parseListingTable,
  readListingTable,
} from "../src/listing/parseListingTable";
import { makeListingXlsx } from "./utils/makeListingXlsx";

const CSV = `Item ID,Unique Identifier,Brand Name,Rating,Rating Count,Variations Count,Page Content,Monthly Revenue History,Promotion History
101,U-101,Acme,4.4,"2,310",3,"{""title"":""Mug, 350ml""}","[{""date"":""2024-01-01"",""avg_monthly_revenue"":1500}]","[{""date"":""2024-01-01"",""value"":349}]"
,U-000,Ghost,5,1,1,,,
102,,Beta,n/a,,,"{}",,
`;

describe("parseCsv", () => {
  it("handles quotes, doubled quotes, embedded commas and CRLF", () => {
    expect(parseCsv('a,"b,c","say ""hi"""\r\n1,2,3\r\n')).toEqual([
      ["a", "b,c", 'say "hi"'],
      ["1", "2", "3"],
    ]);
  });

  it("keeps newlines inside quoted fields", () => {
    expect(parseCsv('x,y\n"line1\nline2",2\n')).toEqual([
      ["x", "y"],
      ["line1\nline2", "2"],
    ]);
  });
});

describe("parseListingTable", () => {
  it("maps aliased headers and coerces numeric columns", () => {
    const { records, skippedRows } = parseListingTable(CSV);

    expect(skippedRows).toBe(1);
    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      item_id: "101",
      unique_identifier: "U-101",
      brand_name: "Acme",
      rating: 4.4,
      rating_count: 2310,
      variations_count: 3,
      page_content: '{"title":"Mug, 350ml"}',
      monthly_revenue_history: '[{"date":"2024-01-01","avg_monthly_revenue":1500}]',
      promotion_history: '[{"date":"2024-01-01","value":349}]',
    });
    expect(records[1]).toMatchObject({
      item_id: "102",
      unique_identifier: null,
      rating: null,
      rating_count: null,
      monthly_revenue_history: "",
    });
  });

  it("throws when the item id column is missing", () => {
    expect(() => parseListingTable("brand_name,rating\nAcme,4\n")).toThrow(
      /missing the item_id column/
    );
  });

  it("resolves snake_case, spaced and BOM-prefixed headers", () => {
    const map = mapHeaders(["\uFEFFitem_id", "brand", "promotion history"]);
    expect(map.item_id).toBe(0);
    expect(map.brand_name).toBe(1);
    expect(map.promotion_history).toBe(2);
    expect(map.page_content).toBeUndefined();
  });
});

describe("readListingTable", () => {
  it("reads the first sheet of a workbook", () => {
    const filePath = path.resolve(__dirname, "tmp", `listing-${Date.now()}.xlsx`);
    makeListingXlsx(filePath, [
      [
        "555",
        "U-555",
        "Gamma",
        3.8,
        900,
        2,
        '{"title":"Pan"}',
        '[{"date":"2024-05-01","avg_monthly_revenue":42}]',
        null,
      ],
    ]);

    const { records } = readListingTable(filePath);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      item_id: "555",
      brand_name: "Gamma",
      rating: 3.8,
      rating_count: 900,
      variations_count: 2,
      page_content: '{"title":"Pan"}',
      promotion_history: null,
    });
  });

  it("rejects unknown file types", () => {
    expect(() => readListingTable(__filename)).toThrow(/Unsupported listing file type ".ts"/);
  });
});
