import { describe, expect, it } from "vitest";

import { inferFields, inferFieldType, normalizeDataset, toNumber } from "../dataset";

describe("normalizeDataset", () => {
  it("accepts rows, tables and JSON text", () => {
    const expected = [
      { city: "Oslo", temp: 4 },
      { city: "Rome", temp: 18 },
    ];
    expect(normalizeDataset(expected)).toEqual(expected);
    expect(normalizeDataset({ columns: ["city", "temp"], rows: [["Oslo", 4], ["Rome", 18]] })).toEqual(expected);
    expect(normalizeDataset(JSON.stringify(expected))).toEqual(expected);
  });

  it("freezes the rows it returns", () => {
    const rows = normalizeDataset([{ a: 1 }]);
    expect(Object.isFrozen(rows)).toBe(true);
    expect(Object.isFrozen(rows[0])).toBe(true);
  });

  it("turns nested values into JSON text and non-finite numbers into null", () => {
    expect(normalizeDataset([{ tags: ["a"], ratio: Number.NaN }])).toEqual([{ tags: '["a"]', ratio: null }]);
  });

  it("rejects shapes it cannot read", () => {
    expect(() => normalizeDataset("not json")).toThrow("Dataset string is not valid JSON.");
    expect(() => normalizeDataset([1, 2])).toThrow("Dataset row 0 is not an object.");
    expect(() => normalizeDataset({ rows: [] })).toThrow("Dataset must be an array of rows");
  });
});

describe("field inference", () => {
  it("parses numbers with thousands separators", () => {
    expect(toNumber("1,250")).toBe(1250);
    expect(toNumber(" ")).toBeNull();
    expect(toNumber(true)).toBeNull();
  });

  it("classifies columns", () => {
    expect(inferFieldType([1, 2, null])).toBe("quantitative");
    expect(inferFieldType(["2024-01", "2024-02"])).toBe("temporal");
    expect(inferFieldType(["12", "3.5"])).toBe("quantitative");
    expect(inferFieldType(["North", "South"])).toBe("nominal");
    expect(inferFieldType([])).toBe("nominal");
  });

  it("lists fields in first-seen order", () => {
    expect(inferFields([{ a: "x" }, { a: "y", b: 2 }])).toEqual([
      { name: "a", type: "nominal" },
      { name: "b", type: "quantitative" },
    ]);
  });
});
