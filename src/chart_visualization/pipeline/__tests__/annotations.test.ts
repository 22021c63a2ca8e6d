import { describe, expect, it } from "vitest";

import { mergeInsightAnnotations, selectInsights, toAnnotation } from "../annotations";
import type { ChartSpec, InsightRecord } from "../contracts";

const insights: InsightRecord[] = [
  { id: 1, type: "extremeValue", content: "Peak at May.", target: { kind: "point", x: "May", y: 90 } },
  { id: 2, type: "volatility", content: "Sales swing widely." },
  { id: 3, type: "turningPoint", content: "Turns down at July.", target: { kind: "vertical", x: "Jul" } },
];

const spec: ChartSpec = {
  type: "line",
  data: { id: "data", values: [] },
  xField: "month",
  yField: "sales",
  theme: "light",
  insights,
  annotations: [{ kind: "note", insight_id: 2, text: "old" }],
};

describe("insight annotations", () => {
  it("selects insights by ordinal", () => {
    expect(selectInsights(insights, [3, 1, 9]).map((insight) => insight.id)).toEqual([1, 3]);
  });

  it("falls back to a note when an insight has no target", () => {
    expect(toAnnotation(insights[1])).toEqual({ kind: "note", insight_id: 2, text: "Sales swing widely." });
  });

  it("replaces earlier annotations and keeps the insight list", () => {
    const merged = mergeInsightAnnotations(spec, selectInsights(insights, [1, 3]));
    expect(merged.annotations).toEqual([
      { kind: "point", x: "May", y: 90, insight_id: 1, text: "Peak at May." },
      { kind: "vertical", x: "Jul", insight_id: 3, text: "Turns down at July." },
    ]);
    expect(merged.insights).toBe(insights);
    expect(spec.annotations).toHaveLength(1);
  });
});
