import { afterEach, describe, expect, it, vi } from "vitest";

import type { ChartSpec, DataRow } from "../../pipeline/contracts";
import { createPipelineLogger } from "../../pipeline/logger";
import { INSIGHT_ANALYZERS } from "../algorithms";
import { extractInsights, toInsightRecords } from "../extract_insights";

function monthlyRevenue(): DataRow[] {
  return Array.from({ length: 12 }, (_, index) => ({
    month: `2024-${String(index + 1).padStart(2, "0")}`,
    revenue: 100 + 10 * index,
  }));
}

function chart(type: ChartSpec["type"], values: DataRow[], xField: string, yField: string): ChartSpec {
  return { type, data: { id: "data", values }, xField, yField, theme: "light" };
}

const silent = () => createPipelineLogger({ silent: true });

describe("extractInsights", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("describes a steadily rising line", () => {
    const insights = extractInsights(chart("line", monthlyRevenue(), "month", "revenue"), { logger: silent() });
    expect(insights.map((insight) => insight.content)).toEqual([
      "The overall trend of revenue is increasing, from 100 at 2024-01 to 210 at 2024-12.",
      "The maximum revenue is 210 at 2024-12.",
      "The minimum revenue is 100 at 2024-01.",
    ]);
    expect(insights[1].target).toEqual({ kind: "point", x: "2024-12", y: 210, series: undefined, measure: "revenue" });
  });

  it("caps the number of findings", () => {
    const insights = extractInsights(chart("line", monthlyRevenue(), "month", "revenue"), {
      maxNum: 2,
      logger: silent(),
    });
    expect(insights.map((insight) => insight.type)).toEqual(["overallTrend", "extremeValue"]);
  });

  it("phrases findings in Chinese", () => {
    const [first] = extractInsights(chart("line", monthlyRevenue(), "month", "revenue"), {
      language: "zh",
      algorithms: ["overallTrend"],
      logger: silent(),
    });
    expect(first.content).toBe("revenue整体呈上升趋势，从2024-01的100变化到2024-12的210。");
  });

  it("yields nothing for charts without a cartesian data model", () => {
    const pie = chart("pie", [{ slice: "A", share: 1 }], "slice", "share");
    expect(extractInsights(pie, { logger: silent() })).toEqual([]);
    expect(extractInsights(chart("line", monthlyRevenue(), "month", "revenue"), { maxNum: 0 })).toEqual([]);
  });

  it("flags a value far from the mean", () => {
    const values = [10, 12, 11, 13, 12, 60].map((sales, index) => ({ store: "ABCDEF"[index], sales }));
    const [insight] = extractInsights(chart("bar", values, "store", "sales"), {
      algorithms: ["statisticsBase"],
      logger: silent(),
    });
    expect(insight.content).toBe("sales at F (60) deviates 2.23 standard deviations from the mean of 19.67.");
    expect(insight.target).toEqual({ kind: "point", x: "F", y: 60, series: undefined, measure: "sales" });
  });

  it("reports a category holding most of the total", () => {
    const values = [
      { store: "A", sales: 5 },
      { store: "B", sales: 30 },
      { store: "C", sales: 5 },
    ];
    const insights = extractInsights(chart("bar", values, "store", "sales"), {
      algorithms: ["majorityValue"],
      logger: silent(),
    });
    expect(insights.map((insight) => insight.content)).toEqual(["B accounts for the majority of sales (75%)."]);
  });

  it("correlates the two measures of a dual-axis chart", () => {
    const values = Array.from({ length: 6 }, (_, index) => ({
      month: `2024-0${index + 1}`,
      revenue: 100 + 10 * index,
      cost: 50 + 5 * index,
    }));
    const spec: ChartSpec = { ...chart("dual_axis", values, "month", "revenue"), y2Field: "cost" };
    const insights = extractInsights(spec, { algorithms: ["pearsonCorrelation"], logger: silent() });
    expect(insights.map((insight) => insight.content)).toEqual([
      "revenue and cost show a strong positive linear correlation (r = 1).",
    ]);
  });

  it("logs and skips an analyzer that throws", () => {
    vi.spyOn(INSIGHT_ANALYZERS, "overallTrend").mockImplementation(() => {
      throw new Error("boom");
    });
    const logger = silent();
    const insights = extractInsights(chart("line", monthlyRevenue(), "month", "revenue"), { logger });

    expect(insights.map((insight) => insight.type)).toEqual(["extremeValue", "extremeValue"]);
    expect(logger.entries.filter((entry) => entry.level === "warn").map((entry) => entry.message)).toEqual([
      "insight analyzer overallTrend failed: boom",
    ]);
  });

  it("records the extraction timing when the data cannot be read", () => {
    const logger = createPipelineLogger({ level: "debug", silent: true });
    const unreadable: ChartSpec = {
      type: "line",
      data: {
        id: "data",
        get values(): DataRow[] {
          throw new Error("rows unavailable");
        },
      },
      xField: "month",
      yField: "revenue",
      theme: "light",
    };

    expect(() => extractInsights(unreadable, { logger })).toThrow("rows unavailable");
    expect(logger.entries.map((entry) => entry.message)).toEqual([expect.stringMatching(/^extract_insights took \d+ms$/)]);
  });

  it("numbers records from one", () => {
    const records = toInsightRecords([
      { type: "volatility", content: "a", evidence: {} },
      { type: "volatility", content: "b", evidence: {} },
    ]);
    expect(records.map((record) => record.id)).toEqual([1, 2]);
  });
});
