import { describe, expect, it } from "vitest";

import type { ChartSpec } from "../../pipeline/contracts";
import { applyFormatter, drawChartSvg, escapeXml, niceTicks } from "../svg_chart";

const options = { width: 600, height: 400, fontFamily: "Arial" };

function barChart(overrides: Partial<ChartSpec> = {}): ChartSpec {
  return {
    type: "bar",
    data: {
      id: "data",
      values: [
        { store: "A", sales: 5 },
        { store: "B", sales: 8 },
        { store: "C", sales: 2 },
      ],
    },
    xField: "store",
    yField: "sales",
    theme: "light",
    ...overrides,
  };
}

describe("svg chart helpers", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<a & "b">`)).toBe("&lt;a &amp; &quot;b&quot;&gt;");
  });

  it("picks round ticks covering the range", () => {
    expect(niceTicks(0, 210)).toEqual([0, 50, 100, 150, 200, 250]);
  });

  it("formats values with a fallback for numbers", () => {
    expect(applyFormatter(undefined, 3.14159)).toBe("3.14");
    expect(applyFormatter(undefined, null)).toBe("");
    expect(applyFormatter((value) => `<${String(value)}>`, 1)).toBe("<1>");
  });
});

describe("drawChartSvg", () => {
  it("draws one mark per bar with a default tooltip", () => {
    const chart = drawChartSvg(barChart({ title: { text: "Sales & Costs" } }), options);
    expect(chart.markCount).toBe(3);
    expect(chart.width).toBe(600);
    expect(chart.background).toBe("#ffffff");
    expect(chart.svg).toContain('data-tooltip="A · sales: 5"');
    expect(chart.svg).toContain(">Sales &amp; Costs</text>");
    expect(chart.svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 600 400"')).toBe(true);
  });

  it("draws a slice per category for pie charts", () => {
    expect(drawChartSvg(barChart({ type: "pie" }), options).markCount).toBe(3);
  });

  it("marks annotations and lists them as notes", () => {
    const chart = drawChartSvg(
      barChart({
        annotations: [
          { kind: "point", x: "B", y: 8, measure: "sales", insight_id: 2, text: "Peak at B." },
          { kind: "note", insight_id: 4, text: "Sales vary a lot." },
        ],
      }),
      options
    );
    expect(chart.svg).toContain('<circle class="annotation"');
    expect(chart.svg).toContain(">[2]</text>");
    expect(chart.svg).toContain(">2. Peak at B.</text>");
    expect(chart.svg).toContain(">4. Sales vary a lot.</text>");
  });
});
