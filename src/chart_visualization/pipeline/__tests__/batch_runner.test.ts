import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createPipelineLogger } from "../logger";
import { readCsvRows, resolvePlanPath, runInsightPlan, runVisualizationPlan, successOutputTemplate } from "../batch_runner";
import type { ChartSpecGenerator } from "../spec_generator";

const lineChart: ChartSpecGenerator = {
  propose: async () => '{"chart_type":"line","x_field":"month","y_field":"revenue"}',
};

const logger = createPipelineLogger({ silent: true });

function revenueCsv(): string {
  const lines = ["month,revenue"];
  for (let i = 0; i < 12; i += 1) {
    lines.push(`2024-${String(i + 1).padStart(2, "0")},${100 + 10 * i}`);
  }
  return `${lines.join("\n")}\n`;
}

describe("batch runner", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "chart-batch-"));
    fs.writeFileSync(path.join(root, "sales.csv"), revenueCsv());
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function writePlan(name: string, plan: unknown): string {
    const file = path.join(root, name);
    fs.writeFileSync(file, JSON.stringify(plan));
    return file;
  }

  it("reads csv cells as numbers where they parse", () => {
    const rows = readCsvRows(path.join(root, "sales.csv"));
    expect(rows).toHaveLength(12);
    expect(rows[0]).toEqual({ month: "2024-01", revenue: 100 });
  });

  it("resolves plan entries against a base directory", () => {
    expect(resolvePlanPath("sales.csv", root)).toBe(path.join(root, "sales.csv"));
    expect(() => resolvePlanPath("missing.csv", root)).toThrow("No such file or directory: missing.csv");
  });

  it("summarizes every generated chart", async () => {
    const result = await runVisualizationPlan({
      planPath: writePlan("plan.json", [{ csvFilePath: "sales.csv", chartTitle: "Monthly revenue" }]),
      directory: root,
      outputType: "html",
      generator: lineChart,
      language: "en",
      logger,
    });

    const chartPath = path.join(root, "visualization", "sales.html");
    expect(result).toEqual({
      success: true,
      observation: [
        "Chart Generated Successful!",
        "## Monthly revenue",
        `Chart saved in: ${chartPath}`,
        "## Monthly revenue Insights",
        "1. The overall trend of revenue is increasing, from 100 at 2024-01 to 210 at 2024-12.",
        "2. The maximum revenue is 210 at 2024-12.",
        "3. The minimum revenue is 100 at 2024-01.",
      ].join("\n"),
    });
    expect(fs.existsSync(chartPath)).toBe(true);
  });

  it("lists entries that failed", async () => {
    const result = await runVisualizationPlan({
      planPath: writePlan("plan.json", [{ csvFilePath: "missing.csv", chartTitle: "Ghost" }]),
      directory: root,
      outputType: "html",
      generator: lineChart,
      language: "en",
      logger,
    });
    expect(result).toEqual({
      success: false,
      observation: "# Error chart generated\nError in missing.csv: No such file or directory: missing.csv\nIs EMPTY!",
    });
  });

  it("rejects a plan with the wrong shape", async () => {
    await expect(
      runVisualizationPlan({
        planPath: writePlan("plan.json", [{ csv: "sales.csv" }]),
        directory: root,
        outputType: "html",
        generator: lineChart,
        language: "en",
        logger,
      })
    ).rejects.toMatchObject({ code: "REQUEST_INVALID", stage_name: "plan" });
  });

  it("annotates stored charts named by an insight plan", async () => {
    await runVisualizationPlan({
      planPath: writePlan("plan.json", [{ csvFilePath: "sales.csv", chartTitle: "Monthly revenue" }]),
      directory: root,
      outputType: "html",
      generator: lineChart,
      language: "en",
      logger,
    });

    const result = await runInsightPlan({
      planPath: writePlan("insights.json", [{ chartPath: "sales.html", insights_id: [2] }, { chartPath: "skip.html" }]),
      directory: root,
      outputType: "html",
      logger,
    });

    const chartPath = path.join(root, "visualization", "sales.html");
    expect(result).toEqual({ success: true, observation: `# Charts Update with Insights\n${chartPath}` });
    expect(fs.readFileSync(chartPath, "utf8")).toContain(">2. The maximum revenue is 210 at 2024-12.</text>");
  });

  it("reports an empty run", () => {
    expect(successOutputTemplate([])).toBe("Is EMPTY!");
  });
});
