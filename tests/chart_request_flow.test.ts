import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ensureVisualizationDir, writeSpecArtifact } from "@/src/chart_visualization/pipeline/artifact_store";
import { getChartVizConfig } from "@/src/chart_visualization/pipeline/chart_config";
import type { ChartSpec, InsightRecord, LlmConfig } from "@/src/chart_visualization/pipeline/contracts";
import { createPipelineLogger } from "@/src/chart_visualization/pipeline/logger";
import { parseChartRequest, runChartRequest } from "@/src/chart_visualization/pipeline/process_boundary";
import { deserializeSpec } from "@/src/chart_visualization/pipeline/spec_serializer";
import type { ChartSpecGenerator } from "@/src/chart_visualization/pipeline/spec_generator";
import type { HostDocument, RenderSessionFactory } from "@/src/chart_visualization/render/render_session";

const config = getChartVizConfig({});
const llm_config: LlmConfig = { base_url: "http://localhost:9/v1/", model: "test-model", api_key: "test-secret" };

const monthlyRevenue = Array.from({ length: 12 }, (_, index) => ({
  month: `2024-${String(index + 1).padStart(2, "0")}`,
  revenue: 100 + 10 * index,
}));

function scripted(answer: string) {
  const seen: LlmConfig[] = [];
  const createGenerator = (llm: LlmConfig): ChartSpecGenerator => {
    seen.push(llm);
    return { propose: async () => answer };
  };
  return { seen, createGenerator };
}

const fakePng: RenderSessionFactory = () => ({
  mount: () => undefined,
  draw: () => undefined,
  capture: () => Buffer.from("fake-png"),
  close: () => undefined,
});

function storeChart(root: string): string {
  const insights: InsightRecord[] = [1, 2, 3, 4, 5].map((id) => ({
    id,
    type: "extremeValue",
    content: `Finding ${id}.`,
    target: { kind: "point", x: `2024-0${id}`, y: 100 + 10 * (id - 1), measure: "revenue" },
  }));
  const stored: ChartSpec = {
    type: "line",
    data: { id: "data", values: monthlyRevenue.slice(0, 6) },
    xField: "month",
    yField: "revenue",
    theme: "light",
    title: { text: "Monthly revenue" },
    insights,
  };
  ensureVisualizationDir(root);
  const specPath = path.join(root, "visualization", "stored.json");
  writeSpecArtifact(specPath, stored);
  return specPath;
}

const brokenPng: RenderSessionFactory = () => ({
  mount: () => undefined,
  draw: () => {
    throw new Error("boom");
  },
  capture: () => Buffer.from(""),
  close: () => undefined,
});

describe("chart request flow", () => {
  let root: string;
  const logger = createPipelineLogger({ silent: true });

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "chart-flow-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("generates a chart with its spec and insight summary", async () => {
    const { seen, createGenerator } = scripted('{"chart_type":"line","x_field":"month","y_field":"revenue"}');
    const request = {
      llm_config,
      dataset: monthlyRevenue,
      directory: root,
      user_prompt: "Monthly revenue",
      output_type: "html",
      file_name: "revenue",
      language: "en",
    };

    const result = await runChartRequest(request, { config, logger, createGenerator });

    const chartsDir = path.join(root, "visualization");
    expect(result).toEqual({
      chart_path: path.join(chartsDir, "revenue.html"),
      insight_path: path.join(chartsDir, "revenue.md"),
      insight_md: [
        "## Monthly revenue Insights",
        "1. The overall trend of revenue is increasing, from 100 at 2024-01 to 210 at 2024-12.",
        "2. The maximum revenue is 210 at 2024-12.",
        "3. The minimum revenue is 100 at 2024-01.",
      ].join("\n"),
    });
    expect(seen).toEqual([{ base_url: "http://localhost:9/v1", model: "test-model", api_key: "test-secret" }]);

    const stored = deserializeSpec(fs.readFileSync(path.join(chartsDir, "revenue.json"), "utf8"), logger);
    expect(stored.title).toEqual({ text: "Monthly revenue" });
    expect(stored.insights?.map((insight) => insight.id)).toEqual([1, 2, 3]);

    const again = await runChartRequest(request, { config, logger, createGenerator });
    expect(again.chart_path).toBe(path.join(chartsDir, "revenue_new.html"));
    expect(fs.existsSync(path.join(chartsDir, "revenue_new.json"))).toBe(true);
    expect(fs.existsSync(path.join(chartsDir, "revenue_new.md"))).toBe(true);
  });

  it("annotates a stored chart with the chosen insights", async () => {
    const specPath = storeChart(root);

    const result = await runChartRequest(
      { directory: root, file_name: "stored", task_type: "insight", insights_id: [1, 3], output_type: "png" },
      { config, logger, sessionFactory: fakePng }
    );

    const chartPath = path.join(root, "visualization", "stored.png");
    expect(result).toEqual({ chart_path: chartPath });
    expect(fs.readFileSync(chartPath, "utf8")).toBe("fake-png");
    const updated = deserializeSpec(fs.readFileSync(specPath, "utf8"), logger);
    expect(updated.annotations?.map((annotation) => [annotation.insight_id, annotation.text])).toEqual([
      [1, "Finding 1."],
      [3, "Finding 3."],
    ]);
    expect(updated.insights).toHaveLength(5);
  });

  it("skips ordinals that match no stored insight", async () => {
    const specPath = storeChart(root);
    const result = await runChartRequest(
      { directory: root, file_name: "stored", task_type: "insight", insights_id: [1, 0, -2], output_type: "png" },
      { config, logger, sessionFactory: fakePng }
    );

    expect(result).toEqual({ chart_path: path.join(root, "visualization", "stored.png") });
    const updated = deserializeSpec(fs.readFileSync(specPath, "utf8"), logger);
    expect(updated.annotations?.map((annotation) => annotation.insight_id)).toEqual([1]);
  });

  it("re-renders with no annotations when no ordinal matches", async () => {
    const specPath = storeChart(root);
    const result = await runChartRequest(
      { directory: root, file_name: "stored", task_type: "insight", insights_id: [7, 8], output_type: "png" },
      { config, logger, sessionFactory: fakePng }
    );

    const chartPath = path.join(root, "visualization", "stored.png");
    expect(result).toEqual({ chart_path: chartPath });
    expect(fs.readFileSync(chartPath, "utf8")).toBe("fake-png");
    expect(deserializeSpec(fs.readFileSync(specPath, "utf8"), logger).annotations).toEqual([]);
  });

  it("draws png charts at the configured default size", async () => {
    storeChart(root);
    const mounted: HostDocument[] = [];
    const recording: RenderSessionFactory = () => ({
      mount: (document) => {
        mounted.push(document);
      },
      draw: () => undefined,
      capture: () => Buffer.from("fake-png"),
      close: () => undefined,
    });
    const sized = getChartVizConfig({ CHART_VIZ_DEFAULT_WIDTH: "640", CHART_VIZ_DEFAULT_HEIGHT: "480" });

    await runChartRequest(
      { directory: root, file_name: "stored", task_type: "insight", insights_id: [1], output_type: "png" },
      { config: sized, logger, sessionFactory: recording }
    );

    expect(mounted.map((document) => [document.width, document.height])).toEqual([[640, 480]]);
  });

  it("answers tasks it does not route with an empty result", async () => {
    const result = await runChartRequest(
      { directory: root, file_name: "x", task_type: "report" },
      { config, logger }
    );
    expect(result).toEqual({});
  });

  it("reports a missing chart to update", async () => {
    const result = await runChartRequest(
      { directory: root, file_name: "ghost", task_type: "insight", insights_id: [1] },
      { config, logger }
    );
    expect(result).toEqual({
      error: `No stored chart spec at ${path.join(root, "visualization", "ghost.json")}`,
      error_code: "UPDATE_TARGET_MISSING",
    });
  });

  it("answers an insight task without ordinals with an empty result", async () => {
    const result = await runChartRequest(
      { directory: root, file_name: "stored", task_type: "insight", insights_id: [] },
      { config, logger }
    );
    expect(result).toEqual({});
  });

  it("stops before writing anything when generation fails", async () => {
    const { createGenerator } = scripted("{}");
    const result = await runChartRequest(
      { llm_config, dataset: monthlyRevenue, directory: root, file_name: "revenue" },
      { config, logger, createGenerator }
    );
    expect(result).toEqual({ error: "Model returned an empty chart specification.", error_code: "SPEC_EMPTY" });
    expect(fs.existsSync(path.join(root, "visualization"))).toBe(false);
  });

  it("keeps the spec but reports the failure when rendering breaks", async () => {
    const { createGenerator } = scripted('{"chart_type":"bar","x_field":"month","y_field":"revenue"}');
    const result = await runChartRequest(
      { llm_config, dataset: monthlyRevenue, directory: root, file_name: "revenue", output_type: "png" },
      { config, logger, createGenerator, sessionFactory: brokenPng }
    );
    expect(result).toEqual({ error: "Chart rendering failed: boom", error_code: "RENDER_FAILED" });
    expect(fs.existsSync(path.join(root, "visualization", "revenue.json"))).toBe(true);
    expect(fs.existsSync(path.join(root, "visualization", "revenue.png"))).toBe(false);
  });

  it("requires llm settings to generate", async () => {
    const result = await runChartRequest({ dataset: monthlyRevenue, directory: root, file_name: "x" }, { config, logger });
    expect(result).toEqual({ error: "llm_config is required to generate a chart.", error_code: "REQUEST_INVALID" });
  });

  it("rejects requests that fail validation", async () => {
    const result = await runChartRequest({ directory: root, file_name: "a/b" }, { config, logger });
    expect(result.error_code).toBe("REQUEST_INVALID");
    expect(result.error?.startsWith("Chart request failed validation.")).toBe(true);
  });
});

describe("parseChartRequest", () => {
  it("fills in defaults", () => {
    expect(parseChartRequest({ directory: "/tmp/charts", file_name: "c" }, config)).toEqual({
      llm_config: undefined,
      width: undefined,
      height: undefined,
      dataset: [],
      directory: "/tmp/charts",
      user_prompt: undefined,
      output_type: "png",
      file_name: "c",
      task_type: "visualization",
      insights_id: [],
      language: "en",
    });
  });

  it("normalizes a table dataset into rows", () => {
    const request = parseChartRequest(
      { directory: "/tmp/charts", file_name: "c", dataset: { columns: ["a", "b"], rows: [[1, "x"]] } },
      config
    );
    expect(request.dataset).toEqual([{ a: 1, b: "x" }]);
    expect(Object.isFrozen(request.dataset)).toBe(true);
    expect(Object.isFrozen(request.dataset[0])).toBe(true);
  });

  it("keeps task types it does not route", () => {
    expect(parseChartRequest({ directory: "/tmp/charts", file_name: "c", task_type: "report" }, config).task_type).toBe(
      "report"
    );
  });
});
