import { describe, expect, it } from "vitest";

import { getChartVizConfig } from "../chart_config";
import { createPipelineLogger } from "../logger";

describe("getChartVizConfig", () => {
  it("falls back to defaults", () => {
    expect(getChartVizConfig({})).toEqual({
      default_width: 1000,
      default_height: 1000,
      max_insights: 6,
      default_language: "en",
      font_family: "Arial, Helvetica, sans-serif",
      log_level: "info",
      enable_data_query: false,
      theme: "light",
    });
  });

  it("reads overrides and ignores unusable values", () => {
    const config = getChartVizConfig({
      CHART_VIZ_DEFAULT_WIDTH: "640.7",
      CHART_VIZ_MAX_INSIGHTS: "many",
      CHART_VIZ_LANGUAGE: "ZH",
      CHART_VIZ_THEME: "neon",
      CHART_VIZ_ENABLE_DATA_QUERY: "true",
    });
    expect(config).toMatchObject({
      default_width: 640,
      max_insights: 6,
      default_language: "zh",
      theme: "light",
      enable_data_query: true,
    });
  });
});

describe("createPipelineLogger", () => {
  it("drops entries below the threshold", () => {
    const logger = createPipelineLogger({ level: "warn", silent: true });
    logger.info("skipped");
    logger.warn("kept");
    expect(logger.entries.map((entry) => [entry.level, entry.message])).toEqual([["warn", "kept"]]);
  });
});
