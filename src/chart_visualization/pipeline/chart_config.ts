import { z } from "zod";

import type { Language } from "./contracts";
import type { PipelineLogLevel } from "./logger";

export type ChartVizConfig = {
  default_width: number;
  default_height: number;
  max_insights: number;
  default_language: Language;
  font_family: string;
  log_level: PipelineLogLevel;
  enable_data_query: boolean;
  theme: "light" | "dark";
};

const LanguageSchema = z.enum(["en", "zh"]);
const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
const ThemeSchema = z.enum(["light", "dark"]);

function readNumber(value: string | undefined, fallback: number) {
  if (value === undefined) return fallback;
  const num = Number(value);
  return Number.isFinite(num) ? num : fallback;
}

function readEnum<T extends string>(schema: z.ZodType<T>, value: string | undefined, fallback: T): T {
  const parsed = schema.safeParse(value?.toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function getChartVizConfig(env: NodeJS.ProcessEnv = process.env): ChartVizConfig {
  return {
    default_width: Math.max(1, Math.trunc(readNumber(env.CHART_VIZ_DEFAULT_WIDTH, 1000))),
    default_height: Math.max(1, Math.trunc(readNumber(env.CHART_VIZ_DEFAULT_HEIGHT, 1000))),
    max_insights: Math.max(0, Math.trunc(readNumber(env.CHART_VIZ_MAX_INSIGHTS, 6))),
    default_language: readEnum(LanguageSchema, env.CHART_VIZ_LANGUAGE, "en"),
    font_family: env.CHART_VIZ_FONT_FAMILY?.trim() || "Arial, Helvetica, sans-serif",
    log_level: readEnum(LogLevelSchema, env.CHART_VIZ_LOG_LEVEL, "info"),
    enable_data_query: env.CHART_VIZ_ENABLE_DATA_QUERY === "true",
    theme: readEnum(ThemeSchema, env.CHART_VIZ_THEME, "light"),
  };
}
