import fs from "node:fs";
import path from "node:path";

import { parse as parseCsv } from "csv-parse/sync";
import { z } from "zod";

import type { RenderSessionFactory } from "../render/render_session";
import { visualizationDir } from "./artifact_store";
import type { ChartResult, ChartTheme, DataRow, Language, OutputType } from "./contracts";
import { normalizeDataset } from "./dataset";
import { ChartPipelineError } from "./errors";
import { generateChart } from "./generate_chart";
import { getDefaultLogger, type PipelineLogger } from "./logger";
import type { ChartSpecGenerator } from "./spec_generator";
import { updateChartWithInsights } from "./update_chart";

const VisualizationPlanSchema = z.array(
  z.object({
    csvFilePath: z.string().min(1),
    chartTitle: z.string().min(1),
  })
);

const InsightPlanSchema = z.array(
  z.object({
    chartPath: z.string().min(1),
    insights_id: z.array(z.number().int().positive()).optional(),
  })
);

export type BatchObservation = { observation: string; success: boolean };

type BatchCommon = {
  planPath: string;
  directory: string;
  outputType: OutputType;
  defaultWidth?: number;
  defaultHeight?: number;
  sessionFactory?: RenderSessionFactory;
  fontFamily?: string;
  logger?: PipelineLogger;
};

export type VisualizationPlanParams = BatchCommon & {
  generator: ChartSpecGenerator;
  language: Language;
  maxInsights?: number;
  enableDataQuery?: boolean;
  theme?: ChartTheme;
};

export type InsightPlanParams = BatchCommon;

function readPlan<T>(planPath: string, schema: z.ZodType<T>): T {
  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(planPath, "utf8"));
  } catch (error) {
    throw new ChartPipelineError({
      code: "REQUEST_INVALID",
      stage_name: "plan",
      reason: `Could not read plan ${planPath}`,
      cause: error,
    });
  }
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ChartPipelineError({
      code: "REQUEST_INVALID",
      stage_name: "plan",
      reason: `Plan ${planPath} has an unexpected shape`,
      details: parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"} ${issue.message}`),
    });
  }
  return parsed.data;
}

/** An existing path is used as is; otherwise it is looked up under `baseDir`. */
export function resolvePlanPath(entry: string, baseDir: string): string {
  if (fs.existsSync(entry)) return path.resolve(entry);
  const joined = path.resolve(baseDir, entry);
  if (fs.existsSync(joined)) return joined;
  throw new ChartPipelineError({
    code: "REQUEST_INVALID",
    stage_name: "plan",
    reason: `No such file or directory: ${entry}`,
  });
}

export function readCsvRows(filePath: string): readonly DataRow[] {
  const records: unknown = parseCsv(fs.readFileSync(filePath, "utf8"), {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    cast: true,
  });
  return normalizeDataset(records);
}

export function successOutputTemplate(results: Array<ChartResult & { title: string }>): string {
  if (results.length === 0) return "Is EMPTY!";
  const content = results
    .map((item) => {
      const head = `## ${item.title}\nChart saved in: ${item.chart_path ?? ""}`;
      return item.insight_path && item.insight_md ? `${head}\n${item.insight_md}` : `${head}\n`;
    })
    .join("");
  return `Chart Generated Successful!\n${content}`;
}

/** Generates one chart per plan entry, in order, and summarizes them as markdown. */
export async function runVisualizationPlan(params: VisualizationPlanParams): Promise<BatchObservation> {
  const logger = params.logger ?? getDefaultLogger();
  const plan = readPlan(params.planPath, VisualizationPlanSchema);
  const planDir = path.dirname(path.resolve(params.planPath));
  const errors: string[] = [];
  const successes: Array<ChartResult & { title: string }> = [];

  for (const item of plan) {
    let csvPath = item.csvFilePath;
    let result: ChartResult;
    try {
      csvPath = resolvePlanPath(item.csvFilePath, planDir);
      result = await generateChart({
        generator: params.generator,
        dataset: readCsvRows(csvPath),
        userPrompt: item.chartTitle,
        directory: params.directory,
        fileName: path.basename(csvPath).replace(/\.csv$/i, ""),
        outputType: params.outputType,
        defaultWidth: params.defaultWidth,
        defaultHeight: params.defaultHeight,
        language: params.language,
        maxInsights: params.maxInsights,
        enableDataQuery: params.enableDataQuery,
        theme: params.theme,
        sessionFactory: params.sessionFactory,
        fontFamily: params.fontFamily,
        logger,
      });
    } catch (error) {
      result = { error: error instanceof Error ? error.message : String(error) };
    }

    if (result.error && !result.chart_path) {
      errors.push(`Error in ${csvPath}: ${result.error}`);
    } else {
      successes.push({ ...result, title: item.chartTitle });
    }
  }

  if (errors.length > 0) {
    return {
      observation: `# Error chart generated\n${errors.join("\n")}\n${successOutputTemplate(successes)}`,
      success: false,
    };
  }
  return { observation: successOutputTemplate(successes), success: true };
}

/** Annotates the stored charts a plan names with the insight ordinals it lists. */
export async function runInsightPlan(params: InsightPlanParams): Promise<BatchObservation> {
  const logger = params.logger ?? getDefaultLogger();
  const plan = readPlan(params.planPath, InsightPlanSchema);
  const chartsDir = visualizationDir(params.directory);
  const errors: string[] = [];
  const updated: string[] = [];

  for (const item of plan) {
    if (!item.insights_id || item.insights_id.length === 0) continue;
    let chartPath = item.chartPath;
    let result: ChartResult;
    try {
      chartPath = resolvePlanPath(item.chartPath, chartsDir);
      result = await updateChartWithInsights({
        directory: params.directory,
        fileName: path.basename(chartPath).replace(new RegExp(`\\.${params.outputType}$`), ""),
        outputType: params.outputType,
        defaultWidth: params.defaultWidth,
        defaultHeight: params.defaultHeight,
        insightsId: item.insights_id,
        sessionFactory: params.sessionFactory,
        fontFamily: params.fontFamily,
        logger,
      });
    } catch (error) {
      result = { error: error instanceof Error ? error.message : String(error) };
    }

    if (result.error && !result.chart_path) {
      errors.push(`Error in ${chartPath}: ${result.error}`);
    } else {
      updated.push(chartPath);
    }
  }

  const summary = updated.length > 0 ? `# Charts Update with Insights\n${updated.join(",")}` : "";
  if (errors.length > 0) {
    return { observation: `# Error in chart insights:\n${errors.join("\n")}\n${summary}`, success: false };
  }
  return { observation: summary, success: true };
}
