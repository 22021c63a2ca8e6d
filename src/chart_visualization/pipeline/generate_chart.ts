import { extractInsights, toInsightRecords } from "../insights/extract_insights";
import type { RenderSessionFactory } from "../render/render_session";
import {
  ensureVisualizationDir,
  resolveArtifactPath,
  writeInsightSummary,
  writeSpecArtifact,
} from "./artifact_store";
import type { ChartResult, ChartTheme, DataRow, Language, OutputType } from "./contracts";
import { describeFailure, toChartFailure } from "./errors";
import { getDefaultLogger, type PipelineLogger } from "./logger";
import { saveChartResult } from "./save_chart";
import { generateChartSpec, type ChartSpecGenerator } from "./spec_generator";

export type GenerateChartParams = {
  generator: ChartSpecGenerator;
  dataset: readonly DataRow[];
  userPrompt: string;
  directory: string;
  fileName: string;
  outputType: OutputType;
  language: Language;
  width?: number;
  height?: number;
  defaultWidth?: number;
  defaultHeight?: number;
  maxInsights?: number;
  enableDataQuery?: boolean;
  theme?: ChartTheme;
  sessionFactory?: RenderSessionFactory;
  fontFamily?: string;
  logger?: PipelineLogger;
};

export async function generateChart(params: GenerateChartParams): Promise<ChartResult> {
  const logger = params.logger ?? getDefaultLogger();
  const generated = await generateChartSpec(params.generator, {
    prompt: params.userPrompt,
    dataset: params.dataset,
    options: {
      language: params.language,
      enableDataQuery: params.enableDataQuery,
      theme: params.theme,
      logger,
    },
  });
  if (!generated.ok) {
    return { error: generated.error, error_code: generated.code };
  }

  const spec = generated.spec;
  spec.title = { text: params.userPrompt };

  const result: ChartResult = {};
  let stage = "persist";
  try {
    ensureVisualizationDir(params.directory);
    const saved = await saveChartResult({
      spec,
      directory: params.directory,
      fileName: params.fileName,
      outputType: params.outputType,
      width: params.width,
      height: params.height,
      defaultWidth: params.defaultWidth,
      defaultHeight: params.defaultHeight,
      sessionFactory: params.sessionFactory,
      fontFamily: params.fontFamily,
      logger,
    });
    result.chart_path = saved.chart_path;

    stage = "insights";
    const insights = extractInsights(spec, {
      maxNum: params.maxInsights,
      language: params.language,
      logger,
    });
    if (insights.length > 0) {
      spec.insights = toInsightRecords(insights);
      writeSpecArtifact(saved.spec_path, spec);
    }
    const summary = writeInsightSummary(
      resolveArtifactPath(params.directory, params.fileName, "md"),
      params.userPrompt,
      insights.map((insight) => insight.content)
    );
    logger.info(`extracted ${insights.length} insights for ${saved.chart_path}`);
    return { ...result, ...summary };
  } catch (error) {
    const failure = toChartFailure(error, stage);
    logger.error(`chart generation failed at ${failure.stage_failed}: ${failure.reason}`);
    return { ...result, error: describeFailure(failure), error_code: failure.code };
  }
}
