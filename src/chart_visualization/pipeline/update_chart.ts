import type { RenderSessionFactory } from "../render/render_session";
import { readSpecArtifact, resolveArtifactPath } from "./artifact_store";
import type { ChartResult, ChartSpec, OutputType } from "./contracts";
import { ChartPipelineError, describeFailure, toChartFailure } from "./errors";
import { getDefaultLogger, type PipelineLogger } from "./logger";
import { mergeInsightAnnotations, selectInsights } from "./annotations";
import { saveChartResult } from "./save_chart";

export type UpdateChartParams = {
  directory: string;
  fileName: string;
  outputType: OutputType;
  insightsId: readonly number[];
  width?: number;
  height?: number;
  defaultWidth?: number;
  defaultHeight?: number;
  sessionFactory?: RenderSessionFactory;
  fontFamily?: string;
  logger?: PipelineLogger;
};

function annotate(spec: ChartSpec, insightsId: readonly number[]): ChartSpec {
  try {
    return mergeInsightAnnotations(spec, selectInsights(spec.insights ?? [], insightsId));
  } catch (error) {
    throw new ChartPipelineError({
      code: "ANNOTATION_FAILED",
      stage_name: "annotate",
      reason: `Could not annotate chart: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }
}

/** Re-renders a stored chart with the chosen insights drawn on it, overwriting it in place. */
export async function updateChartWithInsights(params: UpdateChartParams): Promise<ChartResult> {
  const logger = params.logger ?? getDefaultLogger();
  try {
    const spec = readSpecArtifact(resolveArtifactPath(params.directory, params.fileName, "json", true), logger);
    const annotated = annotate(spec, params.insightsId);
    logger.info(`annotating ${annotated.annotations?.length ?? 0} of ${spec.insights?.length ?? 0} insights`);
    const saved = await saveChartResult({
      spec: annotated,
      directory: params.directory,
      fileName: params.fileName,
      outputType: params.outputType,
      width: params.width,
      height: params.height,
      defaultWidth: params.defaultWidth,
      defaultHeight: params.defaultHeight,
      isUpdate: true,
      sessionFactory: params.sessionFactory,
      fontFamily: params.fontFamily,
      logger,
    });
    return { chart_path: saved.chart_path };
  } catch (error) {
    const failure = toChartFailure(error, "update");
    logger.error(`chart update failed at ${failure.stage_failed}: ${failure.reason}`);
    return { error: describeFailure(failure), error_code: failure.code };
  }
}
