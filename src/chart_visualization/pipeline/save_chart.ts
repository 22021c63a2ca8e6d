import { renderChart } from "../render/render_chart";
import type { RenderSessionFactory } from "../render/render_session";
import { resolveArtifactPath, writeRenderedArtifact, writeSpecArtifact } from "./artifact_store";
import type { ChartSpec, OutputType } from "./contracts";
import type { PipelineLogger } from "./logger";

export type SaveChartParams = {
  spec: ChartSpec;
  directory: string;
  fileName: string;
  outputType: OutputType;
  width?: number;
  height?: number;
  defaultWidth?: number;
  defaultHeight?: number;
  isUpdate?: boolean;
  sessionFactory?: RenderSessionFactory;
  fontFamily?: string;
  logger?: PipelineLogger;
};

export type SavedChart = { spec_path: string; chart_path: string };

/**
 * Persists the spec JSON, then renders and persists the chart. The spec is written
 * first, so a failed render leaves it on disk without a chart beside it.
 */
export async function saveChartResult(params: SaveChartParams): Promise<SavedChart> {
  const isUpdate = params.isUpdate ?? false;
  const specPath = resolveArtifactPath(params.directory, params.fileName, "json", isUpdate);
  writeSpecArtifact(specPath, params.spec);

  const chartPath = resolveArtifactPath(params.directory, params.fileName, params.outputType, isUpdate);
  const rendered = await renderChart(params.spec, {
    outputType: params.outputType,
    width: params.width,
    height: params.height,
    defaultWidth: params.defaultWidth,
    defaultHeight: params.defaultHeight,
    sessionFactory: params.sessionFactory,
    fontFamily: params.fontFamily,
    logger: params.logger,
  });
  writeRenderedArtifact(chartPath, rendered);
  params.logger?.info(`saved chart ${chartPath}`);
  return { spec_path: specPath, chart_path: chartPath };
}
