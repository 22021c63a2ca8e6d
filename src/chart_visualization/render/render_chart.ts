import { getChartVizConfig } from "../pipeline/chart_config";
import type { ChartSpec, OutputType } from "../pipeline/contracts";
import { ChartPipelineError } from "../pipeline/errors";
import { getDefaultLogger, type PipelineLogger } from "../pipeline/logger";
import { buildHtmlDocument } from "./html_document";
import { createResvgSession, withRenderSession, type RenderSessionFactory } from "./render_session";
import { drawChartSvg } from "./svg_chart";

export type RenderOptions = {
  outputType: OutputType;
  width?: number;
  height?: number;
  /** Frame used when width or height is not given; falls back to the env config. */
  defaultWidth?: number;
  defaultHeight?: number;
  sessionFactory?: RenderSessionFactory;
  fontFamily?: string;
  logger?: PipelineLogger;
};

export type RenderedChart = { kind: "png"; buffer: Buffer } | { kind: "html"; html: string };

function renderFailure(error: unknown): ChartPipelineError {
  if (error instanceof ChartPipelineError) return error;
  return new ChartPipelineError({
    code: "RENDER_FAILED",
    stage_name: "render",
    reason: `Chart rendering failed: ${error instanceof Error ? error.message : String(error)}`,
    cause: error,
  });
}

export async function renderChart(spec: ChartSpec, options: RenderOptions): Promise<RenderedChart> {
  const logger = options.logger ?? getDefaultLogger();
  const config = getChartVizConfig();
  const fontFamily = options.fontFamily ?? config.font_family;
  const width = options.width ?? options.defaultWidth ?? config.default_width;
  const height = options.height ?? options.defaultHeight ?? config.default_height;
  const stop = logger.startTimer(`render_${options.outputType}`);

  try {
    if (options.outputType === "html") {
      const chart = drawChartSvg(spec, { width, height, fontFamily });
      return { kind: "html", html: buildHtmlDocument(spec, chart, options) };
    }

    // still images never animate
    const frame: ChartSpec = { ...spec, animation: false, width, height };
    const chart = drawChartSvg(frame, { width, height, fontFamily });
    const buffer = await withRenderSession(options.sessionFactory ?? createResvgSession, { fontFamily }, (session) => {
      session.mount({ svg: chart.svg, width: chart.width, height: chart.height, background: chart.background });
      session.draw();
      return session.capture();
    });
    return { kind: "png", buffer };
  } catch (error) {
    throw renderFailure(error);
  } finally {
    stop();
  }
}
