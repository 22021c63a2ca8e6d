import type { RenderSessionFactory } from "../render/render_session";
import type { ChartVizConfig } from "./chart_config";
import type { ChartRequest, ChartResult, LlmConfig } from "./contracts";
import { normalizeDataset } from "./dataset";
import { ChartPipelineError, describeFailure, toChartFailure } from "./errors";
import { generateChart } from "./generate_chart";
import type { PipelineLogger } from "./logger";
import { validateChartRequest } from "./schemas";
import { OpenAiChartSpecGenerator, type ChartSpecGenerator } from "./spec_generator";
import { updateChartWithInsights } from "./update_chart";

export type ChartRequestDeps = {
  config: ChartVizConfig;
  logger: PipelineLogger;
  createGenerator?: (llm: LlmConfig) => ChartSpecGenerator;
  sessionFactory?: RenderSessionFactory;
};

/** Validates one raw request and fills in its defaults. */
export function parseChartRequest(raw: unknown, config: ChartVizConfig): ChartRequest {
  const validation = validateChartRequest(raw);
  if (!validation.ok || !raw || typeof raw !== "object") {
    throw new ChartPipelineError({
      code: "REQUEST_INVALID",
      stage_name: "request",
      reason: "Chart request failed validation.",
      details: validation.errors,
    });
  }
  const record = Object.fromEntries(Object.entries(raw));
  const llm =
    record.llm_config && typeof record.llm_config === "object" ? Object.fromEntries(Object.entries(record.llm_config)) : null;

  return {
    llm_config:
      llm && typeof llm.base_url === "string" && typeof llm.model === "string" && typeof llm.api_key === "string"
        ? { base_url: llm.base_url.replace(/\/+$/, ""), model: llm.model, api_key: llm.api_key }
        : undefined,
    width: typeof record.width === "number" ? record.width : undefined,
    height: typeof record.height === "number" ? record.height : undefined,
    dataset: normalizeDataset(record.dataset ?? []),
    directory: String(record.directory),
    user_prompt: typeof record.user_prompt === "string" ? record.user_prompt : undefined,
    output_type: record.output_type === "html" ? "html" : "png",
    file_name: String(record.file_name),
    task_type: typeof record.task_type === "string" ? record.task_type : "visualization",
    insights_id: Array.isArray(record.insights_id)
      ? record.insights_id.filter((id): id is number => typeof id === "number")
      : [],
    language: record.language === "zh" ? "zh" : record.language === "en" ? "en" : config.default_language,
  };
}

/**
 * Routes one request: `visualization` generates a chart, `insight` with ordinals
 * annotates a stored one, anything else answers `{}`.
 */
export async function runChartRequest(raw: unknown, deps: ChartRequestDeps): Promise<ChartResult> {
  const { config, logger } = deps;
  let request: ChartRequest;
  try {
    request = parseChartRequest(raw, config);
  } catch (error) {
    const failure = toChartFailure(error, "request");
    logger.error(`rejected request: ${describeFailure(failure)}`);
    return { error: describeFailure(failure), error_code: failure.code };
  }

  if (request.task_type === "visualization") {
    if (!request.llm_config) {
      return { error: "llm_config is required to generate a chart.", error_code: "REQUEST_INVALID" };
    }
    const createGenerator = deps.createGenerator ?? ((llm: LlmConfig) => new OpenAiChartSpecGenerator(llm));
    logger.info(`generating ${request.output_type} chart ${request.file_name}`);
    return generateChart({
      generator: createGenerator(request.llm_config),
      dataset: request.dataset,
      userPrompt: request.user_prompt ?? "",
      directory: request.directory,
      fileName: request.file_name,
      outputType: request.output_type,
      language: request.language,
      width: request.width,
      height: request.height,
      defaultWidth: config.default_width,
      defaultHeight: config.default_height,
      maxInsights: config.max_insights,
      enableDataQuery: config.enable_data_query,
      theme: config.theme,
      sessionFactory: deps.sessionFactory,
      fontFamily: config.font_family,
      logger,
    });
  }

  if (request.task_type === "insight" && request.insights_id.length > 0) {
    logger.info(`updating chart ${request.file_name} with insights ${request.insights_id.join(",")}`);
    return updateChartWithInsights({
      directory: request.directory,
      fileName: request.file_name,
      outputType: request.output_type,
      insightsId: request.insights_id,
      width: request.width,
      height: request.height,
      defaultWidth: config.default_width,
      defaultHeight: config.default_height,
      sessionFactory: deps.sessionFactory,
      fontFamily: config.font_family,
      logger,
    });
  }

  logger.info(`nothing to do for task_type=${request.task_type}`);
  return {};
}
