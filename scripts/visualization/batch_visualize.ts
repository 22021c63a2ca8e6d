import "dotenv/config";

import minimist from "minimist";

import {
  runInsightPlan,
  runVisualizationPlan,
  type BatchObservation,
} from "../../src/chart_visualization/pipeline/batch_runner";
import { getChartVizConfig } from "../../src/chart_visualization/pipeline/chart_config";
import type { Language } from "../../src/chart_visualization/pipeline/contracts";
import { createPipelineLogger } from "../../src/chart_visualization/pipeline/logger";
import { OpenAiChartSpecGenerator } from "../../src/chart_visualization/pipeline/spec_generator";

type Args = {
  plan: string;
  directory: string;
  outputType: "png" | "html";
  tool: "visualization" | "insight";
  language: Language;
};

function parseArgs(argv: string[], defaultLanguage: Language): Args {
  const parsed = minimist(argv, {
    string: ["plan", "directory", "output_type", "tool", "language"],
    alias: { output_type: "outputType" },
    default: { directory: process.cwd(), output_type: "html", tool: "visualization" },
  });
  const plan = typeof parsed.plan === "string" && parsed.plan ? parsed.plan : parsed._[0];
  if (typeof plan !== "string" || plan.length === 0) {
    throw new Error(
      "Usage: batch_visualize --plan <plan.json> [--directory dir] [--output_type png|html] [--tool visualization|insight] [--language en|zh]"
    );
  }
  return {
    plan,
    directory: String(parsed.directory),
    outputType: parsed.output_type === "png" ? "png" : "html",
    tool: parsed.tool === "insight" ? "insight" : "visualization",
    language: parsed.language === "zh" || parsed.language === "en" ? parsed.language : defaultLanguage,
  };
}

function llmFromEnv() {
  const base_url = process.env.CHART_VIZ_LLM_BASE_URL ?? "https://api.openai.com/v1";
  const model = process.env.CHART_VIZ_LLM_MODEL ?? "gpt-4o-mini";
  const api_key = process.env.CHART_VIZ_LLM_API_KEY ?? process.env.OPENAI_API_KEY;
  if (!api_key) {
    throw new Error("Set CHART_VIZ_LLM_API_KEY or OPENAI_API_KEY to generate charts.");
  }
  return { base_url, model, api_key };
}

async function main() {
  const config = getChartVizConfig();
  const args = parseArgs(process.argv.slice(2), config.default_language);
  const logger = createPipelineLogger({ level: config.log_level });
  logger.info(`batch ${args.tool} with ${args.plan}`);

  let result: BatchObservation;
  if (args.tool === "visualization") {
    result = await runVisualizationPlan({
      planPath: args.plan,
      directory: args.directory,
      outputType: args.outputType,
      defaultWidth: config.default_width,
      defaultHeight: config.default_height,
      language: args.language,
      generator: new OpenAiChartSpecGenerator(llmFromEnv()),
      maxInsights: config.max_insights,
      enableDataQuery: config.enable_data_query,
      theme: config.theme,
      fontFamily: config.font_family,
      logger,
    });
  } else {
    result = await runInsightPlan({
      planPath: args.plan,
      directory: args.directory,
      outputType: args.outputType,
      defaultWidth: config.default_width,
      defaultHeight: config.default_height,
      fontFamily: config.font_family,
      logger,
    });
  }

  console.log(result.observation);
  if (!result.success) process.exitCode = 1;
}

main().catch((error) => {
  console.error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
