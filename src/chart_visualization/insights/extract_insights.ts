import {
  ALGORITHM_TYPES,
  isInsightEligible,
  type AlgorithmType,
  type ChartSpec,
  type InsightRecord,
  type Language,
} from "../pipeline/contracts";
import { getDefaultLogger, type PipelineLogger } from "../pipeline/logger";
import { INSIGHT_ANALYZERS } from "./algorithms";
import { buildChartDataView } from "./series";

export type ExtractedInsight = Omit<InsightRecord, "id">;

export type ExtractInsightsOptions = {
  maxNum?: number;
  language?: Language;
  algorithms?: readonly AlgorithmType[];
  logger?: PipelineLogger;
};

export const DEFAULT_MAX_INSIGHTS = 6;

/**
 * Runs the configured analyzers over the chart's data in their listed order and keeps the
 * first `maxNum` findings. Charts without a cartesian data model yield nothing.
 */
export function extractInsights(spec: ChartSpec, options: ExtractInsightsOptions = {}): ExtractedInsight[] {
  const logger = options.logger ?? getDefaultLogger();
  const maxNum = options.maxNum ?? DEFAULT_MAX_INSIGHTS;
  if (!isInsightEligible(spec.type) || maxNum <= 0) {
    return [];
  }

  const stop = logger.startTimer("extract_insights");
  try {
    const view = buildChartDataView(spec);
    const language = options.language ?? "en";
    const found: ExtractedInsight[] = [];

    for (const algorithm of options.algorithms ?? ALGORITHM_TYPES) {
      try {
        for (const candidate of INSIGHT_ANALYZERS[algorithm]({ view, language })) {
          const { score: _score, ...insight } = candidate;
          found.push(insight);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`insight analyzer ${algorithm} failed: ${message}`);
      }
    }

    return found.slice(0, maxNum);
  } finally {
    stop();
  }
}

/** Numbers insights from 1 in their presented order. */
export function toInsightRecords(insights: readonly ExtractedInsight[]): InsightRecord[] {
  return insights.map((insight, index) => ({ id: index + 1, ...insight }));
}
