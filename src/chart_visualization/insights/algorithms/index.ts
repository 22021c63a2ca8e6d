import type { AlgorithmType } from "../../pipeline/contracts";
import { pearsonCorrelation, spearmanCorrelation } from "./correlation";
import { extremeValue, majorityValue, volatility } from "./distribution";
import {
  dbscanOutlier,
  differenceOutlier,
  lofOutlier,
  statisticsAbnormal,
  statisticsBase,
} from "./outliers";
import { abnormalTrend, overallTrend, pageHinkley, turningPoint } from "./trend";
import type { InsightAnalyzer } from "./types";

export type { AnalyzerContext, InsightAnalyzer, InsightCandidate } from "./types";

export const INSIGHT_ANALYZERS: Record<AlgorithmType, InsightAnalyzer> = {
  overallTrend,
  abnormalTrend,
  pearsonCorrelation,
  spearmanCorrelation,
  statisticsAbnormal,
  lofOutlier,
  dbscanOutlier,
  majorityValue,
  extremeValue,
  pageHinkley,
  turningPoint,
  differenceOutlier,
  statisticsBase,
  volatility,
};
