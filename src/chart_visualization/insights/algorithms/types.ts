import type { InsightRecord, Language, Scalar } from "../../pipeline/contracts";
import type { ChartDataView } from "../series";

export type InsightCandidate = Omit<InsightRecord, "id"> & {
  /** Relevance inside the proposing analyzer; higher ranks first. */
  score: number;
};

export type AnalyzerContext = {
  view: ChartDataView;
  language: Language;
};

export type InsightAnalyzer = (context: AnalyzerContext) => InsightCandidate[];

export function xText(x: Scalar): string {
  return x === null ? "" : String(x);
}

export function byScore(candidates: InsightCandidate[]): InsightCandidate[] {
  return [...candidates].sort((a, b) => b.score - a.score);
}
