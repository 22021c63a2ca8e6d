import type { ChartAnnotation, ChartSpec, InsightRecord, InsightTarget } from "./contracts";

/** Keeps the insights whose ordinal is listed; ordinals are never renumbered. */
export function selectInsights(insights: readonly InsightRecord[], insightsId: readonly number[]): InsightRecord[] {
  return insights.filter((insight) => insightsId.includes(insight.id));
}

export function toAnnotation(insight: InsightRecord): ChartAnnotation {
  const target: InsightTarget = insight.target ?? { kind: "note" };
  return { ...target, insight_id: insight.id, text: insight.content };
}

/**
 * Returns a copy of the spec annotated with the selected insights. Annotations from an
 * earlier update are replaced; the stored insight list stays untouched.
 */
export function mergeInsightAnnotations(spec: ChartSpec, selected: readonly InsightRecord[]): ChartSpec {
  return { ...spec, annotations: selected.map(toAnnotation) };
}
