import { phrase, seriesSuffix } from "../phrasing";
import type { SeriesData } from "../series";
import { formatNumber, linearRegression, mean, pageHinkleyChangePoint, stdDev, type Regression } from "../stats";
import { byScore, xText, type AnalyzerContext, type InsightAnalyzer, type InsightCandidate } from "./types";

const MIN_TREND_POINTS = 3;
const MIN_TREND_R2 = 0.5;
const MIN_RELATIVE_SPAN = 0.05;
const LEVEL_SHIFT_MAX_R2 = 0.9;

export type SeriesTrend = {
  direction: "increasing" | "decreasing";
  regression: Regression;
};

export function seriesTrend(series: SeriesData): SeriesTrend | null {
  const ys = series.points.map((point) => point.y);
  if (ys.length < MIN_TREND_POINTS) return null;
  const regression = linearRegression(
    ys.map((_, index) => index),
    ys
  );
  if (regression.r2 < MIN_TREND_R2 || regression.slope === 0) return null;
  const span = Math.abs(regression.slope * (ys.length - 1));
  const base = Math.abs(mean(ys)) || 1;
  if (span / base < MIN_RELATIVE_SPAN) return null;
  return { direction: regression.slope > 0 ? "increasing" : "decreasing", regression };
}

function trendsApply({ view }: AnalyzerContext) {
  return view.ordered && view.chart_type !== "scatter";
}

function trendLine(series: SeriesData, regression: Regression): InsightCandidate["target"] {
  const last = series.points.length - 1;
  return {
    kind: "line",
    from: { x: series.points[0].x, y: regression.intercept },
    to: { x: series.points[last].x, y: regression.intercept + regression.slope * last },
    series: series.grouped ? series.name : undefined,
    measure: series.measure,
  };
}

export const overallTrend: InsightAnalyzer = (context) => {
  if (!trendsApply(context)) return [];
  const { language } = context;
  const candidates: InsightCandidate[] = [];

  for (const series of context.view.series) {
    const trend = seriesTrend(series);
    if (!trend) continue;
    const first = series.points[0];
    const last = series.points[series.points.length - 1];
    candidates.push({
      type: "overallTrend",
      content: phrase(language, "overallTrend", {
        measure: series.measure,
        series: seriesSuffix(language, series),
        direction: phrase(language, trend.direction),
        start: formatNumber(first.y),
        startX: xText(first.x),
        end: formatNumber(last.y),
        endX: xText(last.x),
      }),
      evidence: { slope: trend.regression.slope, r2: trend.regression.r2 },
      target: trendLine(series, trend.regression),
      score: trend.regression.r2,
    });
  }
  return byScore(candidates);
};

export const abnormalTrend: InsightAnalyzer = (context) => {
  if (!trendsApply(context)) return [];
  const { language } = context;
  const trending = context.view.series
    .map((series) => ({ series, trend: seriesTrend(series) }))
    .filter((entry): entry is { series: SeriesData; trend: SeriesTrend } => entry.trend !== null);

  const candidates: InsightCandidate[] = [];
  for (const entry of trending) {
    const others = trending.filter((other) => other !== entry);
    if (others.length < 2) continue;
    if (!others.every((other) => other.trend.direction !== entry.trend.direction)) continue;
    candidates.push({
      type: "abnormalTrend",
      content: phrase(language, "abnormalTrend", {
        series: entry.series.name,
        measure: entry.series.measure,
        direction: phrase(language, entry.trend.direction),
      }),
      evidence: { slope: entry.trend.regression.slope, r2: entry.trend.regression.r2 },
      target: trendLine(entry.series, entry.trend.regression),
      score: entry.trend.regression.r2,
    });
  }
  return byScore(candidates);
};

export const turningPoint: InsightAnalyzer = (context) => {
  if (!trendsApply(context)) return [];
  const { language } = context;
  const candidates: InsightCandidate[] = [];

  for (const series of context.view.series) {
    const ys = series.points.map((point) => point.y);
    if (ys.length < 5) continue;
    const base = Math.abs(mean(ys)) || 1;
    let best: { index: number; score: number; left: Regression; right: Regression } | null = null;

    for (let i = 2; i <= ys.length - 3; i += 1) {
      const leftYs = ys.slice(0, i + 1);
      const rightYs = ys.slice(i);
      const left = linearRegression(leftYs.map((_, k) => k), leftYs);
      const right = linearRegression(rightYs.map((_, k) => k), rightYs);
      if (left.slope === 0 || right.slope === 0) continue;
      if (Math.sign(left.slope) === Math.sign(right.slope)) continue;
      if (left.r2 < MIN_TREND_R2 || right.r2 < MIN_TREND_R2) continue;
      const score = Math.abs(left.slope - right.slope) / base;
      if (!best || score > best.score) best = { index: i, score, left, right };
    }

    if (!best) continue;
    const point = series.points[best.index];
    const from = best.left.slope > 0 ? "increasing" : "decreasing";
    const to = best.right.slope > 0 ? "increasing" : "decreasing";
    candidates.push({
      type: "turningPoint",
      content: phrase(language, "turningPoint", {
        measure: series.measure,
        series: seriesSuffix(language, series),
        from: phrase(language, from),
        to: phrase(language, to),
        x: xText(point.x),
      }),
      evidence: { left_slope: best.left.slope, right_slope: best.right.slope },
      target: {
        kind: "point",
        x: point.x,
        y: point.y,
        series: series.grouped ? series.name : undefined,
        measure: series.measure,
      },
      score: best.score,
    });
  }
  return byScore(candidates);
};

export const pageHinkley: InsightAnalyzer = (context) => {
  if (!trendsApply(context)) return [];
  const { language } = context;
  const candidates: InsightCandidate[] = [];

  for (const series of context.view.series) {
    const ys = series.points.map((point) => point.y);
    if (ys.length < 6) continue;
    const sd = stdDev(ys);
    if (sd === 0) continue;
    // a clean linear ramp is a trend, not a level shift
    const fit = linearRegression(ys.map((_, index) => index), ys);
    if (fit.r2 >= LEVEL_SHIFT_MAX_R2) continue;

    const change = pageHinkleyChangePoint(ys, { delta: 0.05, lambda: 2 });
    if (!change || change.index < 2 || change.index > ys.length - 2) continue;
    const before = mean(ys.slice(0, change.index));
    const after = mean(ys.slice(change.index));
    const point = series.points[change.index];
    candidates.push({
      type: "pageHinkley",
      content: phrase(language, "pageHinkley", {
        measure: series.measure,
        series: seriesSuffix(language, series),
        direction: phrase(language, change.direction),
        x: xText(point.x),
        before: formatNumber(before),
        after: formatNumber(after),
      }),
      evidence: { before, after, change_index: change.index },
      target: { kind: "vertical", x: point.x },
      score: Math.abs(after - before) / sd,
    });
  }
  return byScore(candidates);
};
