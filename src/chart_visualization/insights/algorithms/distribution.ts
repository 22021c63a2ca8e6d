import { phrase, seriesSuffix } from "../phrasing";
import { formatNumber, mean, stdDev } from "../stats";
import { byScore, xText, type InsightAnalyzer, type InsightCandidate } from "./types";

const MAJORITY_SHARE = 0.5;
const MIN_VOLATILITY = 0.3;

export const majorityValue: InsightAnalyzer = ({ view, language }) => {
  if (view.chart_type !== "bar") return [];
  const candidates: InsightCandidate[] = [];
  for (const series of view.series) {
    if (series.points.length < 3) continue;
    if (series.points.some((point) => point.y < 0)) continue;
    const total = series.points.reduce((sum, point) => sum + point.y, 0);
    if (total <= 0) continue;
    const top = series.points.reduce((best, point) => (point.y > best.y ? point : best));
    const share = top.y / total;
    if (share <= MAJORITY_SHARE) continue;
    candidates.push({
      type: "majorityValue",
      content: phrase(language, "majorityValue", {
        x: xText(top.x),
        measure: series.measure,
        series: seriesSuffix(language, series),
        share: formatNumber(share * 100),
      }),
      evidence: { share, total },
      target: {
        kind: "point",
        x: top.x,
        y: top.y,
        series: series.grouped ? series.name : undefined,
        measure: series.measure,
      },
      score: share,
    });
  }
  return byScore(candidates);
};

export const extremeValue: InsightAnalyzer = ({ view, language }) => {
  if (view.chart_type === "scatter") return [];
  const candidates: InsightCandidate[] = [];
  for (const series of view.series) {
    if (series.points.length < 3) continue;
    const ys = series.points.map((point) => point.y);
    const max = series.points.reduce((best, point) => (point.y > best.y ? point : best));
    const min = series.points.reduce((best, point) => (point.y < best.y ? point : best));
    if (max.y === min.y) continue;
    const avg = mean(ys);
    const sd = stdDev(ys);

    for (const [key, point] of [
      ["extremeMax", max],
      ["extremeMin", min],
    ] as const) {
      candidates.push({
        type: "extremeValue",
        content: phrase(language, key, {
          measure: series.measure,
          series: seriesSuffix(language, series),
          value: formatNumber(point.y),
          x: xText(point.x),
        }),
        evidence: { value: point.y },
        target: {
          kind: "point",
          x: point.x,
          y: point.y,
          series: series.grouped ? series.name : undefined,
          measure: series.measure,
        },
        score: Math.abs(point.y - avg) / sd,
      });
    }
  }
  return byScore(candidates);
};

export const volatility: InsightAnalyzer = ({ view, language }) => {
  if (view.chart_type === "scatter") return [];
  const candidates: InsightCandidate[] = [];
  for (const series of view.series) {
    const ys = series.points.map((point) => point.y);
    if (ys.length < 4) continue;
    const avg = mean(ys);
    if (avg === 0) continue;
    const cv = stdDev(ys) / Math.abs(avg);
    if (cv < MIN_VOLATILITY) continue;
    candidates.push({
      type: "volatility",
      content: phrase(language, "volatility", {
        measure: series.measure,
        series: seriesSuffix(language, series),
        cv: formatNumber(cv * 100),
      }),
      evidence: { cv },
      target: { kind: "note" },
      score: cv,
    });
  }
  return byScore(candidates);
};
