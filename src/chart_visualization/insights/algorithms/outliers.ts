import type { Language } from "../../pipeline/contracts";
import { toNumber } from "../../pipeline/dataset";
import { phrase, seriesSuffix } from "../phrasing";
import type { ChartDataView, SeriesData, SeriesPoint } from "../series";
import {
  dbscanNoise,
  formatNumber,
  localOutlierFactors,
  mean,
  medianNearestDistance,
  normalizePoints,
  quantile,
  stdDev,
  zScores,
  type Point2D,
} from "../stats";
import { byScore, xText, type InsightAnalyzer, type InsightCandidate } from "./types";

const Z_THRESHOLD = 2;
const IQR_FENCE = 1.5;
const LOF_THRESHOLD = 1.5;
const DBSCAN_MIN_POINTS = 3;

function pointTarget(series: SeriesData, point: SeriesPoint): InsightCandidate["target"] {
  return {
    kind: "point",
    x: point.x,
    y: point.y,
    series: series.grouped ? series.name : undefined,
    measure: series.measure,
  };
}

function baseVars(language: Language, series: SeriesData, point: SeriesPoint) {
  return {
    x: xText(point.x),
    measure: series.measure,
    series: seriesSuffix(language, series),
    value: formatNumber(point.y),
  };
}

/** Scatter charts place points by their own x; other charts by position along the axis. */
function planePoints(view: ChartDataView, series: SeriesData): Point2D[] | null {
  if (view.chart_type !== "scatter") {
    return series.points.map((point, index) => [index, point.y]);
  }
  const points: Point2D[] = [];
  for (const point of series.points) {
    const x = toNumber(point.x);
    if (x === null) return null;
    points.push([x, point.y]);
  }
  return points;
}

export const statisticsAbnormal: InsightAnalyzer = ({ view, language }) => {
  const candidates: InsightCandidate[] = [];
  for (const series of view.series) {
    const ys = series.points.map((point) => point.y);
    if (ys.length < 5) continue;
    const q1 = quantile(ys, 0.25);
    const q3 = quantile(ys, 0.75);
    const iqr = q3 - q1;
    if (iqr === 0) continue;
    const low = q1 - IQR_FENCE * iqr;
    const high = q3 + IQR_FENCE * iqr;

    for (const point of series.points) {
      if (point.y >= low && point.y <= high) continue;
      const beyond = point.y > high ? point.y - high : low - point.y;
      candidates.push({
        type: "statisticsAbnormal",
        content: phrase(language, "statisticsAbnormal", {
          ...baseVars(language, series, point),
          low: formatNumber(low),
          high: formatNumber(high),
        }),
        evidence: { q1, q3, low, high },
        target: pointTarget(series, point),
        score: beyond / iqr,
      });
    }
  }
  return byScore(candidates);
};

export const statisticsBase: InsightAnalyzer = ({ view, language }) => {
  const candidates: InsightCandidate[] = [];
  for (const series of view.series) {
    const ys = series.points.map((point) => point.y);
    if (ys.length < 5) continue;
    const avg = mean(ys);
    const z = zScores(ys);

    series.points.forEach((point, index) => {
      if (Math.abs(z[index]) < Z_THRESHOLD) return;
      candidates.push({
        type: "statisticsBase",
        content: phrase(language, "statisticsBase", {
          ...baseVars(language, series, point),
          z: formatNumber(Math.abs(z[index])),
          mean: formatNumber(avg),
        }),
        evidence: { z: z[index], mean: avg },
        target: pointTarget(series, point),
        score: Math.abs(z[index]),
      });
    });
  }
  return byScore(candidates);
};

export const lofOutlier: InsightAnalyzer = ({ view, language }) => {
  const candidates: InsightCandidate[] = [];
  for (const series of view.series) {
    if (series.points.length < 6) continue;
    const values: Point2D[] =
      view.chart_type === "scatter"
        ? planePoints(view, series) ?? []
        : series.points.map((point) => [point.y, 0]);
    if (values.length !== series.points.length) continue;
    const factors = localOutlierFactors(normalizePoints(values), Math.min(5, values.length - 1));

    series.points.forEach((point, index) => {
      const factor = factors[index];
      if (factor <= LOF_THRESHOLD) return;
      candidates.push({
        type: "lofOutlier",
        content: phrase(language, "lofOutlier", {
          ...baseVars(language, series, point),
          score: formatNumber(factor),
        }),
        evidence: { lof: factor },
        target: pointTarget(series, point),
        score: factor,
      });
    });
  }
  return byScore(candidates);
};

export const dbscanOutlier: InsightAnalyzer = ({ view, language }) => {
  const candidates: InsightCandidate[] = [];
  for (const series of view.series) {
    if (series.points.length < 5) continue;
    const plane = planePoints(view, series);
    if (!plane) continue;
    const points = normalizePoints(plane);
    const eps = 2 * medianNearestDistance(points);
    if (eps === 0) continue;
    const ys = series.points.map((point) => point.y);
    const z = zScores(ys);

    for (const index of dbscanNoise(points, eps, DBSCAN_MIN_POINTS)) {
      const point = series.points[index];
      candidates.push({
        type: "dbscanOutlier",
        content: phrase(language, "dbscanOutlier", baseVars(language, series, point)),
        evidence: { eps },
        target: pointTarget(series, point),
        score: Math.abs(z[index]),
      });
    }
  }
  return byScore(candidates);
};

export const differenceOutlier: InsightAnalyzer = ({ view, language }) => {
  if (!view.ordered || view.chart_type === "scatter") return [];
  const candidates: InsightCandidate[] = [];
  for (const series of view.series) {
    const ys = series.points.map((point) => point.y);
    if (ys.length < 5) continue;
    const diffs = ys.slice(1).map((value, index) => value - ys[index]);
    if (stdDev(diffs) === 0) continue;
    const z = zScores(diffs);

    diffs.forEach((delta, index) => {
      if (Math.abs(z[index]) < Z_THRESHOLD) return;
      const point = series.points[index + 1];
      candidates.push({
        type: "differenceOutlier",
        content: phrase(language, "differenceOutlier", {
          ...baseVars(language, series, point),
          change: phrase(language, delta > 0 ? "rise" : "drop"),
          delta: `${delta > 0 ? "+" : ""}${formatNumber(delta)}`,
        }),
        evidence: { delta, z: z[index] },
        target: pointTarget(series, point),
        score: Math.abs(z[index]),
      });
    });
  }
  return byScore(candidates);
};
