import type { AlgorithmType, Language } from "../../pipeline/contracts";
import { toNumber } from "../../pipeline/dataset";
import { phrase, seriesLabel } from "../phrasing";
import { alignSeries, type ChartDataView } from "../series";
import { formatNumber, pearson, spearman } from "../stats";
import { byScore, type InsightAnalyzer, type InsightCandidate } from "./types";

const MIN_CORRELATION = 0.8;

type Pair = { a: string; b: string; xs: number[]; ys: number[] };

function correlationPairs(view: ChartDataView): Pair[] {
  if (view.chart_type === "scatter") {
    return view.series.flatMap((series) => {
      const xs: number[] = [];
      const ys: number[] = [];
      for (const point of series.points) {
        const x = toNumber(point.x);
        if (x === null) continue;
        xs.push(x);
        ys.push(point.y);
      }
      const b = series.grouped ? `${series.measure} (${series.name})` : series.measure;
      return [{ a: view.x_field, b, xs, ys }];
    });
  }

  const pairs: Pair[] = [];
  for (let i = 0; i < view.series.length; i += 1) {
    for (let j = i + 1; j < view.series.length; j += 1) {
      const aligned = alignSeries(view.series[i], view.series[j]);
      pairs.push({
        a: seriesLabel(view.series[i]),
        b: seriesLabel(view.series[j]),
        xs: aligned.xs,
        ys: aligned.ys,
      });
    }
  }
  return pairs;
}

function correlationAnalyzer(
  type: Extract<AlgorithmType, "pearsonCorrelation" | "spearmanCorrelation">,
  coefficient: (xs: number[], ys: number[]) => number | null
): InsightAnalyzer {
  return ({ view, language }) => {
    const candidates: InsightCandidate[] = [];
    for (const pair of correlationPairs(view)) {
      const r = coefficient(pair.xs, pair.ys);
      if (r === null || Math.abs(r) < MIN_CORRELATION) continue;
      candidates.push({
        type,
        content: describe(type, language, pair, r),
        evidence: { r, n: pair.xs.length },
        target: { kind: "note" },
        score: Math.abs(r),
      });
    }
    return byScore(candidates);
  };
}

function describe(type: AlgorithmType, language: Language, pair: Pair, r: number) {
  return phrase(language, type, {
    a: pair.a,
    b: pair.b,
    sign: phrase(language, r > 0 ? "positive" : "negative"),
    r: formatNumber(r),
  });
}

export const pearsonCorrelation = correlationAnalyzer("pearsonCorrelation", pearson);
export const spearmanCorrelation = correlationAnalyzer("spearmanCorrelation", spearman);
