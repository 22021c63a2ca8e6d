import type { ChartSpec, FieldType, Scalar } from "../pipeline/contracts";
import { inferFieldType, toNumber } from "../pipeline/dataset";

export type SeriesPoint = { x: Scalar; y: number; index: number };

export type SeriesData = {
  /** Series label; the measure name when the chart has no series field. */
  name: string;
  measure: string;
  grouped: boolean;
  points: SeriesPoint[];
};

export type ChartDataView = {
  chart_type: ChartSpec["type"];
  x_field: string;
  x_type: FieldType;
  /** True when the x axis carries an ordering (time or numbers) that trends can follow. */
  ordered: boolean;
  series: SeriesData[];
};

function collectSeries(spec: ChartSpec, measure: string, groupBy?: string): SeriesData[] {
  const groups = new Map<string, SeriesPoint[]>();
  spec.data.values.forEach((row, index) => {
    const y = toNumber(row[measure] ?? null);
    if (y === null) return;
    const key = groupBy ? String(row[groupBy] ?? "") : measure;
    const bucket = groups.get(key) ?? [];
    bucket.push({ x: row[spec.xField] ?? null, y, index });
    groups.set(key, bucket);
  });
  return [...groups.entries()].map(([name, points]) => ({
    name,
    measure,
    grouped: Boolean(groupBy),
    points,
  }));
}

export function buildChartDataView(spec: ChartSpec): ChartDataView {
  const xType = inferFieldType(spec.data.values.map((row) => row[spec.xField] ?? null));
  const series: SeriesData[] = [];

  if (spec.type === "dual_axis" && spec.y2Field) {
    series.push(...collectSeries(spec, spec.yField), ...collectSeries(spec, spec.y2Field));
  } else {
    series.push(...collectSeries(spec, spec.yField, spec.seriesField));
  }

  const ordered =
    xType === "temporal" ||
    xType === "quantitative" ||
    spec.type === "line" ||
    spec.type === "area" ||
    spec.type === "dual_axis";

  return {
    chart_type: spec.type,
    x_field: spec.xField,
    x_type: xType,
    ordered,
    series: series.filter((entry) => entry.points.length > 0),
  };
}

/** Aligns two series on shared x values, keeping the first occurrence of each x. */
export function alignSeries(a: SeriesData, b: SeriesData): { xs: number[]; ys: number[] } {
  const byX = new Map<string, number>();
  for (const point of b.points) {
    const key = String(point.x);
    if (!byX.has(key)) byX.set(key, point.y);
  }
  const xs: number[] = [];
  const ys: number[] = [];
  const seen = new Set<string>();
  for (const point of a.points) {
    const key = String(point.x);
    const other = byX.get(key);
    if (other === undefined || seen.has(key)) continue;
    seen.add(key);
    xs.push(point.y);
    ys.push(other);
  }
  return { xs, ys };
}
