import { buildChartDataView, type SeriesData, type SeriesPoint } from "../insights/series";
import { formatNumber } from "../insights/stats";
import type {
  ChartAnnotation,
  ChartFormatter,
  ChartSpec,
  ChartTheme,
  DataRow,
  Scalar,
} from "../pipeline/contracts";
import { toNumber } from "../pipeline/dataset";

export type SvgChartOptions = {
  width: number;
  height: number;
  fontFamily: string;
};

export type SvgChart = {
  svg: string;
  width: number;
  height: number;
  background: string;
  /** Number of drawn data marks (bars, points, slices, words). */
  markCount: number;
};

type Palette = {
  background: string;
  text: string;
  grid: string;
  annotation: string;
  colors: string[];
};

const PALETTES: Record<ChartTheme, Palette> = {
  light: {
    background: "#ffffff",
    text: "#1f2937",
    grid: "#e5e7eb",
    annotation: "#dc2626",
    colors: ["#2563eb", "#16a34a", "#f59e0b", "#9333ea", "#0891b2", "#db2777", "#65a30d", "#ea580c"],
  },
  dark: {
    background: "#0f172a",
    text: "#f1f5f9",
    grid: "#334155",
    annotation: "#f87171",
    colors: ["#60a5fa", "#4ade80", "#fbbf24", "#c084fc", "#22d3ee", "#f472b6", "#a3e635", "#fb923c"],
  },
};

const PADDING = { top: 60, right: 40, bottom: 60, left: 70 };
const LEGEND_HEIGHT = 24;
const NOTE_LINE_HEIGHT = 18;

type PlotArea = { left: number; top: number; right: number; bottom: number };

type DrawContext = {
  spec: ChartSpec;
  palette: Palette;
  plot: PlotArea;
  marks: string[];
  markCount: number;
};

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function truncate(text: string, max: number) {
  return text.length > max ? `${text.slice(0, Math.max(1, max - 1))}…` : text;
}

function xKey(value: Scalar): string {
  return value === null ? "" : String(value);
}

function round(value: number) {
  return Number(value.toFixed(2));
}

/** Evenly spaced round tick values covering [min, max]. */
export function niceTicks(min: number, max: number, count = 5): number[] {
  if (!Number.isFinite(min) || !Number.isFinite(max)) return [0, 1];
  let low = Math.min(min, max);
  let high = Math.max(min, max);
  if (low === high) {
    const pad = Math.abs(low) || 1;
    low -= pad;
    high += pad;
  }
  const rawStep = (high - low) / count;
  const magnitude = 10 ** Math.floor(Math.log10(rawStep));
  const residual = rawStep / magnitude;
  const step = (residual > 5 ? 10 : residual > 2 ? 5 : residual > 1 ? 2 : 1) * magnitude;
  const start = Math.floor(low / step) * step;
  const end = Math.ceil(high / step) * step;
  const ticks: number[] = [];
  for (let value = start; value <= end + step / 2; value += step) {
    ticks.push(Number(value.toFixed(10)));
  }
  return ticks;
}

function linearScale(domain: [number, number], range: [number, number]) {
  const [d0, d1] = domain;
  const [r0, r1] = range;
  return (value: number) => (d1 === d0 ? (r0 + r1) / 2 : r0 + ((value - d0) / (d1 - d0)) * (r1 - r0));
}

export function applyFormatter(formatter: ChartFormatter | undefined, value: Scalar, datum?: DataRow): string {
  if (formatter) return formatter(value, datum);
  if (typeof value === "number") return formatNumber(value);
  return xKey(value);
}

function axisFormatter(spec: ChartSpec, orient: "left" | "right" | "bottom") {
  return spec.axes?.find((axis) => axis.orient === orient)?.label?.formatter;
}

function axisTitle(spec: ChartSpec, orient: "left" | "right" | "bottom") {
  return spec.axes?.find((axis) => axis.orient === orient)?.title;
}

function seriesName(series: SeriesData) {
  return series.grouped ? series.name : series.measure;
}

function tooltipText(spec: ChartSpec, series: SeriesData, point: SeriesPoint) {
  const datum = spec.data.values[point.index];
  if (spec.tooltip?.formatter) return spec.tooltip.formatter(point.y, datum);
  return `${xKey(point.x)} · ${seriesName(series)}: ${formatNumber(point.y)}`;
}

function mark(context: DrawContext, element: string, tooltip: string, shape: string) {
  context.markCount += 1;
  context.marks.push(`<${element} class="mark" data-tooltip="${escapeXml(tooltip)}" ${shape}/>`);
}

function text(
  x: number,
  y: number,
  content: string,
  attrs: { anchor?: "start" | "middle" | "end"; cls?: string; size?: number; fill?: string; extra?: string } = {}
) {
  const size = attrs.size ? ` font-size="${attrs.size}"` : "";
  const fill = attrs.fill ? ` style="fill: ${attrs.fill}"` : "";
  return `<text x="${round(x)}" y="${round(y)}" text-anchor="${attrs.anchor ?? "middle"}" class="${
    attrs.cls ?? "axis-label"
  }"${size}${fill}${attrs.extra ? ` ${attrs.extra}` : ""}>${escapeXml(content)}</text>`;
}

function categories(spec: ChartSpec): Scalar[] {
  const seen = new Set<string>();
  const list: Scalar[] = [];
  for (const row of spec.data.values) {
    const value = row[spec.xField] ?? null;
    const key = xKey(value);
    if (seen.has(key)) continue;
    seen.add(key);
    list.push(value);
  }
  return list;
}

function aggregateByCategory(spec: ChartSpec): Array<{ key: Scalar; value: number }> {
  const totals = new Map<string, { key: Scalar; value: number }>();
  for (const row of spec.data.values) {
    const key = row[spec.xField] ?? null;
    const value = toNumber(row[spec.yField] ?? null) ?? 0;
    const entry = totals.get(xKey(key)) ?? { key, value: 0 };
    entry.value += value;
    totals.set(xKey(key), entry);
  }
  return [...totals.values()];
}

// ---------------------------------------------------------------------------
// Cartesian charts
// ---------------------------------------------------------------------------

type CartesianFrame = {
  xOf: (value: Scalar) => number | null;
  yOf: (value: number, measure?: string) => number;
};

function drawValueAxis(
  context: DrawContext,
  ticks: number[],
  scale: (value: number) => number,
  side: "left" | "right"
) {
  const { plot, spec } = context;
  const formatter = axisFormatter(spec, side);
  for (const tick of ticks) {
    const y = scale(tick);
    if (side === "left") {
      context.marks.push(
        `<line class="grid-line" x1="${plot.left}" x2="${plot.right}" y1="${round(y)}" y2="${round(y)}"/>`
      );
      context.marks.push(text(plot.left - 8, y + 4, applyFormatter(formatter, tick), { anchor: "end" }));
    } else {
      context.marks.push(text(plot.right + 8, y + 4, applyFormatter(formatter, tick), { anchor: "start" }));
    }
  }
  const title = axisTitle(spec, side);
  if (title) {
    const x = side === "left" ? 16 : plot.right + 58;
    const y = (plot.top + plot.bottom) / 2;
    context.marks.push(text(x, y, title, { extra: `transform="rotate(-90, ${round(x)}, ${round(y)})"` }));
  }
}

function drawCategoryAxis(context: DrawContext, cats: Scalar[], center: (index: number) => number) {
  const { plot, spec } = context;
  const formatter = axisFormatter(spec, "bottom");
  const maxLabels = Math.max(1, Math.floor((plot.right - plot.left) / 60));
  const every = Math.max(1, Math.ceil(cats.length / maxLabels));
  cats.forEach((value, index) => {
    if (index % every !== 0) return;
    const label = truncate(applyFormatter(formatter, value, undefined), 14);
    context.marks.push(text(center(index), plot.bottom + 20, label));
  });
  context.marks.push(
    `<line class="axis-line" x1="${plot.left}" x2="${plot.right}" y1="${plot.bottom}" y2="${plot.bottom}"/>`
  );
}

function drawBottomTitle(context: DrawContext) {
  const title = axisTitle(context.spec, "bottom");
  if (!title) return;
  context.marks.push(text((context.plot.left + context.plot.right) / 2, context.plot.bottom + 44, title));
}

function drawDataLabel(context: DrawContext, x: number, y: number, series: SeriesData, point: SeriesPoint) {
  const label = context.spec.label;
  if (!label?.visible) return;
  const content = applyFormatter(label.formatter, point.y, context.spec.data.values[point.index]);
  context.marks.push(text(x, y - 6, content, { cls: "value-label" }));
}

function drawBars(
  context: DrawContext,
  bars: SeriesData[],
  frame: { band: number; bandStart: (key: string) => number | null; yOf: (value: number) => number; base: number },
  colorOffset = 0
) {
  const width = (frame.band * 0.7) / Math.max(1, bars.length);
  bars.forEach((series, seriesIndex) => {
    const color = context.palette.colors[(seriesIndex + colorOffset) % context.palette.colors.length];
    for (const point of series.points) {
      const start = frame.bandStart(xKey(point.x));
      if (start === null) continue;
      const x = start + frame.band * 0.15 + seriesIndex * width;
      const y = frame.yOf(point.y);
      const top = Math.min(y, frame.base);
      const height = Math.abs(frame.base - y);
      mark(
        context,
        "rect",
        tooltipText(context.spec, series, point),
        `x="${round(x)}" y="${round(top)}" width="${round(width)}" height="${round(height)}" fill="${color}"`
      );
      drawDataLabel(context, x + width / 2, top, series, point);
    }
  });
}

function drawLines(
  context: DrawContext,
  lines: SeriesData[],
  xOf: (value: Scalar) => number | null,
  yOf: (value: number) => number,
  options: { area?: boolean; base?: number; colorOffset?: number } = {}
) {
  lines.forEach((series, seriesIndex) => {
    const color = context.palette.colors[(seriesIndex + (options.colorOffset ?? 0)) % context.palette.colors.length];
    const coords: Array<{ x: number; y: number; point: SeriesPoint }> = [];
    for (const point of series.points) {
      const x = xOf(point.x);
      if (x === null) continue;
      coords.push({ x, y: yOf(point.y), point });
    }
    if (coords.length === 0) return;
    const path = coords.map((c, i) => `${i === 0 ? "M" : "L"}${round(c.x)},${round(c.y)}`).join(" ");
    if (options.area && options.base !== undefined) {
      const first = coords[0];
      const last = coords[coords.length - 1];
      context.marks.push(
        `<path d="${path} L${round(last.x)},${round(options.base)} L${round(first.x)},${round(
          options.base
        )} Z" fill="${color}" fill-opacity="0.25" stroke="none"/>`
      );
    }
    context.marks.push(`<path d="${path}" fill="none" stroke="${color}" stroke-width="2"/>`);
    for (const c of coords) {
      mark(
        context,
        "circle",
        tooltipText(context.spec, series, c.point),
        `cx="${round(c.x)}" cy="${round(c.y)}" r="3" fill="${color}"`
      );
      drawDataLabel(context, c.x, c.y, series, c.point);
    }
  });
}

function valueDomain(series: SeriesData[]): number[] {
  const values = series.flatMap((entry) => entry.points.map((point) => point.y));
  if (values.length === 0) return [0, 1];
  return niceTicks(Math.min(0, ...values), Math.max(0, ...values));
}

function drawCartesian(context: DrawContext): CartesianFrame {
  const { spec, plot } = context;
  const view = buildChartDataView(spec);
  const cats = categories(spec);
  const band = (plot.right - plot.left) / Math.max(1, cats.length);
  const index = new Map(cats.map((value, i) => [xKey(value), i]));
  const bandStart = (key: string) => {
    const i = index.get(key);
    return i === undefined ? null : plot.left + band * i;
  };
  const bandCenter = (value: Scalar) => {
    const start = bandStart(xKey(value));
    return start === null ? null : start + band / 2;
  };

  const primary = spec.type === "dual_axis" ? view.series.filter((s) => s.measure === spec.yField) : view.series;
  const secondary = spec.type === "dual_axis" ? view.series.filter((s) => s.measure === spec.y2Field) : [];

  const leftTicks = valueDomain(primary);
  const yLeft = linearScale([leftTicks[0], leftTicks[leftTicks.length - 1]], [plot.bottom, plot.top]);
  drawValueAxis(context, leftTicks, yLeft, "left");
  const baseLeft = yLeft(Math.max(leftTicks[0], Math.min(0, leftTicks[leftTicks.length - 1])));

  let yRight = yLeft;
  if (secondary.length > 0) {
    const rightTicks = valueDomain(secondary);
    yRight = linearScale([rightTicks[0], rightTicks[rightTicks.length - 1]], [plot.bottom, plot.top]);
    drawValueAxis(context, rightTicks, yRight, "right");
  }

  let xOf: (value: Scalar) => number | null = bandCenter;

  if (spec.type === "scatter" && view.x_type === "quantitative") {
    const xs = view.series.flatMap((s) => s.points.map((p) => toNumber(p.x))).filter((x): x is number => x !== null);
    const xTicks = niceTicks(Math.min(...xs), Math.max(...xs));
    const xScale = linearScale([xTicks[0], xTicks[xTicks.length - 1]], [plot.left, plot.right]);
    const formatter = axisFormatter(spec, "bottom");
    for (const tick of xTicks) {
      context.marks.push(text(xScale(tick), plot.bottom + 20, applyFormatter(formatter, tick)));
    }
    context.marks.push(
      `<line class="axis-line" x1="${plot.left}" x2="${plot.right}" y1="${plot.bottom}" y2="${plot.bottom}"/>`
    );
    xOf = (value) => {
      const num = toNumber(value);
      return num === null ? null : xScale(num);
    };
  } else {
    drawCategoryAxis(context, cats, (i) => plot.left + band * (i + 0.5));
  }
  drawBottomTitle(context);

  switch (spec.type) {
    case "bar":
      drawBars(context, primary, { band, bandStart, yOf: yLeft, base: baseLeft });
      break;
    case "line":
      drawLines(context, primary, xOf, yLeft);
      break;
    case "area":
      drawLines(context, primary, xOf, yLeft, { area: true, base: baseLeft });
      break;
    case "scatter":
      primary.forEach((series, seriesIndex) => {
        const color = context.palette.colors[seriesIndex % context.palette.colors.length];
        for (const point of series.points) {
          const x = xOf(point.x);
          if (x === null) continue;
          const y = yLeft(point.y);
          mark(
            context,
            "circle",
            tooltipText(spec, series, point),
            `cx="${round(x)}" cy="${round(y)}" r="4" fill="${color}" fill-opacity="0.8"`
          );
          drawDataLabel(context, x, y, series, point);
        }
      });
      break;
    case "dual_axis":
      drawBars(context, primary, { band, bandStart, yOf: yLeft, base: baseLeft });
      drawLines(context, secondary, xOf, yRight, { colorOffset: primary.length });
      break;
    default:
      break;
  }

  return {
    xOf,
    yOf: (value, measure) => (secondary.length > 0 && measure === spec.y2Field ? yRight(value) : yLeft(value)),
  };
}

// ---------------------------------------------------------------------------
// Polar and free-form charts
// ---------------------------------------------------------------------------

function drawPie(context: DrawContext) {
  const { plot, palette, spec } = context;
  const slices = aggregateByCategory(spec).filter((slice) => slice.value > 0);
  const total = slices.reduce((sum, slice) => sum + slice.value, 0);
  if (total <= 0) return;
  const cx = (plot.left + plot.right) / 2;
  const cy = (plot.top + plot.bottom) / 2;
  const radius = (Math.min(plot.right - plot.left, plot.bottom - plot.top) / 2) * 0.8;
  let angle = -Math.PI / 2;

  slices.forEach((slice, i) => {
    const share = slice.value / total;
    const color = palette.colors[i % palette.colors.length];
    const label = `${xKey(slice.key)}: ${formatNumber(share * 100)}%`;
    const tooltip = spec.tooltip?.formatter ? spec.tooltip.formatter(slice.value) : label;
    if (share >= 1) {
      mark(context, "circle", tooltip, `cx="${round(cx)}" cy="${round(cy)}" r="${round(radius)}" fill="${color}"`);
    } else {
      const end = angle + share * Math.PI * 2;
      const large = share > 0.5 ? 1 : 0;
      const x1 = cx + radius * Math.cos(angle);
      const y1 = cy + radius * Math.sin(angle);
      const x2 = cx + radius * Math.cos(end);
      const y2 = cy + radius * Math.sin(end);
      mark(
        context,
        "path",
        tooltip,
        `d="M${round(cx)},${round(cy)} L${round(x1)},${round(y1)} A${round(radius)},${round(
          radius
        )} 0 ${large} 1 ${round(x2)},${round(y2)} Z" fill="${color}"`
      );
    }
    const mid = angle + share * Math.PI;
    const labelText = spec.label?.visible ? applyFormatter(spec.label.formatter, slice.value) : label;
    context.marks.push(
      text(cx + radius * 1.12 * Math.cos(mid), cy + radius * 1.12 * Math.sin(mid), labelText, {
        anchor: Math.cos(mid) >= 0 ? "start" : "end",
      })
    );
    angle += share * Math.PI * 2;
  });
}

function drawFunnel(context: DrawContext) {
  const { plot, palette, spec } = context;
  const stages = aggregateByCategory(spec).sort((a, b) => b.value - a.value);
  const max = stages[0]?.value ?? 0;
  if (max <= 0) return;
  const rowHeight = (plot.bottom - plot.top) / stages.length;
  const center = (plot.left + plot.right) / 2;

  stages.forEach((stage, i) => {
    const width = Math.max(2, (Math.max(0, stage.value) / max) * (plot.right - plot.left));
    const y = plot.top + i * rowHeight;
    const label = `${xKey(stage.key)}: ${applyFormatter(spec.label?.formatter, stage.value)}`;
    mark(
      context,
      "rect",
      spec.tooltip?.formatter ? spec.tooltip.formatter(stage.value) : label,
      `x="${round(center - width / 2)}" y="${round(y + 2)}" width="${round(width)}" height="${round(
        rowHeight - 4
      )}" fill="${palette.colors[i % palette.colors.length]}"`
    );
    context.marks.push(text(center, y + rowHeight / 2 + 4, label, { cls: "value-label" }));
  });
}

function drawRadar(context: DrawContext) {
  const { plot, palette, spec } = context;
  const view = buildChartDataView(spec);
  const spokes = categories(spec);
  if (spokes.length < 3) return;
  const cx = (plot.left + plot.right) / 2;
  const cy = (plot.top + plot.bottom) / 2;
  const radius = (Math.min(plot.right - plot.left, plot.bottom - plot.top) / 2) * 0.8;
  const ticks = valueDomain(view.series).filter((tick) => tick >= 0);
  const max = ticks[ticks.length - 1] || 1;
  const angleOf = (i: number) => -Math.PI / 2 + (i / spokes.length) * Math.PI * 2;
  const at = (i: number, value: number) => ({
    x: cx + (value / max) * radius * Math.cos(angleOf(i)),
    y: cy + (value / max) * radius * Math.sin(angleOf(i)),
  });

  for (const tick of ticks.slice(1)) {
    const ring = spokes.map((_, i) => at(i, tick));
    context.marks.push(
      `<polygon class="grid-line" fill="none" points="${ring.map((p) => `${round(p.x)},${round(p.y)}`).join(" ")}"/>`
    );
  }
  spokes.forEach((spoke, i) => {
    const end = at(i, max);
    context.marks.push(`<line class="grid-line" x1="${round(cx)}" y1="${round(cy)}" x2="${round(end.x)}" y2="${round(end.y)}"/>`);
    const label = at(i, max * 1.12);
    context.marks.push(text(label.x, label.y + 4, truncate(xKey(spoke), 14)));
  });

  const index = new Map(spokes.map((value, i) => [xKey(value), i]));
  view.series.forEach((series, seriesIndex) => {
    const color = palette.colors[seriesIndex % palette.colors.length];
    const points = series.points
      .map((point) => ({ point, i: index.get(xKey(point.x)) }))
      .filter((entry): entry is { point: SeriesPoint; i: number } => entry.i !== undefined)
      .sort((a, b) => a.i - b.i);
    const coords = points.map((entry) => at(entry.i, Math.max(0, entry.point.y)));
    context.marks.push(
      `<polygon points="${coords.map((p) => `${round(p.x)},${round(p.y)}`).join(" ")}" fill="${color}" fill-opacity="0.2" stroke="${color}" stroke-width="2"/>`
    );
    points.forEach((entry, k) => {
      mark(
        context,
        "circle",
        tooltipText(spec, series, entry.point),
        `cx="${round(coords[k].x)}" cy="${round(coords[k].y)}" r="3" fill="${color}"`
      );
    });
  });
}

function drawWordCloud(context: DrawContext) {
  const { plot, palette, spec } = context;
  const words = aggregateByCategory(spec)
    .filter((word) => xKey(word.key).length > 0)
    .sort((a, b) => b.value - a.value);
  if (words.length === 0) return;
  const max = words[0].value;
  const min = words[words.length - 1].value;
  let x = plot.left;
  let y = plot.top;
  let rowHeight = 0;

  words.forEach((word, i) => {
    const size = Math.round(14 + ((word.value - min) / (max - min || 1)) * 34);
    const label = xKey(word.key);
    const width = label.length * size * 0.6;
    if (x + width > plot.right && x > plot.left) {
      x = plot.left;
      y += rowHeight + 8;
      rowHeight = 0;
    }
    if (y + size > plot.bottom) return;
    rowHeight = Math.max(rowHeight, size);
    context.markCount += 1;
    context.marks.push(
      `<text class="mark" data-tooltip="${escapeXml(`${label}: ${formatNumber(word.value)}`)}" x="${round(x)}" y="${round(
        y + size
      )}" font-size="${size}" style="fill: ${palette.colors[i % palette.colors.length]}">${escapeXml(label)}</text>`
    );
    x += width + 12;
  });
}

// ---------------------------------------------------------------------------
// Annotations, legend, frame
// ---------------------------------------------------------------------------

function drawAnnotations(context: DrawContext, annotations: ChartAnnotation[], frame: CartesianFrame | null) {
  const { plot, palette } = context;
  const stroke = palette.annotation;

  for (const annotation of annotations) {
    const tag = `[${annotation.insight_id}]`;
    if (!frame) continue;
    if (annotation.kind === "point") {
      const x = frame.xOf(annotation.x);
      if (x === null) continue;
      const y = frame.yOf(annotation.y, annotation.measure);
      context.marks.push(
        `<circle class="annotation" cx="${round(x)}" cy="${round(y)}" r="7" fill="none" stroke="${stroke}" stroke-width="2"/>`
      );
      context.marks.push(text(x + 10, y - 10, tag, { anchor: "start", cls: "annotation-label", fill: stroke }));
    } else if (annotation.kind === "line") {
      const x1 = frame.xOf(annotation.from.x);
      const x2 = frame.xOf(annotation.to.x);
      if (x1 === null || x2 === null) continue;
      const y1 = frame.yOf(annotation.from.y, annotation.measure);
      const y2 = frame.yOf(annotation.to.y, annotation.measure);
      context.marks.push(
        `<line class="annotation" x1="${round(x1)}" y1="${round(y1)}" x2="${round(x2)}" y2="${round(
          y2
        )}" stroke="${stroke}" stroke-width="2" stroke-dasharray="6 4"/>`
      );
      context.marks.push(text(x2 + 6, y2 - 6, tag, { anchor: "start", cls: "annotation-label", fill: stroke }));
    } else if (annotation.kind === "vertical") {
      const x = frame.xOf(annotation.x);
      if (x === null) continue;
      context.marks.push(
        `<line class="annotation" x1="${round(x)}" y1="${plot.top}" x2="${round(x)}" y2="${plot.bottom}" stroke="${stroke}" stroke-width="1.5" stroke-dasharray="4 4"/>`
      );
      context.marks.push(text(x + 4, plot.top + 12, tag, { anchor: "start", cls: "annotation-label", fill: stroke }));
    }
  }
}

function drawNotes(context: DrawContext, annotations: ChartAnnotation[], width: number, height: number) {
  const maxChars = Math.max(10, Math.floor((width - 40) / 7));
  annotations.forEach((annotation, i) => {
    const y = height - 12 - (annotations.length - 1 - i) * NOTE_LINE_HEIGHT;
    context.marks.push(
      text(20, y, truncate(`${annotation.insight_id}. ${annotation.text}`, maxChars), {
        anchor: "start",
        cls: "note",
      })
    );
  });
}

function legendNames(spec: ChartSpec): string[] {
  if (spec.type === "pie" || spec.type === "funnel" || spec.type === "word_cloud") return [];
  const names = buildChartDataView(spec).series.map(seriesName);
  return names.length > 1 ? names : [];
}

function drawLegend(context: DrawContext, names: string[], width: number) {
  let x = Math.max(20, width / 2 - (names.length * 110) / 2);
  const y = PADDING.top - 6;
  names.forEach((name, i) => {
    const color = context.palette.colors[i % context.palette.colors.length];
    context.marks.push(`<rect x="${round(x)}" y="${y - 9}" width="12" height="12" fill="${color}"/>`);
    context.marks.push(text(x + 18, y + 1, truncate(name, 14), { anchor: "start", cls: "legend-text" }));
    x += 110;
  });
}

/** Draws the chart into a standalone SVG document. */
export function drawChartSvg(spec: ChartSpec, options: SvgChartOptions): SvgChart {
  const { width, height, fontFamily } = options;
  const palette = PALETTES[spec.theme];
  const annotations = spec.annotations ?? [];
  const legend = legendNames(spec);
  const rightPadding = spec.type === "dual_axis" ? 70 : PADDING.right;
  const top = PADDING.top + (legend.length > 0 ? LEGEND_HEIGHT : 0);
  const bottom = height - PADDING.bottom - annotations.length * NOTE_LINE_HEIGHT;

  const context: DrawContext = {
    spec,
    palette,
    plot: {
      left: PADDING.left,
      top,
      right: Math.max(PADDING.left + 10, width - rightPadding),
      bottom: Math.max(top + 10, bottom),
    },
    marks: [],
    markCount: 0,
  };

  let frame: CartesianFrame | null = null;
  switch (spec.type) {
    case "pie":
      drawPie(context);
      break;
    case "funnel":
      drawFunnel(context);
      break;
    case "radar":
      drawRadar(context);
      break;
    case "word_cloud":
      drawWordCloud(context);
      break;
    default:
      frame = drawCartesian(context);
  }

  drawAnnotations(context, annotations, frame);
  if (legend.length > 0) drawLegend(context, legend, width);
  drawNotes(context, annotations, width, height);

  const title = spec.title?.text ?? "";
  const svg = `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}">
  <style>
    text { font-family: ${escapeXml(fontFamily)}; fill: ${palette.text}; }
    .chart-title { font-size: 18px; font-weight: bold; }
    .axis-label, .legend-text { font-size: 12px; }
    .value-label { font-size: 11px; }
    .note, .annotation-label { font-size: 12px; }
    .grid-line { stroke: ${palette.grid}; stroke-width: 1; }
    .axis-line { stroke: ${palette.text}; stroke-width: 1; }
  </style>
  <rect width="100%" height="100%" fill="${palette.background}"/>
  ${title ? text(width / 2, 28, truncate(title, Math.floor(width / 10)), { cls: "chart-title" }) : ""}
  ${context.marks.join("\n  ")}
</svg>`;

  return { svg, width, height, background: palette.background, markCount: context.markCount };
}
