import {
  CHART_TYPES,
  isAlgorithmType,
  isChartType,
  type ChartAnnotation,
  type ChartAxis,
  type ChartFormatter,
  type ChartSpec,
  type DataRow,
  type InsightRecord,
  type InsightTarget,
  type Scalar,
} from "./contracts";
import {
  createUnresolvedFormatter,
  evaluateFormatterExpression,
  formatterSource,
  normalizeSource,
} from "./formatter_templates";
import { getDefaultLogger, type PipelineLogger } from "./logger";

export const FUNCTION_MARKER = "__FUNCTION__";

function isFormatter(value: unknown): value is ChartFormatter {
  return typeof value === "function";
}

const SPEC_KEY_ORDER: ReadonlyArray<keyof ChartSpec> = [
  "type",
  "data",
  "xField",
  "yField",
  "theme",
  "seriesField",
  "y2Field",
  "title",
  "width",
  "height",
  "animation",
  "label",
  "tooltip",
  "axes",
  "insights",
  "annotations",
];

// Key order is fixed so that equal specs always serialize to equal text.
function canonicalSpec(spec: ChartSpec): Record<string, unknown> {
  const ordered: Record<string, unknown> = {};
  for (const key of SPEC_KEY_ORDER) {
    if (spec[key] !== undefined) ordered[key] = spec[key];
  }
  return ordered;
}

export function serializeSpec(spec: ChartSpec, options?: { space?: number }): string {
  return JSON.stringify(
    canonicalSpec(spec),
    (_key, value: unknown) => {
      if (isFormatter(value)) {
        return `${FUNCTION_MARKER}${normalizeSource(formatterSource(value))}`;
      }
      return value;
    },
    options?.space
  );
}

/** Parses serialized text, reviving marked leaves into live formatters. Never throws on a bad leaf. */
export function parseSpecText(text: string, logger: PipelineLogger = getDefaultLogger()): unknown {
  return JSON.parse(text, (_key, value: unknown) => {
    if (typeof value === "string" && value.startsWith(FUNCTION_MARKER)) {
      const source = value.slice(FUNCTION_MARKER.length);
      try {
        return evaluateFormatterExpression(source);
      } catch (error) {
        logger.warn(
          `Formatter could not be rebuilt, using no-op: ${error instanceof Error ? error.message : String(error)}`
        );
        return createUnresolvedFormatter(source);
      }
    }
    return value;
  });
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function asScalar(value: unknown): Scalar {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number" && Number.isFinite(value)) return value;
  return null;
}

function asOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function asOptionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function asOptionalFormatter(value: unknown): ChartFormatter | undefined {
  return isFormatter(value) ? value : undefined;
}

function toRows(value: unknown): DataRow[] | null {
  if (!Array.isArray(value)) return null;
  const rows: DataRow[] = [];
  for (const entry of value) {
    const record = asRecord(entry);
    if (!record) return null;
    const row: DataRow = {};
    for (const [key, cell] of Object.entries(record)) {
      row[key] = asScalar(cell);
    }
    rows.push(row);
  }
  return rows;
}

function toCoordinate(value: unknown): { x: Scalar; y: number } | null {
  const record = asRecord(value);
  if (!record || typeof record.y !== "number") return null;
  return { x: asScalar(record.x), y: record.y };
}

export function toInsightTarget(value: unknown): InsightTarget | undefined {
  const record = asRecord(value);
  if (!record) return undefined;
  const series = asOptionalString(record.series);
  const measure = asOptionalString(record.measure);
  if (record.kind === "point" && typeof record.y === "number") {
    return { kind: "point", x: asScalar(record.x), y: record.y, series, measure };
  }
  if (record.kind === "line") {
    const from = toCoordinate(record.from);
    const to = toCoordinate(record.to);
    if (from && to) return { kind: "line", from, to, series, measure };
  }
  if (record.kind === "vertical") return { kind: "vertical", x: asScalar(record.x) };
  if (record.kind === "note") return { kind: "note" };
  return undefined;
}

function toEvidence(value: unknown): Record<string, number> | undefined {
  const record = asRecord(value);
  if (!record) return undefined;
  const evidence: Record<string, number> = {};
  for (const [key, entry] of Object.entries(record)) {
    if (typeof entry === "number" && Number.isFinite(entry)) evidence[key] = entry;
  }
  return evidence;
}

function toInsightRecords(value: unknown): InsightRecord[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value
    .map((entry): InsightRecord | null => {
      const record = asRecord(entry);
      if (!record || typeof record.id !== "number" || !isAlgorithmType(record.type)) return null;
      if (typeof record.content !== "string") return null;
      return {
        id: record.id,
        type: record.type,
        content: record.content,
        evidence: toEvidence(record.evidence),
        target: toInsightTarget(record.target),
      };
    })
    .filter((record): record is InsightRecord => record !== null);
}

function toAnnotations(value: unknown): ChartAnnotation[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value
    .map((entry): ChartAnnotation | null => {
      const record = asRecord(entry);
      if (!record || typeof record.insight_id !== "number" || typeof record.text !== "string") return null;
      const target = toInsightTarget(record);
      if (!target) return null;
      return { ...target, insight_id: record.insight_id, text: record.text };
    })
    .filter((annotation): annotation is ChartAnnotation => annotation !== null);
}

function toAxes(value: unknown): ChartAxis[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value
    .map((entry): ChartAxis | null => {
      const record = asRecord(entry);
      if (!record) return null;
      const orient = record.orient;
      if (orient !== "left" && orient !== "right" && orient !== "bottom") return null;
      const label = asRecord(record.label);
      return {
        orient,
        field: asOptionalString(record.field),
        title: asOptionalString(record.title),
        label: label ? { formatter: asOptionalFormatter(label.formatter) } : undefined,
      };
    })
    .filter((axis): axis is ChartAxis => axis !== null);
}

/** Narrows a parsed value into a ChartSpec, or null when required parts are missing. */
export function toChartSpec(value: unknown): ChartSpec | null {
  const record = asRecord(value);
  if (!record || !isChartType(record.type)) return null;
  const data = asRecord(record.data);
  const values = data ? toRows(data.values) : null;
  if (!data || !values) return null;
  if (typeof record.xField !== "string" || typeof record.yField !== "string") return null;

  const title = asRecord(record.title);
  const label = asRecord(record.label);
  const tooltip = asRecord(record.tooltip);

  const spec: ChartSpec = {
    type: record.type,
    data: { id: typeof data.id === "string" ? data.id : "data", values },
    xField: record.xField,
    yField: record.yField,
    theme: record.theme === "dark" ? "dark" : "light",
  };

  const seriesField = asOptionalString(record.seriesField);
  if (seriesField) spec.seriesField = seriesField;
  const y2Field = asOptionalString(record.y2Field);
  if (y2Field) spec.y2Field = y2Field;
  if (title && typeof title.text === "string") spec.title = { text: title.text };
  const width = asOptionalNumber(record.width);
  if (width !== undefined) spec.width = width;
  const height = asOptionalNumber(record.height);
  if (height !== undefined) spec.height = height;
  if (typeof record.animation === "boolean") spec.animation = record.animation;
  if (label) spec.label = { visible: label.visible === true, formatter: asOptionalFormatter(label.formatter) };
  if (tooltip) spec.tooltip = { formatter: asOptionalFormatter(tooltip.formatter) };
  const axes = toAxes(record.axes);
  if (axes) spec.axes = axes;
  const insights = toInsightRecords(record.insights);
  if (insights) spec.insights = insights;
  const annotations = toAnnotations(record.annotations);
  if (annotations) spec.annotations = annotations;

  return spec;
}

export function deserializeSpec(text: string, logger?: PipelineLogger): ChartSpec {
  const spec = toChartSpec(parseSpecText(text, logger));
  if (!spec) {
    throw new Error(`Serialized text is not a chart spec (expected type in ${CHART_TYPES.join(", ")}).`);
  }
  return spec;
}
