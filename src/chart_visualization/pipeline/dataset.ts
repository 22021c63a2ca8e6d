import type { DataRow, DatasetInput, FieldInfo, FieldType, Scalar, TableDataset } from "./contracts";
import { ChartPipelineError } from "./errors";

const TEMPORAL_PATTERN = /^\d{4}([-/]\d{1,2}){0,2}([ T]\d{1,2}:\d{2}(:\d{2})?)?$/;

function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

function toScalar(value: unknown): Scalar {
  if (isScalar(value)) return value;
  if (value === undefined) return null;
  if (typeof value === "number") return null;
  return JSON.stringify(value);
}

function isTableDataset(value: unknown): value is TableDataset {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  if (!("columns" in value) || !("rows" in value)) return false;
  const { columns, rows } = value;
  return (
    Array.isArray(columns) &&
    columns.every((column) => typeof column === "string") &&
    Array.isArray(rows) &&
    rows.every((row) => Array.isArray(row))
  );
}

function rowsFromTable(table: TableDataset): DataRow[] {
  return table.rows.map((cells) => {
    const row: DataRow = {};
    table.columns.forEach((column, index) => {
      row[column] = toScalar(cells[index]);
    });
    return row;
  });
}

function rowsFromArray(values: unknown[]): DataRow[] {
  return values.map((entry, index) => {
    if (!entry || typeof entry !== "object" || Array.isArray(entry)) {
      throw new ChartPipelineError({
        code: "REQUEST_INVALID",
        stage_name: "dataset",
        reason: `Dataset row ${index} is not an object.`,
      });
    }
    const row: DataRow = {};
    for (const [key, value] of Object.entries(entry)) {
      row[key] = toScalar(value);
    }
    return row;
  });
}

function parseDatasetValue(value: unknown): DataRow[] {
  if (Array.isArray(value)) return rowsFromArray(value);
  if (isTableDataset(value)) return rowsFromTable(value);
  throw new ChartPipelineError({
    code: "REQUEST_INVALID",
    stage_name: "dataset",
    reason: "Dataset must be an array of rows or a { columns, rows } table.",
  });
}

/** Normalizes any accepted dataset shape into frozen row objects. */
export function normalizeDataset(input: DatasetInput | unknown): readonly DataRow[] {
  let rows: DataRow[];
  if (typeof input === "string") {
    let parsed: unknown;
    try {
      parsed = JSON.parse(input);
    } catch (error) {
      throw new ChartPipelineError({
        code: "REQUEST_INVALID",
        stage_name: "dataset",
        reason: "Dataset string is not valid JSON.",
        cause: error,
      });
    }
    rows = parseDatasetValue(parsed);
  } else {
    rows = parseDatasetValue(input);
  }
  return Object.freeze(rows.map((row) => Object.freeze({ ...row })));
}

export function toNumber(value: Scalar | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.replace(/,/g, ""));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function inferFieldType(values: Scalar[]): FieldType {
  const present = values.filter((value) => value !== null && value !== "");
  if (present.length === 0) return "nominal";
  if (present.every((value) => typeof value === "number")) return "quantitative";
  if (present.every((value) => typeof value === "string" && TEMPORAL_PATTERN.test(value.trim()))) {
    return "temporal";
  }
  if (present.every((value) => toNumber(value) !== null && typeof value !== "boolean")) return "quantitative";
  return "nominal";
}

export function inferFields(rows: readonly DataRow[]): FieldInfo[] {
  const names: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!names.includes(key)) names.push(key);
    }
  }
  return names.map((name) => ({
    name,
    type: inferFieldType(rows.map((row) => row[name] ?? null)),
  }));
}
