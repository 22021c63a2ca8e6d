import Ajv, { type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

import { CHART_TYPES, LANGUAGES, OUTPUT_TYPES } from "./contracts";

const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
addFormats(ajv);

const scalarSchema = { type: ["string", "number", "boolean", "null"] } as const;

const datasetSchema = {
  anyOf: [
    { type: "string" },
    { type: "array", items: { type: "object" } },
    {
      type: "object",
      required: ["columns", "rows"],
      properties: {
        columns: { type: "array", items: { type: "string" } },
        rows: { type: "array", items: { type: "array", items: scalarSchema } },
      },
    },
  ],
} as const;

export const chartRequestSchema = {
  type: "object",
  required: ["directory", "file_name"],
  properties: {
    llm_config: {
      type: "object",
      required: ["base_url", "model", "api_key"],
      properties: {
        base_url: { type: "string", format: "uri" },
        model: { type: "string", minLength: 1 },
        api_key: { type: "string" },
      },
    },
    width: { type: "integer", minimum: 1, maximum: 10000 },
    height: { type: "integer", minimum: 1, maximum: 10000 },
    dataset: datasetSchema,
    directory: { type: "string", minLength: 1 },
    user_prompt: { type: "string" },
    output_type: { type: "string", enum: [...OUTPUT_TYPES] },
    file_name: { type: "string", minLength: 1, pattern: "^[^/\\\\]+$" },
    task_type: { type: "string" },
    insights_id: { type: "array", items: { type: "integer" } },
    language: { type: "string", enum: [...LANGUAGES] },
  },
} as const;

export const chartProposalSchema = {
  type: "object",
  required: ["chart_type", "x_field", "y_field"],
  properties: {
    chart_type: { type: "string", enum: [...CHART_TYPES] },
    x_field: { type: "string", minLength: 1 },
    y_field: { type: "string", minLength: 1 },
    series_field: { type: ["string", "null"] },
    y2_field: { type: ["string", "null"] },
    show_labels: { type: "boolean" },
    value_format: {
      type: "object",
      required: ["template"],
      properties: {
        template: { type: "string", minLength: 1 },
        params: { type: "object" },
      },
    },
    data: { type: "array", items: { type: "object" } },
  },
} as const;

const requestValidator: ValidateFunction = ajv.compile(chartRequestSchema);
const proposalValidator: ValidateFunction = ajv.compile(chartProposalSchema);

function validateWith(validator: ValidateFunction, payload: unknown): { ok: boolean; errors: string[] } {
  if (validator(payload)) {
    return { ok: true, errors: [] };
  }
  const errors = (validator.errors ?? []).map((error) => {
    const instancePath = error.instancePath || "root";
    return `${instancePath} ${error.message ?? "invalid"}`;
  });
  return { ok: false, errors };
}

export function validateChartRequest(payload: unknown) {
  return validateWith(requestValidator, payload);
}

export function validateChartProposal(payload: unknown) {
  return validateWith(proposalValidator, payload);
}
