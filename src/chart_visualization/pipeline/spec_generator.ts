import fs from "node:fs";
import { fileURLToPath } from "node:url";

import {
  isChartType,
  type ChartAxis,
  type ChartFormatter,
  type ChartSpec,
  type ChartTheme,
  type ChartType,
  type DataRow,
  type FieldInfo,
  type Language,
  type LlmConfig,
} from "./contracts";
import { inferFields, normalizeDataset } from "./dataset";
import { ChartPipelineError, type ChartPipelineErrorCode } from "./errors";
import { createFormatter } from "./formatter_templates";
import { getDefaultLogger, type PipelineLogger } from "./logger";
import { validateChartProposal } from "./schemas";

const SAMPLE_ROWS = 20;
const CARTESIAN_TYPES: readonly ChartType[] = ["bar", "line", "area", "scatter", "dual_axis"];
const LABELLED_BY_DEFAULT: readonly ChartType[] = ["pie", "funnel"];

export type ProposalRequest = {
  prompt: string;
  language: Language;
  fields: FieldInfo[];
  sample: DataRow[];
  allow_data_rewrite: boolean;
};

/** Opaque chart-design capability: returns the model's raw answer for one request. */
export interface ChartSpecGenerator {
  propose(request: ProposalRequest): Promise<string>;
}

export type ChatMessage = { role: "system" | "user"; content: string };

export type ChatCompletionFn = (params: { model: string; messages: ChatMessage[] }) => Promise<string>;

function openAiCompletion(llm: LlmConfig): ChatCompletionFn {
  return async ({ model, messages }) => {
    const { default: OpenAI } = await import("openai");
    const client = new OpenAI({
      apiKey: llm.api_key,
      baseURL: llm.base_url,
      defaultHeaders: { "api-key": llm.api_key },
    });
    const completion = await client.chat.completions.create({
      model,
      messages: messages.map((message) =>
        message.role === "system"
          ? { role: "system" as const, content: message.content }
          : { role: "user" as const, content: message.content }
      ),
      temperature: 0,
      response_format: { type: "json_object" },
    });
    return completion.choices[0]?.message?.content ?? "";
  };
}

let cachedPrompt: string | null = null;

export function loadGeneratorPrompt(): string {
  if (!cachedPrompt) {
    cachedPrompt = fs.readFileSync(fileURLToPath(new URL("./prompts/spec_generator.md", import.meta.url)), "utf8");
  }
  return cachedPrompt;
}

/** OpenAI-compatible `/chat/completions` endpoint; the key goes out as bearer token and `api-key`. */
export class OpenAiChartSpecGenerator implements ChartSpecGenerator {
  private readonly complete: ChatCompletionFn;

  constructor(
    private readonly llm: LlmConfig,
    options?: { complete?: ChatCompletionFn }
  ) {
    this.complete = options?.complete ?? openAiCompletion(llm);
  }

  async propose(request: ProposalRequest): Promise<string> {
    return this.complete({
      model: this.llm.model,
      messages: [
        { role: "system", content: loadGeneratorPrompt() },
        { role: "user", content: JSON.stringify(request) },
      ],
    });
  }
}

export type GenerateSpecOptions = {
  language?: Language;
  enableDataQuery?: boolean;
  theme?: ChartTheme;
  logger?: PipelineLogger;
};

export type GenerateSpecResult =
  | { ok: true; spec: ChartSpec; chartType: ChartType }
  | { ok: false; code: ChartPipelineErrorCode; error: string };

type ChartProposal = {
  chart_type: ChartType;
  x_field: string;
  y_field: string;
  series_field?: string;
  y2_field?: string;
  show_labels?: boolean;
  value_format?: { template: string; params?: Record<string, unknown> };
  data?: unknown[];
};

function fail(code: ChartPipelineErrorCode, reason: string, details: string[] = []): never {
  throw new ChartPipelineError({ code, stage_name: "generate_spec", reason, details });
}

/** Pulls the JSON object out of a model answer that may wrap it in prose or a code fence. */
export function extractJsonObject(raw: string): unknown {
  const text = raw.trim();
  if (!text) return null;
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    fail("GENERATION_FAILED", "Model answer contained no JSON object.", [text.slice(0, 200)]);
  }
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return fail("GENERATION_FAILED", "Model answer was not valid JSON.", [text.slice(0, 200)]);
  }
}

function optionalText(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function toProposal(payload: unknown): ChartProposal {
  if (!payload || typeof payload !== "object" || Object.keys(payload).length === 0) {
    fail("SPEC_EMPTY", "Model returned an empty chart specification.");
  }
  const validation = validateChartProposal(payload);
  if (!validation.ok) {
    fail("SPEC_INVALID", "Model chart proposal failed validation.", validation.errors);
  }
  const record = Object.fromEntries(Object.entries(payload));
  if (!isChartType(record.chart_type) || typeof record.x_field !== "string" || typeof record.y_field !== "string") {
    return fail("SPEC_INVALID", "Model chart proposal is missing its chart type or fields.");
  }
  const format =
    record.value_format && typeof record.value_format === "object"
      ? Object.fromEntries(Object.entries(record.value_format))
      : null;
  const params =
    format?.params && typeof format.params === "object" ? Object.fromEntries(Object.entries(format.params)) : undefined;

  return {
    chart_type: record.chart_type,
    x_field: record.x_field,
    y_field: record.y_field,
    series_field: optionalText(record.series_field),
    y2_field: optionalText(record.y2_field),
    show_labels: typeof record.show_labels === "boolean" ? record.show_labels : undefined,
    value_format: format && typeof format.template === "string" ? { template: format.template, params } : undefined,
    data: Array.isArray(record.data) ? record.data : undefined,
  };
}

function checkFields(proposal: ChartProposal, fields: FieldInfo[]) {
  const byName = new Map(fields.map((field) => [field.name, field.type]));
  const referenced = [proposal.x_field, proposal.y_field, proposal.series_field, proposal.y2_field].filter(
    (name): name is string => name !== undefined
  );
  const missing = referenced.filter((name) => !byName.has(name));
  if (missing.length > 0) {
    fail("SPEC_INVALID", "Chart references fields that are not in the dataset.", missing);
  }
  for (const name of [proposal.y_field, proposal.y2_field]) {
    if (name !== undefined && byName.get(name) !== "quantitative") {
      fail("SPEC_INVALID", `Value field ${name} is not numeric.`);
    }
  }
  if (proposal.chart_type === "dual_axis" && !proposal.y2_field) {
    fail("SPEC_INVALID", "dual_axis charts need a y2_field.");
  }
}

function buildSpec(proposal: ChartProposal, rows: DataRow[], theme: ChartTheme): ChartSpec {
  const spec: ChartSpec = {
    type: proposal.chart_type,
    data: { id: "data", values: rows },
    xField: proposal.x_field,
    yField: proposal.y_field,
    theme,
  };
  if (proposal.series_field) spec.seriesField = proposal.series_field;
  if (proposal.chart_type === "dual_axis" && proposal.y2_field) spec.y2Field = proposal.y2_field;

  let valueFormatter: ChartFormatter | undefined;
  if (proposal.value_format) {
    try {
      valueFormatter = createFormatter(proposal.value_format.template, proposal.value_format.params);
    } catch (error) {
      fail("SPEC_INVALID", "Model asked for an unusable value format.", [
        error instanceof Error ? error.message : String(error),
      ]);
    }
  }

  const showLabels = proposal.show_labels ?? LABELLED_BY_DEFAULT.includes(proposal.chart_type);
  if (showLabels || valueFormatter) {
    spec.label = { visible: showLabels, formatter: valueFormatter };
  }

  const tooltipFields = [spec.xField, spec.seriesField, spec.yField, spec.y2Field].filter(
    (name): name is string => name !== undefined
  );
  spec.tooltip = { formatter: createFormatter("field_value", { fields: tooltipFields }) };

  if (CARTESIAN_TYPES.includes(proposal.chart_type)) {
    const axes: ChartAxis[] = [
      { orient: "bottom", field: spec.xField, title: spec.xField },
      { orient: "left", field: spec.yField, title: spec.yField, label: { formatter: valueFormatter } },
    ];
    if (spec.y2Field) axes.push({ orient: "right", field: spec.y2Field, title: spec.y2Field });
    spec.axes = axes;
  }
  return spec;
}

/**
 * Asks the generator for a chart design and turns it into a ChartSpec over the dataset.
 * Failures come back as `{ ok: false }`; nothing here throws.
 */
export async function generateChartSpec(
  generator: ChartSpecGenerator,
  input: { prompt: string; dataset: readonly DataRow[]; options?: GenerateSpecOptions }
): Promise<GenerateSpecResult> {
  const options = input.options ?? {};
  const logger = options.logger ?? getDefaultLogger();
  const stop = logger.startTimer("generate_spec");

  try {
    if (input.dataset.length === 0) {
      fail("SPEC_EMPTY", "Dataset has no rows to chart.");
    }
    const fields = inferFields(input.dataset);
    const raw = await generator.propose({
      prompt: input.prompt,
      language: options.language ?? "en",
      fields,
      sample: input.dataset.slice(0, SAMPLE_ROWS),
      allow_data_rewrite: options.enableDataQuery === true,
    });
    const proposal = toProposal(extractJsonObject(raw));

    let rows = input.dataset.map((row) => ({ ...row }));
    let rowFields = fields;
    if (options.enableDataQuery && proposal.data && proposal.data.length > 0) {
      rows = normalizeDataset(proposal.data).map((row) => ({ ...row }));
      rowFields = inferFields(rows);
      logger.info(`generator rewrote dataset to ${rows.length} rows`);
    }
    checkFields(proposal, rowFields);

    const spec = buildSpec(proposal, rows, options.theme ?? "light");
    logger.info(`generated ${spec.type} spec over ${rows.length} rows`);
    return { ok: true, spec, chartType: spec.type };
  } catch (error) {
    const code = error instanceof ChartPipelineError ? error.code : "GENERATION_FAILED";
    const base = error instanceof Error ? error.message : String(error);
    const details = error instanceof ChartPipelineError && error.details.length > 0 ? ` (${error.details.join("; ")})` : "";
    logger.warn(`chart spec generation failed: ${base}${details}`);
    return { ok: false, code, error: `${base}${details}` };
  } finally {
    stop();
  }
}
