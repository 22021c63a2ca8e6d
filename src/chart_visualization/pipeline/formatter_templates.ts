import { z } from "zod";

import type { ChartFormatter, DataRow, Scalar } from "./contracts";
import { toNumber } from "./dataset";

type TemplateEntry = {
  instantiate: (rawParams: unknown) => { formatter: ChartFormatter; params: Record<string, unknown> };
};

function defineTemplate<P extends Record<string, unknown>>(
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  build: (params: P) => ChartFormatter
): TemplateEntry {
  return {
    instantiate: (rawParams) => {
      const params = schema.parse(rawParams ?? {});
      return { formatter: build(params), params };
    },
  };
}

function groupDigits(value: number, digits: number, separator: string) {
  const [whole, fraction] = Math.abs(value).toFixed(digits).split(".");
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, separator);
  const sign = value < 0 ? "-" : "";
  return fraction ? `${sign}${grouped}.${fraction}` : `${sign}${grouped}`;
}

function asText(value: Scalar) {
  return value === null ? "" : String(value);
}

const TEMPLATES: Record<string, TemplateEntry> = {
  identity: defineTemplate(z.object({}).strict(), () => (value) => asText(value)),
  fixed: defineTemplate(
    z.object({ digits: z.number().int().min(0).max(10).default(2) }).strict(),
    ({ digits }) =>
      (value) => {
        const num = toNumber(value);
        return num === null ? asText(value) : num.toFixed(digits);
      }
  ),
  percent: defineTemplate(
    z.object({ digits: z.number().int().min(0).max(10).default(0), scale: z.boolean().default(true) }).strict(),
    ({ digits, scale }) =>
      (value) => {
        const num = toNumber(value);
        return num === null ? asText(value) : `${(scale ? num * 100 : num).toFixed(digits)}%`;
      }
  ),
  thousands: defineTemplate(
    z.object({ digits: z.number().int().min(0).max(10).default(0), separator: z.string().max(3).default(",") }).strict(),
    ({ digits, separator }) =>
      (value) => {
        const num = toNumber(value);
        return num === null ? asText(value) : groupDigits(num, digits, separator);
      }
  ),
  currency: defineTemplate(
    z.object({ symbol: z.string().max(4).default("$"), digits: z.number().int().min(0).max(10).default(2) }).strict(),
    ({ symbol, digits }) =>
      (value) => {
        const num = toNumber(value);
        if (num === null) return asText(value);
        const body = groupDigits(Math.abs(num), digits, ",");
        return num < 0 ? `-${symbol}${body}` : `${symbol}${body}`;
      }
  ),
  compact: defineTemplate(
    z.object({ digits: z.number().int().min(0).max(6).default(1) }).strict(),
    ({ digits }) =>
      (value) => {
        const num = toNumber(value);
        if (num === null) return asText(value);
        const abs = Math.abs(num);
        const units: Array<[number, string]> = [
          [1e9, "B"],
          [1e6, "M"],
          [1e3, "K"],
        ];
        for (const [size, suffix] of units) {
          if (abs >= size) return `${Number((num / size).toFixed(digits))}${suffix}`;
        }
        return `${Number(num.toFixed(digits))}`;
      }
  ),
  affix: defineTemplate(
    z.object({ prefix: z.string().max(40).default(""), suffix: z.string().max(40).default("") }).strict(),
    ({ prefix, suffix }) =>
      (value) =>
        `${prefix}${asText(value)}${suffix}`
  ),
  field_value: defineTemplate(
    z
      .object({
        fields: z.array(z.string().min(1)).min(1).max(8),
        separator: z.string().max(8).default(", "),
      })
      .strict(),
    ({ fields, separator }) =>
      (value: Scalar, datum?: DataRow) => {
        if (!datum) return asText(value);
        return fields.map((field) => `${field}: ${asText(datum[field] ?? null)}`).join(separator);
      }
  ),
};

export const FORMATTER_TEMPLATE_NAMES = Object.keys(TEMPLATES);

const formatterSources = new WeakMap<ChartFormatter, string>();

const EXPRESSION_PATTERN = /^([a-z_]+)\((.*)\)$/s;

export function normalizeSource(source: string): string {
  return source.replace(/(\r\n|\n|\r)/gm, "").replace(/\s+/g, " ").trim();
}

export function isFormatterTemplate(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(TEMPLATES, name);
}

/** Builds a formatter from a named template; throws on unknown names or bad params. */
export function createFormatter(name: string, params?: Record<string, unknown>): ChartFormatter {
  if (!isFormatterTemplate(name)) {
    throw new Error(`Unknown formatter template: ${name}`);
  }
  const { formatter, params: parsed } = TEMPLATES[name].instantiate(params);
  const args = Object.keys(parsed).length > 0 ? JSON.stringify(parsed) : "";
  formatterSources.set(formatter, `${name}(${args})`);
  return formatter;
}

export function formatterSource(formatter: ChartFormatter): string {
  return formatterSources.get(formatter) ?? normalizeSource(formatter.toString());
}

/**
 * Evaluates a `template(params)` expression against the template registry.
 * Throws when the expression does not name a known template.
 */
export function evaluateFormatterExpression(source: string): ChartFormatter {
  const match = EXPRESSION_PATTERN.exec(source.trim());
  if (!match) {
    throw new Error(`Not a formatter expression: ${source.slice(0, 80)}`);
  }
  const [, name, rawArgs] = match;
  const args: unknown = rawArgs.trim().length > 0 ? JSON.parse(rawArgs) : {};
  if (!args || typeof args !== "object" || Array.isArray(args)) {
    throw new Error(`Formatter arguments must be an object: ${rawArgs.slice(0, 80)}`);
  }
  return createFormatter(name, Object.fromEntries(Object.entries(args)));
}

/** No-op formatter that keeps the source it replaced so re-serialization is stable. */
export function createUnresolvedFormatter(source: string): ChartFormatter {
  const formatter: ChartFormatter = () => "";
  formatterSources.set(formatter, normalizeSource(source));
  return formatter;
}
