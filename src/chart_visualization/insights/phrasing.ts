import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import type { Language } from "../pipeline/contracts";
import type { SeriesData } from "./series";

const PhraseTableSchema = z.object({
  en: z.record(z.string()),
  zh: z.record(z.string()),
});

type PhraseTable = z.infer<typeof PhraseTableSchema>;

let cachedTable: PhraseTable | null = null;

function loadPhraseTable(): PhraseTable {
  if (!cachedTable) {
    const file = fileURLToPath(new URL("./phrases.json", import.meta.url));
    cachedTable = PhraseTableSchema.parse(JSON.parse(fs.readFileSync(file, "utf8")));
  }
  return cachedTable;
}

export function phrase(language: Language, key: string, vars: Record<string, string> = {}): string {
  const template = loadPhraseTable()[language][key];
  if (template === undefined) {
    throw new Error(`Missing ${language} phrase: ${key}`);
  }
  return template.replace(/\{(\w+)\}/g, (match, name: string) => vars[name] ?? match);
}

export function seriesSuffix(language: Language, series: SeriesData): string {
  return series.grouped ? phrase(language, "series_suffix", { series: series.name }) : "";
}

export function seriesLabel(series: SeriesData): string {
  return series.grouped ? series.name : series.measure;
}
