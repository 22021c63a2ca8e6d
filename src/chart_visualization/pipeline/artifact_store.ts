import fs from "node:fs";
import path from "node:path";

import type { RenderedChart } from "../render/render_chart";
import type { ArtifactExtension, ChartSpec } from "./contracts";
import { ChartPipelineError } from "./errors";
import type { PipelineLogger } from "./logger";
import { deserializeSpec, serializeSpec } from "./spec_serializer";

export const VISUALIZATION_DIR = "visualization";
export const COLLISION_SUFFIX = "_new";

export type InsightSummary = { insight_path?: string; insight_md?: string };

export function visualizationDir(directory: string): string {
  return path.resolve(directory, VISUALIZATION_DIR);
}

export function ensureVisualizationDir(directory: string): string {
  const dir = visualizationDir(directory);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new ChartPipelineError({
      code: "PERSISTENCE_FAILED",
      stage_name: "persist",
      reason: `Could not create ${dir}`,
      cause: error,
    });
  }
  return dir;
}

/**
 * Path for `<name>.<ext>` under the visualization directory. Outside updates the
 * name grows `_new` suffixes until it no longer collides with an existing file.
 * Each extension is probed on its own.
 */
export function resolveArtifactPath(
  directory: string,
  fileName: string,
  ext: ArtifactExtension,
  isUpdate = false
): string {
  const dir = visualizationDir(directory);
  let name = fileName;
  let candidate = path.join(dir, `${name}.${ext}`);
  if (isUpdate) return candidate;
  while (fs.existsSync(candidate)) {
    name = `${name}${COLLISION_SUFFIX}`;
    candidate = path.join(dir, `${name}.${ext}`);
  }
  return candidate;
}

function writeFile(filePath: string, payload: string | Buffer) {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, payload);
  } catch (error) {
    throw new ChartPipelineError({
      code: "PERSISTENCE_FAILED",
      stage_name: "persist",
      reason: `Could not write ${filePath}`,
      cause: error,
    });
  }
}

export function writeSpecArtifact(filePath: string, spec: ChartSpec) {
  writeFile(filePath, serializeSpec(spec, { space: 2 }));
}

export function readSpecArtifact(filePath: string, logger?: PipelineLogger): ChartSpec {
  if (!fs.existsSync(filePath)) {
    throw new ChartPipelineError({
      code: "UPDATE_TARGET_MISSING",
      stage_name: "load_spec",
      reason: `No stored chart spec at ${filePath}`,
    });
  }
  try {
    return deserializeSpec(fs.readFileSync(filePath, "utf8"), logger);
  } catch (error) {
    throw new ChartPipelineError({
      code: "SPEC_INVALID",
      stage_name: "load_spec",
      reason: `Stored chart spec at ${filePath} could not be read`,
      details: [error instanceof Error ? error.message : String(error)],
      cause: error,
    });
  }
}

export function writeRenderedArtifact(filePath: string, rendered: RenderedChart) {
  writeFile(filePath, rendered.kind === "png" ? rendered.buffer : rendered.html);
}

export function formatInsightMarkdown(title: string, insights: readonly string[]): string {
  return `## ${title} Insights${insights.map((insight, index) => `\n${index + 1}. ${insight}`).join("")}`;
}

/** Writes the markdown summary beside the chart; nothing is written for an empty list. */
export function writeInsightSummary(filePath: string, title: string, insights: readonly string[]): InsightSummary {
  if (insights.length === 0) return {};
  const markdown = formatInsightMarkdown(title, insights);
  writeFile(filePath, markdown);
  return { insight_path: filePath, insight_md: markdown };
}
