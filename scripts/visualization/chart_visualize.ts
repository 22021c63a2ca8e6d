import "dotenv/config";

import fs from "node:fs";

import minimist from "minimist";

import { getChartVizConfig } from "../../src/chart_visualization/pipeline/chart_config";
import { createPipelineLogger } from "../../src/chart_visualization/pipeline/logger";
import { runChartRequest } from "../../src/chart_visualization/pipeline/process_boundary";

type Args = {
  input?: string;
};

function parseArgs(argv: string[]): Args {
  const parsed = minimist(argv, {
    string: ["input"],
    alias: { i: "input" },
  });
  const input = typeof parsed.input === "string" && parsed.input.length > 0 ? parsed.input : undefined;
  return { input };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = getChartVizConfig();
  const logger = createPipelineLogger({ level: config.log_level });

  const text = args.input ? fs.readFileSync(args.input, "utf8") : await readStdin();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    process.stdout.write(`${JSON.stringify({ error: "Request is not valid JSON.", error_code: "REQUEST_INVALID" })}\n`);
    return;
  }

  const result = await runChartRequest(raw, { config, logger });
  process.stdout.write(`${JSON.stringify(result)}\n`);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.stdout.write(`${JSON.stringify({ error: message })}\n`);
  process.exit(1);
});
