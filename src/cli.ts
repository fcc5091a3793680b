/**
 * Command-line front end: run one member assessment from a JSON parameter file.
 *
 *   bridge-assess <input.json> [--json]
 */
import fs from "node:fs";
import path from "node:path";
import { isRecord } from "./shared.js";
import { createBridgeAssessmentToolDefinition } from "./tools/index.js";

const USAGE = "Usage: bridge-assess <input.json> [--json]";

export interface CliOptions {
  inputPath: string;
  json: boolean;
}

export function parseArgs(argv: string[]): CliOptions | null {
  const json = argv.includes("--json");
  const positional = argv.filter((arg) => !arg.startsWith("--"));
  const inputPath = positional[0];
  if (!inputPath || positional.length > 1) return null;
  return { inputPath, json };
}

/** Returns the process exit code. */
export async function run(argv: string[]): Promise<number> {
  const options = parseArgs(argv);
  if (!options) {
    console.error(USAGE);
    return 2;
  }

  const filePath = path.resolve(options.inputPath);
  let params: unknown;
  try {
    params = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    console.error(`\x1b[31mError: cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}\x1b[0m`);
    return 2;
  }
  if (!isRecord(params)) {
    console.error(`\x1b[31mError: ${filePath} must contain a JSON object of assessment parameters.\x1b[0m`);
    return 2;
  }

  const tool = createBridgeAssessmentToolDefinition();
  const { content, details } = await tool.execute("cli", params);

  if (options.json) {
    console.log(JSON.stringify(details.record, null, 2));
  } else {
    const summary = content[0]?.text ?? "";
    if (details.ok) console.log(summary);
    else console.error(`\x1b[31m${summary}\x1b[0m`);
  }
  return details.ok ? 0 : 1;
}
