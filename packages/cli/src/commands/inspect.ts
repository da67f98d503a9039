/**
 * Inspect command: ranked listing of a record's means
 */

import { Command } from "commander";
import type { NameTermValue } from "@coefstore/sdk";
import { parseNonNegativeInt } from "../lib/arg.js";
import { resolveFilePath } from "../lib/env.js";
import { loadRecord } from "../lib/records.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export interface InspectCommandOptions {
  modelId?: string;
  limit?: number;
  json?: boolean;
}

/**
 * Mean entries of a record in stored (magnitude) order
 */
export async function runInspect(
  recordPath: string,
  options: InspectCommandOptions
): Promise<NameTermValue[]> {
  const record = await loadRecord(resolveFilePath(recordPath), options.modelId);
  return options.limit === undefined ? record.means : record.means.slice(0, options.limit);
}

/**
 * One tab-separated line per entry
 */
export function formatEntries(entries: readonly NameTermValue[]): string[] {
  return entries.map((entry) => `${entry.name}\t${entry.term}\t${entry.value}`);
}

/**
 * Create inspect command
 */
export function createInspectCommand(): Command {
  return new Command("inspect")
    .description("List the mean coefficients of a record, largest magnitude first")
    .argument("<record>", "Record file (.json, or .jsonl with --model-id)")
    .option("--model-id <id>", "Record to inspect from a multi-record file")
    .option("--limit <n>", "Maximum number of entries", (val) =>
      parseNonNegativeInt(val, "--limit")
    )
    .option("--json", "Output as JSON array")
    .action(async (recordPath: string, options: InspectCommandOptions) => {
      await withTiming("cli.inspect", async () => {
        const entries = await runInspect(recordPath, options);

        if (options.json) {
          printJson(entries);
        } else {
          printLines(formatEntries(entries));
        }
      });
    });
}
