/**
 * List command: summary of every record in one or more files
 */

import { Command } from "commander";
import { readRecordFiles } from "@coefstore/sdk";
import { resolveFilePath } from "../lib/env.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export interface RecordSummary {
  modelId: string;
  means: number;
  /** null when the record has no variances */
  variances: number | null;
}

/**
 * Summarise the records of all files, in path order
 */
export async function runList(paths: string[]): Promise<RecordSummary[]> {
  const records = await readRecordFiles(paths.map(resolveFilePath));
  return records.map((record) => ({
    modelId: record.modelId,
    means: record.means.length,
    variances: record.variances === undefined ? null : record.variances.length,
  }));
}

/**
 * Create list command
 */
export function createListCommand(): Command {
  return new Command("list")
    .description("Summarise the records stored in one or more files")
    .argument("<paths...>", "Record files (.json or .jsonl)")
    .option("--json", "Output as JSON array")
    .action(async (paths: string[], options: { json?: boolean }) => {
      await withTiming(
        "cli.list",
        async () => {
          const summaries = await runList(paths);

          if (options.json) {
            printJson(summaries);
          } else {
            printLines(
              summaries.map((s) => `${s.modelId}\t${s.means}\t${s.variances ?? "-"}`)
            );
          }
          return summaries;
        },
        (summaries) => ({ records: summaries.length })
      );
    });
}
