/**
 * Decode command: model record -> dense coefficient arrays
 */

import { Command } from "commander";
import { decodeEntries } from "@coefstore/sdk";
import { parseNonNegativeInt } from "../lib/arg.js";
import { resolveFilePath } from "../lib/env.js";
import { loadFeatureIndex } from "../lib/inputs.js";
import { loadRecord } from "../lib/records.js";
import { printJson } from "../lib/render.js";
import { writeStderr } from "../lib/io.js";
import { withTiming } from "../lib/telemetry.js";

export interface DecodeCommandOptions {
  features: string;
  modelId?: string;
  dimension?: number;
  variances?: boolean;
  raw?: boolean;
}

export interface DecodeOutput {
  modelId: string;
  means: number[];
  variances?: number[];
}

export interface DecodeSummary {
  output: DecodeOutput;
  /** Entries skipped because the feature index does not know them */
  skipped: number;
}

/**
 * Decode a record against a feature index
 * Variances are decoded only when requested and present.
 */
export async function runDecode(
  recordPath: string,
  options: DecodeCommandOptions
): Promise<DecodeSummary> {
  const record = await loadRecord(resolveFilePath(recordPath), options.modelId);
  const features = await loadFeatureIndex(resolveFilePath(options.features));
  const decodeOptions = options.dimension === undefined ? {} : { dimension: options.dimension };

  const means = decodeEntries(record.means, features, decodeOptions);
  const output: DecodeOutput = {
    modelId: record.modelId,
    means: Array.from(means.vector.toArray()),
  };
  let skipped = means.skipped.length;

  if (options.variances && record.variances !== undefined) {
    const variances = decodeEntries(record.variances, features, decodeOptions);
    output.variances = Array.from(variances.vector.toArray());
    skipped += variances.skipped.length;
  }

  return { output, skipped };
}

/**
 * Create decode command
 */
export function createDecodeCommand(program: Command): Command {
  return new Command("decode")
    .description("Decode a model record into dense coefficient arrays")
    .argument("<record>", "Record file (.json, or .jsonl with --model-id)")
    .requiredOption("--features <file>", "Feature index file")
    .option("--model-id <id>", "Record to decode from a multi-record file")
    .option("--dimension <n>", "Output dimension (default: feature index size)", (val) =>
      parseNonNegativeInt(val, "--dimension")
    )
    .option("--variances", "Also decode variances when the record has them")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (recordPath: string, options: DecodeCommandOptions) => {
      await withTiming(
        "cli.decode",
        async () => {
          const opts = program.opts();
          const summary = await runDecode(recordPath, options);

          if (summary.skipped > 0 && !opts.quiet) {
            writeStderr(`Skipped ${summary.skipped} entries with unknown features\n`);
          }
          printJson(summary.output, { raw: options.raw });
          return summary;
        },
        (summary) => ({ skipped: summary.skipped })
      );
    });
}
