/**
 * Encode command: coefficients file -> model record
 */

import { Command } from "commander";
import { encodeModel, serializeModelRecord, writeModelRecord } from "@coefstore/sdk";
import type { ModelRecord } from "@coefstore/sdk";
import { parseThreshold } from "../lib/arg.js";
import { resolveEncodeThreshold, resolveFilePath } from "../lib/env.js";
import { loadCoefficients, loadFeatureIndex } from "../lib/inputs.js";
import { writeStdout } from "../lib/io.js";
import { withTiming } from "../lib/telemetry.js";

export interface EncodeCommandOptions {
  features: string;
  modelId: string;
  threshold?: number;
  lossFunction?: string;
  out?: string;
}

/**
 * Encode a coefficients file, writing the record to `out` when given
 */
export async function runEncode(
  coefficientsPath: string,
  options: EncodeCommandOptions
): Promise<ModelRecord> {
  const coefficients = await loadCoefficients(resolveFilePath(coefficientsPath));
  const features = await loadFeatureIndex(resolveFilePath(options.features));

  const threshold = resolveEncodeThreshold(options.threshold);
  const record = encodeModel(coefficients, options.modelId, features, {
    ...(threshold === undefined ? {} : { threshold }),
    ...(options.lossFunction === undefined ? {} : { lossFunction: options.lossFunction }),
  });

  if (options.out !== undefined) {
    await writeModelRecord(resolveFilePath(options.out), record);
  }

  return record;
}

/**
 * Create encode command
 */
export function createEncodeCommand(program: Command): Command {
  return new Command("encode")
    .description("Encode a coefficients file as a named model record")
    .argument("<coefficients>", 'JSON file: { "means": <vector>, "variances"?: <vector> }')
    .requiredOption("--features <file>", "Feature index file")
    .requiredOption("--model-id <id>", "Model identifier stored in the record")
    .option("--threshold <n>", "Drop values with |value| <= n", (val) =>
      parseThreshold(val, "--threshold")
    )
    .option("--loss-function <name>", "Loss function name stored in the record")
    .option("--out <file>", "Write the record to a file instead of stdout")
    .addHelpText(
      "after",
      `
Examples:
  $ coefstore encode coefficients.json --features features.json --model-id ctr-v1
  $ coefstore encode coefficients.json --features features.json --model-id ctr-v1 --out model.json`
    )
    .action(async (coefficientsPath: string, options: EncodeCommandOptions) => {
      await withTiming(
        "cli.encode",
        async () => {
          const opts = program.opts();
          const record = await runEncode(coefficientsPath, options);

          if (options.out === undefined) {
            writeStdout(serializeModelRecord(record));
          } else if (!opts.quiet) {
            console.log(`Wrote ${record.modelId} to ${options.out}`);
          }
          return record;
        },
        (record) => ({
          means: record.means.length,
          variances: record.variances?.length ?? "-",
        })
      );
    });
}
