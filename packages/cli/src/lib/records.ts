/**
 * Record selection helpers shared by commands
 */

import { readRecordFiles } from "@coefstore/sdk";
import type { ModelRecord } from "@coefstore/sdk";
import { CliError } from "./errors.js";

/**
 * Load the single record a command works on
 * A multi-record file needs `modelId` to pick one.
 */
export async function loadRecord(filePath: string, modelId?: string): Promise<ModelRecord> {
  const records = await readRecordFiles([filePath]);

  if (modelId !== undefined) {
    const match = records.find((record) => record.modelId === modelId);
    if (!match) {
      throw new CliError(`Model not found: ${modelId} in ${filePath}`, { exitCode: 2 });
    }
    return match;
  }

  const [only] = records;
  if (records.length !== 1 || !only) {
    throw new CliError(
      `${filePath} holds ${records.length} records; choose one with --model-id`,
      { exitCode: 1 }
    );
  }
  return only;
}
