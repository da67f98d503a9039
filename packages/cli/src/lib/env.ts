/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { parseThreshold } from "./arg.js";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve a user-supplied file path to an absolute path
 */
export function resolveFilePath(input: string): string {
  return path.resolve(expandTilde(input));
}

/**
 * Resolve the encode threshold
 * Priority: CLI option > COEFSTORE_THRESHOLD env var > SDK default (undefined)
 */
export function resolveEncodeThreshold(cliThreshold?: number): number | undefined {
  if (cliThreshold !== undefined) {
    return cliThreshold;
  }

  const fromEnv = process.env.COEFSTORE_THRESHOLD;
  if (fromEnv === undefined || fromEnv.trim() === "") {
    return undefined;
  }

  return parseThreshold(fromEnv, "COEFSTORE_THRESHOLD");
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.COEFSTORE_CLI_DEBUG === "1" || false;
}
