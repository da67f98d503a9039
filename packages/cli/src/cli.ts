#!/usr/bin/env node

/**
 * Coefstore CLI entry point
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { logger } from "@coefstore/sdk";
import { createDecodeCommand } from "./commands/decode.js";
import { createEncodeCommand } from "./commands/encode.js";
import { createInspectCommand } from "./commands/inspect.js";
import { createListCommand } from "./commands/list.js";
import { colorize } from "./lib/render.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const program = new Command();

// Configure error output with color
program
  .configureOutput({
    writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
  })
  .exitOverride((err) => {
    if (err.code !== "commander.help" && err.code !== "commander.version") {
      console.error(`\nError: ${err.message}`);
      process.exit(err.exitCode);
    }
    throw err;
  });

// Global options
program
  .name("coefstore")
  .description("Coefstore - persist coefficient vectors as named model records")
  .version(readPackageVersion())
  .option("--verbose", "Verbose diagnostics")
  .option("--quiet", "Suppress non-error output")
  .hook("preAction", () => {
    const opts = program.opts();
    if (opts.quiet) {
      logger.setEnabled(false);
    } else if (opts.verbose) {
      process.env.COEFSTORE_DEBUG = "1";
    }
  });

program.addCommand(createEncodeCommand(program));
program.addCommand(createDecodeCommand(program));
program.addCommand(createInspectCommand());
program.addCommand(createListCommand());

// Top-level error handler
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const opts = program.opts();
    const exitCode = mapSdkErrorToExitCode(err);
    const message = formatCliError(err, Boolean(opts.verbose));

    console.error(`Error: ${message}`);

    process.exit(exitCode);
  }
}

void main();
