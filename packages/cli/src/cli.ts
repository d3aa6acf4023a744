#!/usr/bin/env node

/**
 * trimseq CLI entry point
 */

import { readFileSync } from "node:fs";
import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { isVerbose } from "./lib/env.js";
import { mapErrorToExitCode, formatCliError } from "./lib/errors.js";
import { colorize } from "./lib/render.js";

// Read package.json for version
function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

async function main(): Promise<void> {
  const program = createProgram({ version: readVersion() });

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already written its own message (or help) to the terminal
    if (!(err instanceof CommanderError)) {
      const verbose = program.opts<{ verbose?: boolean }>().verbose === true || isVerbose();
      console.error(colorize(`Error: ${formatCliError(err, verbose)}`, "red", process.stderr));
    }
    process.exitCode = mapErrorToExitCode(err);
  }
}

main().catch((err: unknown) => {
  console.error(formatCliError(err, true));
  process.exitCode = 1;
});
