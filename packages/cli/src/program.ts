/**
 * Command tree for the trimseq CLI
 */

import { Command, type OutputConfiguration } from "commander";
import { colorize } from "./lib/render.js";
import { createBenchCommand } from "./commands/bench.js";
import { createInfoCommand } from "./commands/info.js";

export interface ProgramOptions {
  version?: string;
  output?: OutputConfiguration;
}

/**
 * Build the program. Commander errors are thrown as CommanderError instead of
 * exiting, so the caller decides the exit code.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  // Settings must be in place before subcommands are created so they inherit them
  program
    .name("trimseq")
    .description("trimseq - append-only, index-stable lists with bulk head trimming")
    .version(options.version ?? "0.0.0")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
      ...options.output,
    })
    .exitOverride();

  createBenchCommand(program);
  createInfoCommand(program);

  return program;
}
