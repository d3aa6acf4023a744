/**
 * Environment and configuration resolution
 */

import { EXIT_CODE } from "../contracts.js";
import { CliError } from "./errors.js";

export const DEFAULT_SEED = "trimseq";
export const DEFAULT_BLOCK_SIZE = 1000;

/**
 * Resolve the workload seed
 * Priority: CLI option > TRIMSEQ_SEED env var > default "trimseq"
 */
export function resolveSeed(cliSeed?: string): string {
  const seed = cliSeed ?? process.env.TRIMSEQ_SEED ?? DEFAULT_SEED;
  return seed.trim() === "" ? DEFAULT_SEED : seed;
}

/**
 * Resolve items per block
 * Priority: CLI option > TRIMSEQ_BLOCK_SIZE env var > default 1000
 */
export function resolveBlockSize(cliBlockSize?: number): number {
  if (cliBlockSize !== undefined) {
    return cliBlockSize;
  }

  const fromEnv = process.env.TRIMSEQ_BLOCK_SIZE;
  if (fromEnv === undefined || fromEnv.trim() === "") {
    return DEFAULT_BLOCK_SIZE;
  }

  const parsed = Number(fromEnv);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new CliError(`TRIMSEQ_BLOCK_SIZE must be a positive integer, got "${fromEnv}"`, {
      exitCode: EXIT_CODE.INVALID_ARGS,
    });
  }
  return parsed;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.TRIMSEQ_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}
