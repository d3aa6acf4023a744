/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/** Upper bound for count-like options to keep a run inside memory */
const MAX_COUNT = 1_000_000;

/**
 * Parse a positive integer argument
 */
export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed === 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  if (parsed > MAX_COUNT) {
    throw new InvalidArgumentError(`${name} must be <= ${MAX_COUNT}`);
  }

  return parsed;
}

/**
 * Parse a probability in [0.01, 0.99]
 */
export function parseProbability(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = trimmed === "" ? Number.NaN : Number(trimmed);

  if (!Number.isFinite(parsed) || parsed < 0.01 || parsed > 0.99) {
    throw new InvalidArgumentError(`${name} must be a number between 0.01 and 0.99`);
  }

  return parsed;
}

/**
 * Parse a comma-separated list drawn from `allowed`, keeping order and dropping repeats
 */
export function parseChoiceList<T extends string>(
  value: string,
  name: string,
  allowed: readonly T[]
): T[] {
  const chosen: T[] = [];

  for (const raw of value.split(",")) {
    const item = raw.trim();
    if (item === "") continue;

    const match = allowed.find((candidate) => candidate === item);
    if (match === undefined) {
      throw new InvalidArgumentError(
        `${name} has unknown entry "${item}" (expected one of: ${allowed.join(", ")})`
      );
    }
    if (!chosen.includes(match)) {
      chosen.push(match);
    }
  }

  if (chosen.length === 0) {
    throw new InvalidArgumentError(`${name} must name at least one of: ${allowed.join(", ")}`);
  }

  return chosen;
}
