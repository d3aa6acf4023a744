/**
 * Verbose-mode metric lines on stderr (TRIMSEQ_CLI_DEBUG=1)
 *
 * Format: `metric <key> field=value ...`, one line per metric.
 */

import { performance } from "node:perf_hooks";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

type MetricValue = string | number | boolean;

/** Keeps one metric on one line */
function flatten(part: MetricValue): string {
  return String(part).replace(/\s+/g, " ").trim();
}

export function emitMetric(key: string, fields: Record<string, MetricValue>): void {
  if (!isVerbose()) {
    return;
  }

  const pairs = Object.entries(fields).map(([name, value]) => `${flatten(name)}=${flatten(value)}`);
  writeStderr([`metric ${flatten(key)}`, ...pairs].join(" ") + "\n");
}

/**
 * Run `fn` and emit `<label> duration_ms=<ms> success=<bool>` once it settles
 */
export async function withTiming<T>(label: string, fn: () => T | Promise<T>): Promise<T> {
  const start = performance.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, {
      duration_ms: (performance.now() - start).toFixed(1),
      success,
    });
  }
}
