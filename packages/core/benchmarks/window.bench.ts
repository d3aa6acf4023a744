/**
 * Performance benchmarks for windowed lists
 * Run with: VITEST_PERF=1 npm test --workspace @trimseq/core
 */

import { describe, it, expect } from "vitest";
import { performance } from "node:perf_hooks";
import seedrandom from "seedrandom";
import { ChunkedArray } from "../src/chunked-array.js";
import { SlidingWindowList } from "../src/sliding-window-list.js";
import { WINDOW_SLO } from "../src/contracts/capacity.js";
import type { TrimmableListFactory } from "../src/types.js";

// Only run benchmarks if VITEST_PERF is set
const describeIf = process.env.VITEST_PERF ? describe : describe.skip;

const subjects: Array<[string, TrimmableListFactory<number>]> = [
  ["SlidingWindowList", () => new SlidingWindowList<number>()],
  ["ChunkedArray", () => new ChunkedArray<number>()],
];

describeIf.each(subjects)("%s performance", (name, create) => {
  it(`100k appends < ${WINDOW_SLO.APPEND_100K_MS}ms`, () => {
    const list = create();
    const start = performance.now();
    for (let i = 0; i < 100_000; i++) {
      list.append(i);
    }
    const duration = performance.now() - start;

    console.log(`${name}: 100k appends in ${duration.toFixed(2)}ms`);
    expect(duration).toBeLessThan(WINDOW_SLO.APPEND_100K_MS);
  });

  it(`100k appends with periodic trims < ${WINDOW_SLO.APPEND_TRIM_100K_MS}ms`, () => {
    const list = create();
    const start = performance.now();
    for (let i = 0; i < 100_000; i++) {
      list.append(i);
      if (i % 10 === 9) {
        list.trimBefore(i - 500);
      }
    }
    const duration = performance.now() - start;

    console.log(`${name}: 100k appends + trims in ${duration.toFixed(2)}ms`);
    expect(list.indexRange().start).toBe(99_499);
    expect(duration).toBeLessThan(WINDOW_SLO.APPEND_TRIM_100K_MS);
  });

  it(`100k random reads < ${WINDOW_SLO.RANDOM_READ_100K_MS}ms`, () => {
    const list = create();
    for (let i = 0; i < 200_000; i++) {
      list.append(i);
    }
    list.trimBefore(50_000);

    const rng = seedrandom("window-bench");
    const targets = Array.from({ length: 100_000 }, () => 50_000 + Math.floor(rng() * 150_000));

    let sum = 0;
    const start = performance.now();
    for (const index of targets) {
      sum += list.at(index) ?? 0;
    }
    const duration = performance.now() - start;

    console.log(`${name}: 100k reads in ${duration.toFixed(2)}ms (checksum ${sum})`);
    expect(sum).toBe(targets.reduce((acc, index) => acc + index, 0));
    expect(duration).toBeLessThan(WINDOW_SLO.RANDOM_READ_100K_MS);
  });
});
