/**
 * Unit tests for the benchmark harness
 */

import { describe, it, expect } from "vitest";
import {
  ChunkedArray,
  MetricsCollector,
  SlidingWindowList,
  type KeyRange,
  type TrimmableList,
} from "@trimseq/core";
import { WindowBenchmark, validateConfig, type BenchmarkConfig } from "../src/bench/harness.js";
import { testDatum } from "../src/bench/test-data.js";
import { CliError, VerificationError, mapErrorToExitCode } from "../src/lib/errors.js";

const SMALL: BenchmarkConfig = {
  blockSize: 10,
  blocksToAdd: 5,
  blocksToRemove: 2,
  probAdd: 0.5,
  probRemove: 0.15,
  roundsPerBlock: 3,
  seed: "test-seed",
};

/**
 * Delegates to a SlidingWindowList but returns a wrong value at one index
 */
class CorruptList implements TrimmableList<number> {
  private readonly inner = new SlidingWindowList<number>();

  constructor(private readonly badIndex: number) {}

  append(value: number): number {
    return this.inner.append(value);
  }

  trimBefore(index: number): number[] {
    return this.inner.trimBefore(index);
  }

  indexRange(): KeyRange {
    return this.inner.indexRange();
  }

  at(index: number): number | undefined {
    const value = this.inner.at(index);
    return index === this.badIndex && value !== undefined ? value + 1 : value;
  }

  get length(): number {
    return this.inner.length;
  }
}

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("validateConfig", () => {
  it("should accept the small workload", () => {
    expect(() => validateConfig(SMALL)).not.toThrow();
  });

  it("should reject remove >= add with exit code 3", () => {
    const err = captureError(() => validateConfig({ ...SMALL, blocksToRemove: 5 }));
    expect(err).toBeInstanceOf(CliError);
    expect(err instanceof CliError ? err.exitCode : undefined).toBe(3);
    expect(err instanceof Error ? err.message : "").toBe(
      "Invalid benchmark configuration: blocks to remove must satisfy 0 < remove < add"
    );
  });

  it("should list every problem", () => {
    const err = captureError(() =>
      validateConfig({ ...SMALL, blockSize: 0, probAdd: 1, probRemove: 0 })
    );
    expect(err instanceof Error ? err.message : "").toBe(
      "Invalid benchmark configuration: block size must be a positive integer; " +
        "add probability must be between 0.01 and 0.99; " +
        "remove probability must be between 0.01 and 0.99"
    );
  });

  it("should reject zero blocks to remove", () => {
    expect(() => validateConfig({ ...SMALL, blocksToRemove: 0 })).toThrow(CliError);
  });

  it("should reject a workload larger than ChunkedArray capacity before allocating", () => {
    const oversized = { ...SMALL, blockSize: 50_000, blocksToAdd: 50, blocksToRemove: 1 };

    const err = captureError(() => new WindowBenchmark(oversized));
    expect(err).toBeInstanceOf(CliError);
    expect(mapErrorToExitCode(err)).toBe(3);
    expect(err instanceof Error ? err.message : "").toBe(
      "Invalid benchmark configuration: block size x blocks to add (2500000) exceeds capacity 2097152"
    );
  });

  it("should accept a workload that exactly fills capacity", () => {
    expect(() => validateConfig({ ...SMALL, blockSize: 128, blocksToAdd: 16_384 })).not.toThrow();
  });
});

describe("WindowBenchmark", () => {
  describe.each([
    ["sliding", (): TrimmableList<number> => new SlidingWindowList<number>()],
    ["chunked", (): TrimmableList<number> => new ChunkedArray<number>()],
  ])("%s", (name, create) => {
    it("should populate to the expected window", () => {
      const bench = new WindowBenchmark(SMALL);
      const subject = create();
      bench.randomizedPopulate(name, subject);

      expect(subject.indexRange().start).toBe(20);
      expect(subject.indexRange().stop).toBe(50);
      expect(subject.length).toBe(30);
      expect(subject.at(20)).toBe(testDatum(20));
      expect(subject.at(49)).toBe(testDatum(49));
      expect(subject.at(19)).toBeUndefined();
    });

    it("should pass verification after populating", () => {
      const bench = new WindowBenchmark(SMALL);
      const subject = create();
      bench.randomizedPopulate(name, subject);
      expect(() => bench.sequentialVerify(name, subject)).not.toThrow();
    });

    it("should run end to end", () => {
      const report = new WindowBenchmark(SMALL).run(name, create());

      expect(report.subject).toBe(name);
      expect(report.added).toBe(50);
      expect(report.removed).toBe(20);
      expect(report.blocks.map((b) => [b.block, b.rangeStart, b.rangeStop])).toEqual([
        [2, 20, 30],
        [3, 30, 40],
        [4, 40, 50],
      ]);
      // 3 surviving blocks x 3 rounds, 40 reads each
      expect(report.blocks.reduce((sum, b) => sum + b.ops, 0)).toBe(360);
      for (const block of report.blocks) {
        expect(block.ops % 40).toBe(0);
      }
    });
  });

  it("should refuse a subject that does not start empty", () => {
    const subject = new SlidingWindowList<number>();
    subject.append(1);

    const err = captureError(() => new WindowBenchmark(SMALL).randomizedPopulate("sliding", subject));
    expect(err).toBeInstanceOf(VerificationError);
    expect(err instanceof Error ? err.message : "").toBe(
      "Verification failed for sliding: subject must start empty, found window [0, 1)"
    );
  });

  it("should report the first wrong value", () => {
    const bench = new WindowBenchmark(SMALL);
    const subject = new CorruptList(31);
    bench.randomizedPopulate("corrupt", subject);

    const err = captureError(() => bench.sequentialVerify("corrupt", subject));
    expect(err).toBeInstanceOf(VerificationError);
    expect(err instanceof VerificationError ? err.exitCode : undefined).toBe(2);
    expect(err instanceof Error ? err.message : "").toBe(
      `Verification failed for corrupt: index 31: expected ${testDatum(31)}, got ${testDatum(31) + 1}`
    );
  });

  it("should report a wrong window", () => {
    const bench = new WindowBenchmark(SMALL);
    const subject = new ChunkedArray<number>();
    for (let i = 0; i < 50; i++) subject.append(testDatum(i));
    subject.trimBefore(10);

    const err = captureError(() => bench.sequentialVerify("chunked", subject));
    expect(err instanceof Error ? err.message : "").toBe(
      "Verification failed for chunked: expected window [20, 50), found [10, 50)"
    );
  });

  it("should read the same targets from every subject", () => {
    const sliding = new WindowBenchmark(SMALL).run("sliding", new SlidingWindowList<number>());
    const chunked = new WindowBenchmark(SMALL).run("chunked", new ChunkedArray<number>());

    expect(chunked.blocks.map((b) => [b.ops, b.checksum])).toEqual(
      sliding.blocks.map((b) => [b.ops, b.checksum])
    );
  });

  it("should record read rounds in the given collector", () => {
    const collector = new MetricsCollector();
    const report = new WindowBenchmark(SMALL, {}, collector).run("chunked", new ChunkedArray<number>());

    for (const block of report.blocks) {
      expect(collector.getMetrics("chunked", block.block)?.readCount ?? 0).toBe(block.ops);
    }
  });

  it("should report progress", () => {
    const populate: Array<[number, number]> = [];
    const rounds: Array<[number, number]> = [];
    const bench = new WindowBenchmark(SMALL, {
      populateProgress: (added, removed) => populate.push([added, removed]),
      readRound: (round, block) => rounds.push([round, block]),
    });
    bench.run("sliding", new SlidingWindowList<number>());

    // At least 50 appends and 20 trims, at most 70 changed steps
    expect(populate.length).toBeGreaterThanOrEqual(5);
    expect(populate.length).toBeLessThanOrEqual(7);
    expect(rounds).toHaveLength(1);
    expect(rounds[0]?.[0]).toBe(0);
  });
});
