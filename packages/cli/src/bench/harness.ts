/**
 * Randomized append/trim workload and block read-latency benchmark
 *
 * Drives subjects only through the TrimmableList contract.
 */

import { performance } from "node:perf_hooks";
import seedrandom from "seedrandom";
import { CHUNKED_ARRAY_CAPACITY, MetricsCollector, type TrimmableList } from "@trimseq/core";
import { EXIT_CODE } from "../contracts.js";
import { CliError, VerificationError } from "../lib/errors.js";
import { generateTestData } from "./test-data.js";

/**
 * Workload shape
 */
export interface BenchmarkConfig {
  /** Items per block */
  blockSize: number;
  /** Blocks appended over the run */
  blocksToAdd: number;
  /** Blocks trimmed over the run (must be below blocksToAdd) */
  blocksToRemove: number;
  /** Chance of an append on each step */
  probAdd: number;
  /** Chance of a one-item trim on each step */
  probRemove: number;
  /** Read rounds per surviving block */
  roundsPerBlock: number;
  /** Seed for the workload and read targets */
  seed: string;
}

export const DEFAULT_CONFIG: BenchmarkConfig = {
  blockSize: 1000,
  blocksToAdd: 50,
  blocksToRemove: 15,
  probAdd: 0.5,
  probRemove: 0.15,
  roundsPerBlock: 25,
  seed: "trimseq",
};

/**
 * Progress callbacks; all optional
 */
export interface BenchmarkReporter {
  populateProgress?(added: number, removed: number): void;
  readRound?(round: number, block: number): void;
}

/**
 * Read latency for one surviving block
 */
export interface BlockReport {
  block: number;
  rangeStart: number;
  rangeStop: number;
  ops: number;
  totalNs: number;
  nsPerRead: number;
  p95RoundNs: number;
  /** Sum of every value read from the block, modulo 2^32 */
  checksum: number;
}

export interface SubjectReport {
  subject: string;
  added: number;
  removed: number;
  populateMs: number;
  verifyMs: number;
  blocks: BlockReport[];
}

/** Rounds between readRound() progress calls */
const ROUND_REPORT_INTERVAL = 100;

/** Reads per round, as a multiple of the block size */
const READS_PER_ROUND_FACTOR = 4;

/**
 * Reject configurations the workload cannot satisfy
 *
 * @throws CliError with exit code INVALID_ARGS
 */
export function validateConfig(config: BenchmarkConfig): void {
  const problems: string[] = [];

  if (!Number.isSafeInteger(config.blockSize) || config.blockSize <= 0) {
    problems.push("block size must be a positive integer");
  }
  if (
    !Number.isSafeInteger(config.blocksToAdd) ||
    !Number.isSafeInteger(config.blocksToRemove) ||
    config.blocksToRemove <= 0 ||
    config.blocksToRemove >= config.blocksToAdd
  ) {
    problems.push("blocks to remove must satisfy 0 < remove < add");
  }
  for (const [name, p] of [
    ["add probability", config.probAdd],
    ["remove probability", config.probRemove],
  ] as const) {
    if (!(p >= 0.01 && p <= 0.99)) {
      problems.push(`${name} must be between 0.01 and 0.99`);
    }
  }
  // Every subject must hold the whole workload, ChunkedArray included
  if (config.blockSize * config.blocksToAdd > CHUNKED_ARRAY_CAPACITY) {
    problems.push(
      `block size x blocks to add (${config.blockSize * config.blocksToAdd}) exceeds capacity ${CHUNKED_ARRAY_CAPACITY}`
    );
  }
  if (!Number.isSafeInteger(config.roundsPerBlock) || config.roundsPerBlock <= 0) {
    problems.push("rounds per block must be a positive integer");
  }

  if (problems.length > 0) {
    throw new CliError(`Invalid benchmark configuration: ${problems.join("; ")}`, {
      exitCode: EXIT_CODE.INVALID_ARGS,
    });
  }
}

/**
 * One benchmark run: a fixed workload replayed against each subject
 */
export class WindowBenchmark {
  readonly config: BenchmarkConfig;
  readonly testData: readonly number[];
  private readonly reporter: BenchmarkReporter;
  private readonly metrics: MetricsCollector;

  constructor(config: BenchmarkConfig, reporter: BenchmarkReporter = {}, metrics = new MetricsCollector()) {
    validateConfig(config);
    this.config = config;
    this.reporter = reporter;
    this.metrics = metrics;
    this.testData = generateTestData(config.blockSize * config.blocksToAdd);
  }

  get itemsToAdd(): number {
    return this.config.blockSize * this.config.blocksToAdd;
  }

  get itemsToRemove(): number {
    return this.config.blockSize * this.config.blocksToRemove;
  }

  /**
   * Populate, verify and read-benchmark one subject
   */
  run(name: string, subject: TrimmableList<number>): SubjectReport {
    const populateStart = performance.now();
    this.randomizedPopulate(name, subject);
    const populateMs = performance.now() - populateStart;

    const verifyStart = performance.now();
    this.sequentialVerify(name, subject);
    const verifyMs = performance.now() - verifyStart;

    return {
      subject: name,
      added: this.itemsToAdd,
      removed: this.itemsToRemove,
      populateMs,
      verifyMs,
      blocks: this.blockRandomRead(name, subject),
    };
  }

  /**
   * Interleave appends and one-item trims at random until both quotas are met
   *
   * @throws VerificationError if the subject does not start empty
   */
  randomizedPopulate(name: string, subject: TrimmableList<number>): void {
    const initial = subject.indexRange();
    if (subject.length !== 0 || initial.start !== 0 || initial.stop !== 0) {
      throw new VerificationError(name, `subject must start empty, found window ${initial.toString()}`);
    }

    const rng = seedrandom(`${this.config.seed}:populate`);
    const { probAdd, probRemove, blockSize } = this.config;
    const itemsToAdd = this.itemsToAdd;
    const itemsToRemove = this.itemsToRemove;

    let added = 0;
    let removed = 0;
    let changes = 0;

    while (added < itemsToAdd || removed < itemsToRemove) {
      let changed = false;

      if (added < itemsToAdd && rng() < probAdd) {
        const value = this.testData[added] ?? 0;
        const index = subject.append(value);
        if (index !== added) {
          throw new VerificationError(name, `append returned index ${index}, expected ${added}`);
        }
        added++;
        changed = true;
      }

      if (removed < itemsToRemove && removed < added && rng() < probRemove) {
        removed++;
        subject.trimBefore(removed);
        changed = true;
      }

      if (changed) {
        changes++;
        if (changes % blockSize === 0) {
          this.reporter.populateProgress?.(added, removed);
        }
      }
    }
  }

  /**
   * Check the window and every surviving value
   *
   * @throws VerificationError on the first mismatch
   */
  sequentialVerify(name: string, subject: TrimmableList<number>): void {
    const start = this.itemsToRemove;
    const stop = this.itemsToAdd;
    const range = subject.indexRange();

    if (range.start !== start || range.stop !== stop) {
      throw new VerificationError(name, `expected window [${start}, ${stop}), found ${range.toString()}`);
    }
    if (subject.length !== stop - start) {
      throw new VerificationError(name, `expected length ${stop - start}, found ${subject.length}`);
    }
    if (subject.at(start - 1) !== undefined) {
      throw new VerificationError(name, `index ${start - 1} is still readable after trimming`);
    }

    for (let index = start; index < stop; index++) {
      const expected = this.testData[index];
      const actual = subject.at(index);
      if (actual !== expected) {
        throw new VerificationError(name, `index ${index}: expected ${expected}, got ${actual}`);
      }
    }
  }

  /**
   * Time random reads confined to one surviving block per round
   *
   * @returns One report per surviving block, in block order
   */
  blockRandomRead(name: string, subject: TrimmableList<number>): BlockReport[] {
    const { blockSize, blocksToAdd, blocksToRemove, roundsPerBlock } = this.config;
    const rng = seedrandom(`${this.config.seed}:read`);
    const survivingBlocks = blocksToAdd - blocksToRemove;
    const roundCount = survivingBlocks * roundsPerBlock;
    const readsPerRound = blockSize * READS_PER_ROUND_FACTOR;
    const checksums = new Map<number, number>();
    const targets = new Array<number>(readsPerRound).fill(0);

    this.metrics.reset(name);

    for (let round = 0; round < roundCount; round++) {
      const block = blocksToRemove + Math.floor(rng() * survivingBlocks);
      if (round % ROUND_REPORT_INTERVAL === 0) {
        this.reporter.readRound?.(round, block);
      }

      const rangeStart = block * blockSize;
      for (let i = 0; i < readsPerRound; i++) {
        targets[i] = rangeStart + Math.floor(rng() * blockSize);
      }

      let sum = 0;
      const timeStart = performance.now();
      for (const index of targets) {
        sum = (sum + (subject.at(index) ?? 0)) >>> 0;
      }
      const elapsedNs = Math.round((performance.now() - timeStart) * 1e6);

      this.metrics.recordReadRound(name, block, readsPerRound, elapsedNs);
      checksums.set(block, ((checksums.get(block) ?? 0) + sum) >>> 0);
    }

    const reports: BlockReport[] = [];
    for (let block = blocksToRemove; block < blocksToAdd; block++) {
      const recorded = this.metrics.getMetrics(name, block);
      reports.push({
        block,
        rangeStart: block * blockSize,
        rangeStop: (block + 1) * blockSize,
        ops: recorded?.readCount ?? 0,
        totalNs: recorded?.totalNs ?? 0,
        nsPerRead: this.metrics.getNsPerRead(name, block),
        p95RoundNs: this.metrics.getP95RoundNs(name, block),
        checksum: checksums.get(block) ?? 0,
      });
    }
    return reports;
  }
}
