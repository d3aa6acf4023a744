/**
 * Benchmark command: replay one seeded workload against each subject
 */

import type { Command } from "commander";
import { parseChoiceList, parsePositiveInt, parseProbability } from "../lib/arg.js";
import { resolveBlockSize, resolveSeed, isTTY } from "../lib/env.js";
import { printJson, printLines, colorize, abbreviate } from "../lib/render.js";
import { writeStderr } from "../lib/io.js";
import { emitMetric, withTiming } from "../lib/telemetry.js";
import {
  DEFAULT_CONFIG,
  WindowBenchmark,
  type BenchmarkConfig,
  type BenchmarkReporter,
  type SubjectReport,
} from "../bench/harness.js";
import { SUBJECTS, SUBJECT_NAMES, type SubjectName } from "../bench/subjects.js";

interface BenchOptions {
  blockSize?: number;
  blocksAdd: number;
  blocksRemove: number;
  probAdd: number;
  probRemove: number;
  roundsPerBlock: number;
  seed?: string;
  subjects: SubjectName[];
  json?: boolean;
}

/**
 * Render one subject's report as human-readable lines
 */
export function formatSubjectReport(label: string, report: SubjectReport): string[] {
  const lines = [
    colorize(`✓ ${label}`, "green"),
    `  populated ${report.added} / trimmed ${report.removed} in ${report.populateMs.toFixed(1)} ms, verified in ${report.verifyMs.toFixed(1)} ms`,
  ];

  for (const block of report.blocks) {
    lines.push(
      `  block ${block.block} [${block.rangeStart}, ${block.rangeStop}): ${block.ops} reads, ` +
        `${block.nsPerRead.toFixed(2)} ns/read, p95 round ${block.p95RoundNs} ns, ` +
        `checksum ${abbreviate(block.checksum)}`
    );
  }

  return lines;
}

/**
 * Progress on stderr, redrawn in place
 */
function createProgressReporter(config: BenchmarkConfig, label: string): BenchmarkReporter {
  const total = config.blockSize * config.blocksToAdd;
  return {
    populateProgress(added, removed) {
      writeStderr(`\r${label}: added ${added}/${total}, removed ${removed}`);
    },
    readRound(round, block) {
      writeStderr(`\r${label}: read round ${round} (block ${block})          `);
    },
  };
}

/**
 * Create bench command
 */
export function createBenchCommand(program: Command): Command {
  return program
    .command("bench")
    .description("Benchmark every subject on the same randomized append/trim workload")
    .option("--block-size <n>", "Items per block (env: TRIMSEQ_BLOCK_SIZE)", (value) =>
      parsePositiveInt(value, "--block-size")
    )
    .option(
      "--blocks-add <n>",
      "Blocks appended over the run",
      (value) => parsePositiveInt(value, "--blocks-add"),
      DEFAULT_CONFIG.blocksToAdd
    )
    .option(
      "--blocks-remove <n>",
      "Blocks trimmed over the run",
      (value) => parsePositiveInt(value, "--blocks-remove"),
      DEFAULT_CONFIG.blocksToRemove
    )
    .option(
      "--prob-add <p>",
      "Chance of an append per step",
      (value) => parseProbability(value, "--prob-add"),
      DEFAULT_CONFIG.probAdd
    )
    .option(
      "--prob-remove <p>",
      "Chance of a one-item trim per step",
      (value) => parseProbability(value, "--prob-remove"),
      DEFAULT_CONFIG.probRemove
    )
    .option(
      "--rounds-per-block <n>",
      "Read rounds per surviving block",
      (value) => parsePositiveInt(value, "--rounds-per-block"),
      DEFAULT_CONFIG.roundsPerBlock
    )
    .option("--seed <seed>", "Workload seed (env: TRIMSEQ_SEED)")
    .option(
      "--subjects <list>",
      `Comma-separated subjects (${SUBJECT_NAMES.join(", ")})`,
      (value) => parseChoiceList(value, "--subjects", SUBJECT_NAMES),
      [...SUBJECT_NAMES]
    )
    .option("--json", "Output a single JSON document")
    .addHelpText(
      "after",
      `
Examples:
  $ trimseq bench
  $ trimseq bench --block-size 100 --blocks-add 20 --blocks-remove 5
  $ trimseq bench --subjects chunked --seed demo --json`
    )
    .action(async (options: BenchOptions) => {
      await withTiming("cli.bench", () => {
        const { quiet } = program.opts<{ quiet?: boolean }>();

        const config: BenchmarkConfig = {
          blockSize: resolveBlockSize(options.blockSize),
          blocksToAdd: options.blocksAdd,
          blocksToRemove: options.blocksRemove,
          probAdd: options.probAdd,
          probRemove: options.probRemove,
          roundsPerBlock: options.roundsPerBlock,
          seed: resolveSeed(options.seed),
        };
        const showProgress = !quiet && !options.json && isTTY();
        const reports: SubjectReport[] = [];

        for (const name of options.subjects) {
          const subject = SUBJECTS[name];
          const reporter = showProgress ? createProgressReporter(config, subject.label) : {};
          const benchmark = new WindowBenchmark(config, reporter);
          const report = benchmark.run(subject.name, subject.create());
          if (showProgress) {
            writeStderr("\r\x1b[K");
          }

          emitMetric("bench.subject", {
            subject: subject.name,
            populate_ms: report.populateMs.toFixed(1),
            verify_ms: report.verifyMs.toFixed(1),
            blocks: report.blocks.length,
          });

          reports.push(report);
          if (!options.json && !quiet) {
            printLines(formatSubjectReport(subject.label, report));
          }
        }

        if (options.json) {
          printJson({ config, subjects: reports });
        }
      });
    });
}
