/**
 * Info command: chunk geometry and an empty structure's state
 */

import type { Command } from "commander";
import {
  CHUNK_BITS,
  CHUNK_LEVELS,
  CHUNK_SIZE,
  CHUNKED_ARRAY_CAPACITY,
  ChunkedArray,
  SlidingWindowList,
} from "@trimseq/core";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export interface StructureInfo {
  chunkBits: number;
  chunkSize: number;
  levels: number;
  capacity: number;
  chunked: {
    window: string;
    length: number;
    pooledLeaves: number;
    pooledBranches: number;
  };
  sliding: {
    window: string;
    length: number;
  };
}

/**
 * Collect geometry and empty-state stats
 */
export function collectInfo(): StructureInfo {
  const chunked = new ChunkedArray<number>();
  const sliding = new SlidingWindowList<number>();
  const pools = chunked.poolStats();

  return {
    chunkBits: CHUNK_BITS,
    chunkSize: CHUNK_SIZE,
    levels: CHUNK_LEVELS,
    capacity: CHUNKED_ARRAY_CAPACITY,
    chunked: {
      window: chunked.indexRange().toString(),
      length: chunked.length,
      pooledLeaves: pools.leaf.free,
      pooledBranches: pools.branch.free,
    },
    sliding: {
      window: sliding.indexRange().toString(),
      length: sliding.length,
    },
  };
}

/**
 * Create info command
 */
export function createInfoCommand(program: Command): Command {
  return program
    .command("info")
    .description("Show chunk geometry and the state of empty structures")
    .option("--json", "Output JSON")
    .action(async (options: { json?: boolean }) => {
      await withTiming("cli.info", () => {
        const info = collectInfo();

        if (options.json) {
          printJson(info);
          return;
        }

        printLines([
          `Chunk size:     ${info.chunkSize} slots (${info.chunkBits} bits per level)`,
          `Levels:         ${info.levels}`,
          `Capacity:       ${info.capacity} indices`,
          `ChunkedArray:   window ${info.chunked.window}, length ${info.chunked.length}, ` +
            `free leaves ${info.chunked.pooledLeaves}, free branches ${info.chunked.pooledBranches}`,
          `SlidingWindow:  window ${info.sliding.window}, length ${info.sliding.length}`,
        ]);
      });
    });
}
