/**
 * Free-list allocator for chunk buffers
 */

import { CHUNK_SIZE } from "../contracts/capacity.js";
import { InvalidChunkError } from "../errors.js";
import { logger } from "../observability/logs.js";
import { Chunk } from "./chunk.js";

/**
 * Pool statistics for monitoring and tests
 */
export interface PoolStats {
  /** Chunks allocated fresh because the free list was empty */
  created: number;
  /** Total acquire() calls */
  acquired: number;
  /** acquire() calls served from the free list */
  reused: number;
  /** Total release() calls */
  released: number;
  /** Chunks currently on the free list */
  free: number;
}

/**
 * Recycles fixed-size chunks so trimming and refilling a window does not
 * churn allocations.
 *
 * A pool belongs to exactly one ChunkedArray. Chunks on the free list are
 * always in their reset state.
 */
export class ChunkPool<S> {
  readonly name: string;
  private freeList: Chunk<S>[] = [];
  private created = 0;
  private acquired = 0;
  private released = 0;

  constructor(name = "chunk") {
    this.name = name;
  }

  /**
   * Number of chunks on the free list
   */
  get size(): number {
    return this.freeList.length;
  }

  /**
   * Take a chunk from the free list, or allocate a fresh one
   */
  acquire(): Chunk<S> {
    this.acquired++;
    const recycled = this.freeList.pop();
    if (recycled) {
      return recycled;
    }

    this.created++;
    if (logger.isDebugEnabled()) {
      logger.debug("pool.allocate", { structure: this.name, details: { created: this.created } });
    }
    return new Chunk<S>(CHUNK_SIZE);
  }

  /**
   * Clear a chunk and put it on the free list
   *
   * @throws InvalidChunkError if the chunk is not CHUNK_SIZE slots
   */
  release(chunk: Chunk<S>): void {
    if (chunk.capacity !== CHUNK_SIZE) {
      throw new InvalidChunkError(chunk.capacity, CHUNK_SIZE);
    }
    chunk.reset();
    this.freeList.push(chunk);
    this.released++;

    if (logger.isDebugEnabled()) {
      logger.debug("pool.release", { structure: this.name, details: { free: this.freeList.length } });
    }
  }

  stats(): PoolStats {
    return {
      created: this.created,
      acquired: this.acquired,
      reused: this.acquired - this.created,
      released: this.released,
      free: this.freeList.length,
    };
  }
}
