/**
 * Fixed-size slot buffer used at every level of the chunk tree
 */

import { CHUNK_SIZE } from "../contracts/capacity.js";

/**
 * A chunk of slots with a written flag kept beside each value
 *
 * `undefined` in a slot is the absence sentinel. The written flag tells a
 * stored `undefined` apart from a slot that was never written.
 */
export class Chunk<S> {
  readonly slots: Array<S | undefined>;
  readonly written: Uint8Array;
  #live = 0;

  constructor(capacity = CHUNK_SIZE) {
    this.slots = new Array<S | undefined>(capacity).fill(undefined);
    this.written = new Uint8Array(capacity);
  }

  get capacity(): number {
    return this.slots.length;
  }

  /**
   * Number of written slots
   */
  get liveCount(): number {
    return this.#live;
  }

  get(slot: number): S | undefined {
    return this.slots[slot];
  }

  has(slot: number): boolean {
    return this.written[slot] === 1;
  }

  set(slot: number, value: S): void {
    if (this.written[slot] !== 1) {
      this.written[slot] = 1;
      this.#live++;
    }
    this.slots[slot] = value;
  }

  /**
   * Return one slot to the sentinel
   */
  clear(slot: number): void {
    if (this.written[slot] === 1) {
      this.written[slot] = 0;
      this.#live--;
    }
    this.slots[slot] = undefined;
  }

  /**
   * Return every slot to the sentinel
   */
  reset(): void {
    this.slots.fill(undefined);
    this.written.fill(0);
    this.#live = 0;
  }
}
