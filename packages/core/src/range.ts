/**
 * Half-open integer ranges used for windows and selectors
 */

import { InvalidSelectorError } from "./errors.js";

/**
 * Immutable integer range `[start, stop)` advancing by `step`
 *
 * Window ranges returned by the collections always have step 1.
 */
export class KeyRange implements Iterable<number> {
  readonly start: number;
  readonly stop: number;
  readonly step: number;

  constructor(start: number, stop: number, step = 1) {
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(stop)) {
      throw new InvalidSelectorError(`range bounds must be integers, got [${start}, ${stop})`);
    }
    if (!Number.isSafeInteger(step) || step === 0) {
      throw new InvalidSelectorError(`range step must be a non-zero integer, got ${step}`);
    }
    this.start = start;
    this.stop = stop;
    this.step = step;
  }

  /**
   * Number of indices in the range
   */
  get length(): number {
    const span = this.stop - this.start;
    if (this.step > 0 ? span <= 0 : span >= 0) return 0;
    return Math.ceil(span / this.step);
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Whether `index` is one of the range's members
   */
  includes(index: number): boolean {
    if (!Number.isInteger(index)) return false;
    const inBounds =
      this.step > 0
        ? this.start <= index && index < this.stop
        : this.stop < index && index <= this.start;
    return inBounds && (index - this.start) % this.step === 0;
  }

  /**
   * The `position`-th member, or undefined past either end
   */
  at(position: number): number | undefined {
    if (!Number.isInteger(position) || position < 0 || position >= this.length) {
      return undefined;
    }
    return this.start + position * this.step;
  }

  /**
   * Intersect a step-1 range with `[lo, hi)`
   */
  clip(lo: number, hi: number): KeyRange {
    const start = Math.max(this.start, lo);
    const stop = Math.max(start, Math.min(this.stop, hi));
    return new KeyRange(start, stop);
  }

  *[Symbol.iterator](): Iterator<number> {
    const count = this.length;
    for (let i = 0; i < count; i++) {
      yield this.start + i * this.step;
    }
  }

  toString(): string {
    return this.step === 1
      ? `[${this.start}, ${this.stop})`
      : `[${this.start}, ${this.stop}) step ${this.step}`;
  }
}

/**
 * Shorthand for `new KeyRange(start, stop, step)`
 */
export function keyRange(start: number, stop: number, step = 1): KeyRange {
  return new KeyRange(start, stop, step);
}
