/**
 * Selector resolution for enumerate() and views
 */

import { InvalidSelectorError } from "./errors.js";
import { KeyRange } from "./range.js";

/**
 * Slice-style selector. Negative bounds count back from the window's stop.
 */
export interface SliceSelector {
  start?: number;
  stop?: number;
  step?: number;
}

/**
 * Anything accepted where a set of indices is expected
 */
export type Selector = KeyRange | SliceSelector | Iterable<number>;

/**
 * A selector reduced to either a contiguous window-clipped range or an index list
 */
export type ResolvedSelector =
  | { kind: "range"; range: KeyRange }
  | { kind: "indices"; indices: Iterable<number> };

const SLICE_KEYS = new Set(["start", "stop", "step"]);

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof Reflect.get(value, Symbol.iterator) === "function";
}

function isSliceSelector(value: object): value is SliceSelector {
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return false;
  for (const [key, bound] of Object.entries(value)) {
    if (!SLICE_KEYS.has(key)) return false;
    if (bound !== undefined && !Number.isSafeInteger(bound)) return false;
  }
  return true;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

/**
 * Validate each element of an index iterable as it is consumed
 */
function* checkedIndices(source: Iterable<unknown>): Generator<number> {
  for (const index of source) {
    if (typeof index !== "number" || !Number.isSafeInteger(index)) {
      throw new InvalidSelectorError(`index list contains non-integer ${String(index)}`);
    }
    yield index;
  }
}

/**
 * Turn slice bounds into concrete indices relative to `window`
 */
function sliceToRange(slice: SliceSelector, window: KeyRange): KeyRange {
  let start = slice.start ?? window.start;
  let stop = slice.stop ?? window.stop;
  if (start < 0) start += window.stop;
  if (stop < 0) stop += window.stop;
  return new KeyRange(start, stop, slice.step ?? 1);
}

/**
 * Resolve a selector against the current window
 *
 * Step-1 ranges are clipped to the window. Ranges with any other step are
 * treated as index lists. An omitted selector means the whole window.
 *
 * @throws InvalidSelectorError for anything that is not a range, slice or iterable
 */
export function resolveSelector(selector: unknown, window: KeyRange): ResolvedSelector {
  if (selector === undefined) {
    return { kind: "range", range: window };
  }

  if (typeof selector !== "object" || selector === null) {
    throw new InvalidSelectorError(`cannot interpret ${describeValue(selector)} as a selector`);
  }

  const range =
    selector instanceof KeyRange
      ? selector
      : isIterable(selector)
        ? undefined
        : isSliceSelector(selector)
          ? sliceToRange(selector, window)
          : undefined;

  if (range) {
    if (range.step === 1) {
      return { kind: "range", range: range.clip(window.start, window.stop) };
    }
    return { kind: "indices", indices: range };
  }

  if (isIterable(selector)) {
    return { kind: "indices", indices: checkedIndices(selector) };
  }

  throw new InvalidSelectorError(`cannot interpret ${describeValue(selector)} as a selector`);
}

/**
 * Resolve a selector for a view: a step-1 range or an explicit index list
 *
 * Index lists are materialized so the view can map positions in O(1).
 */
export function resolveViewSelector(selector: unknown, window: KeyRange): KeyRange | number[] {
  if (selector instanceof KeyRange && selector.step !== 1) {
    throw new InvalidSelectorError(`views support only step-1 ranges, got step ${selector.step}`);
  }
  if (
    typeof selector === "object" &&
    selector !== null &&
    !(selector instanceof KeyRange) &&
    !isIterable(selector) &&
    isSliceSelector(selector) &&
    (selector.step ?? 1) !== 1
  ) {
    throw new InvalidSelectorError(`views support only step-1 ranges, got step ${selector.step}`);
  }

  const resolved = resolveSelector(selector, window);
  if (resolved.kind === "range") {
    return resolved.range;
  }
  return [...resolved.indices];
}
