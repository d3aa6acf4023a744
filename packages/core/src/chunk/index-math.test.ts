import { describe, it, expect } from "vitest";
import { compose, decompose } from "./index-math.js";
import { CHUNKED_ARRAY_CAPACITY } from "../contracts/capacity.js";

describe("decompose", () => {
  it("should split small indices into the last level only", () => {
    expect(decompose(0)).toEqual([0, 0, 0, 0]);
    expect(decompose(127)).toEqual([0, 0, 0, 127]);
  });

  it("should carry into the next level at chunk boundaries", () => {
    expect(decompose(128)).toEqual([0, 0, 1, 0]);
    expect(decompose(128 * 128)).toEqual([0, 1, 0, 0]);
    expect(decompose(128 * 128 + 128 + 5)).toEqual([0, 1, 1, 5]);
  });

  it("should map the last addressable index to all-127 fields", () => {
    expect(decompose(CHUNKED_ARRAY_CAPACITY - 1)).toEqual([0, 127, 127, 127]);
  });

  it("should report overflow bits in the remainder", () => {
    expect(decompose(CHUNKED_ARRAY_CAPACITY)).toEqual([1, 0, 0, 0]);
    expect(decompose(3 * CHUNKED_ARRAY_CAPACITY + 2)).toEqual([3, 0, 0, 2]);
  });

  it("should keep level fields exact above 2^32", () => {
    const index = 2 ** 40 + 300;
    const path = decompose(index);
    expect(path).toEqual([2 ** 19, 0, 2, 44]);
    expect(compose(path)).toBe(index);
  });
});

describe("compose", () => {
  it("should invert decompose across level boundaries", () => {
    for (const index of [0, 1, 127, 128, 16383, 16384, 16385, 1_000_000, CHUNKED_ARRAY_CAPACITY - 1]) {
      expect(compose(decompose(index))).toBe(index);
    }
  });
});
