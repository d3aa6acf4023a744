import { describe, it, expect } from "vitest";
import { KeyRange, keyRange } from "./range.js";
import { InvalidSelectorError } from "./errors.js";

describe("KeyRange", () => {
  it("should measure half-open ranges", () => {
    expect(new KeyRange(300, 1000).length).toBe(700);
    expect(new KeyRange(0, 0).isEmpty).toBe(true);
    expect(new KeyRange(5, 2).length).toBe(0);
  });

  it("should measure stepped ranges", () => {
    expect(new KeyRange(0, 10, 3).length).toBe(4);
    expect(new KeyRange(10, 0, -4).length).toBe(3);
    expect(new KeyRange(0, 10, -1).length).toBe(0);
  });

  it("should test membership", () => {
    const range = new KeyRange(3, 9, 2);
    expect(range.includes(3)).toBe(true);
    expect(range.includes(7)).toBe(true);
    expect(range.includes(4)).toBe(false);
    expect(range.includes(9)).toBe(false);
    expect(new KeyRange(9, 3, -3).includes(6)).toBe(true);
  });

  it("should address members by position", () => {
    const range = new KeyRange(10, 20, 5);
    expect(range.at(0)).toBe(10);
    expect(range.at(1)).toBe(15);
    expect(range.at(2)).toBeUndefined();
    expect(range.at(-1)).toBeUndefined();
  });

  it("should clip to bounds", () => {
    expect(new KeyRange(0, 100).clip(10, 50)).toEqual(new KeyRange(10, 50));
    expect(new KeyRange(60, 100).clip(10, 50)).toEqual(new KeyRange(60, 60));
  });

  it("should iterate members", () => {
    expect([...new KeyRange(2, 6)]).toEqual([2, 3, 4, 5]);
    expect([...keyRange(6, 0, -2)]).toEqual([6, 4, 2]);
  });

  it("should render as an interval", () => {
    expect(String(new KeyRange(300, 1000))).toBe("[300, 1000)");
    expect(String(new KeyRange(0, 9, 3))).toBe("[0, 9) step 3");
  });

  it("should reject a zero step and non-integer bounds", () => {
    expect(() => new KeyRange(0, 10, 0)).toThrow(InvalidSelectorError);
    expect(() => new KeyRange(0.5, 10)).toThrow("range bounds must be integers");
  });
});
