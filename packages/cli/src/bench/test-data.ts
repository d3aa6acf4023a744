/**
 * Deterministic workload values
 */

/**
 * 32-bit avalanche hash of an index, used as the value appended at that index
 *
 * Values differ from their indices so a subject that returns the wrong slot
 * fails verification instead of passing by accident.
 */
export function testDatum(index: number): number {
  let h = Math.imul(index ^ 0x9e3779b9, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/**
 * Values for indices `[0, count)`
 */
export function generateTestData(count: number): number[] {
  return Array.from({ length: count }, (_, index) => testDatum(index));
}
