/**
 * Basic Usage Example
 *
 * Appends to both list types, trims the head and reads through views.
 * Run with: npx tsx examples/basic-usage.ts
 */

import {
  ChunkedArray,
  SlidingWindowList,
  keyRange,
  type TrimmableList,
} from "@trimseq/core";

/**
 * Works with either implementation through the shared contract
 */
function fillAndTrim(list: TrimmableList<string>, count: number, trimTo: number): string[] {
  for (let i = 0; i < count; i++) {
    list.append(`event-${i}`);
  }
  return list.trimBefore(trimTo);
}

function main() {
  // Sliding window: deque-backed
  console.log("📜 SlidingWindowList");
  const events = new SlidingWindowList<string>();
  const dropped = fillAndTrim(events, 10, 4);
  console.log(`  trimmed ${dropped.length} items: ${dropped.join(", ")}`);
  console.log(`  window ${events.indexRange().toString()}, length ${events.length}`);
  console.log(`  at(4) = ${events.at(4)}, at(3) = ${events.at(3)}`);
  console.log(`  oldest via popLeft(): ${events.popLeft()}`);

  // Chunked array: in-place writes and pooled chunks
  console.log("\n🧱 ChunkedArray");
  const chunked = new ChunkedArray<string>();
  fillAndTrim(chunked, 300, 256);
  console.log(`  window ${chunked.indexRange().toString()}, length ${chunked.length}`);
  console.log(`  free leaf chunks after trim: ${chunked.poolStats().leaf.free}`);

  chunked.put(299, "rewritten");
  console.log(`  has(255) = ${chunked.has(255)}, get(299) = ${chunked.get(299)}`);

  // Views: non-owning index mappings
  console.log("\n🔭 Views");
  const recent = chunked.view(keyRange(295, 300));
  console.log(`  last five: ${recent.toArray().join(", ")}`);

  const picked = events.view([9, 5, 7]);
  console.log(`  picked: ${picked.toArray().join(", ")}`);

  for (const [index, value] of chunked.enumerate({ start: 256, stop: 260 })) {
    console.log(`  ${index}: ${value}`);
  }
}

main();
