/**
 * Benchmark subjects: every TrimmableList implementation the CLI can drive
 */

import { ChunkedArray, SlidingWindowList, type TrimmableListFactory } from "@trimseq/core";

export const SUBJECT_NAMES = ["sliding", "chunked"] as const;

export type SubjectName = (typeof SUBJECT_NAMES)[number];

export interface Subject {
  name: SubjectName;
  label: string;
  create: TrimmableListFactory<number>;
}

export const SUBJECTS: Record<SubjectName, Subject> = {
  sliding: {
    name: "sliding",
    label: "SlidingWindowList",
    create: () => new SlidingWindowList<number>(),
  },
  chunked: {
    name: "chunked",
    label: "ChunkedArray",
    create: () => new ChunkedArray<number>(),
  },
};
