import type { CommitRecord } from "@refdelta/core";
import type { RepositoryHistorySet } from "./delta-types.js";

const timestampOrNegativeInfinity = (iso: string): number => {
  const value = Date.parse(iso);
  return Number.isNaN(value) ? Number.NEGATIVE_INFINITY : value;
};

// Newest first; equal timestamps fall back to the id so two drains of the same
// history always produce the same sequence.
export const compareDeltaCommits = (left: CommitRecord, right: CommitRecord): number => {
  const leftTime = timestampOrNegativeInfinity(left.committedAt);
  const rightTime = timestampOrNegativeInfinity(right.committedAt);
  if (leftTime !== rightTime) {
    return rightTime > leftTime ? 1 : -1;
  }

  if (left.id === right.id) {
    return 0;
  }

  return left.id < right.id ? -1 : 1;
};

export const computeDelta = (
  base: RepositoryHistorySet,
  target: RepositoryHistorySet,
): readonly CommitRecord[] => {
  const delta: CommitRecord[] = [];
  for (const [id, commit] of target.commits) {
    if (!base.commits.has(id)) {
      delta.push(commit);
    }
  }

  return delta.sort(compareDeltaCommits);
};
