import type { CommitRecord } from "@refdelta/core";
import { describe, expect, it } from "vitest";
import { computeDelta } from "./compute-delta.js";
import type { RepositoryHistorySet } from "./delta-types.js";

const commit = (id: string, committedAt: string, parentIds: readonly string[] = []): CommitRecord => ({
  id,
  shortId: id.slice(0, 8),
  title: `commit ${id}`,
  message: `commit ${id}\n`,
  authorName: "Alice",
  authorEmail: "alice@example.com",
  authoredAt: committedAt,
  committerName: "Alice",
  committerEmail: "alice@example.com",
  committedAt,
  parentIds,
  webUrl: `https://git.example.com/group/app/-/commit/${id}`,
});

const history = (commits: readonly CommitRecord[]): RepositoryHistorySet => ({
  commits: new Map(commits.map((entry) => [entry.id, entry])),
  truncated: false,
  truncationReason: null,
  pagesRead: 1,
});

const c1 = commit("c1", "2024-01-01T10:00:00Z");
const c2 = commit("c2", "2024-01-02T10:00:00Z", ["c1"]);
const c3 = commit("c3", "2024-01-03T10:00:00Z", ["c2"]);
const c4 = commit("c4", "2024-01-04T10:00:00Z", ["c3"]);
const c5 = commit("c5", "2024-01-05T10:00:00Z", ["c4"]);

describe("computeDelta", () => {
  it("returns target-only commits newest first", () => {
    const delta = computeDelta(history([c1, c2, c3]), history([c1, c2, c3, c4, c5]));

    expect(delta.map((entry) => entry.id)).toEqual(["c5", "c4"]);
  });

  it("excludes shared ancestors even when they are newer than target-only commits", () => {
    const feature = commit("f1", "2024-01-02T12:00:00Z", ["c1"]);
    const hotfix = commit("h1", "2024-02-01T09:00:00Z", ["c3"]);
    const merge = commit("m1", "2024-01-10T09:00:00Z", ["c3", "f1"]);

    const base = history([c1, c2, c3, hotfix]);
    const target = history([c1, c2, c3, feature, merge, hotfix]);

    const delta = computeDelta(base, target);

    expect(delta.map((entry) => entry.id)).toEqual(["m1", "f1"]);
    for (const entry of delta) {
      expect(target.commits.has(entry.id)).toBe(true);
      expect(base.commits.has(entry.id)).toBe(false);
    }
  });

  it("breaks timestamp ties by ascending id", () => {
    const left = commit("bbb", "2024-01-05T10:00:00Z");
    const right = commit("aaa", "2024-01-05T10:00:00Z");

    const delta = computeDelta(history([]), history([left, right, c1]));

    expect(delta.map((entry) => entry.id)).toEqual(["aaa", "bbb", "c1"]);
  });

  it("orders commits with an unreadable timestamp last", () => {
    const undated = commit("u1", "not-a-date");

    const delta = computeDelta(history([]), history([undated, c2]));

    expect(delta.map((entry) => entry.id)).toEqual(["c2", "u1"]);
  });

  it("returns an empty delta when target is contained in base", () => {
    expect(computeDelta(history([c1, c2, c3]), history([c1, c2]))).toEqual([]);
  });
});
