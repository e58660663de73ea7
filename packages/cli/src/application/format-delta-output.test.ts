import type { CommitRecord, DeltaResult } from "@refdelta/core";
import { summarizeDeltaResults } from "@refdelta/delta-engine";
import { describe, expect, it } from "vitest";
import { formatDeltaOutput } from "./format-delta-output.js";

const commit = (id: string, authorName: string): CommitRecord => ({
  id,
  shortId: id,
  title: id,
  message: id,
  authorName,
  authorEmail: `${authorName.toLowerCase()}@example.com`,
  authoredAt: "2024-01-02T10:00:00Z",
  committerName: authorName,
  committerEmail: `${authorName.toLowerCase()}@example.com`,
  committedAt: "2024-01-02T10:00:00Z",
  parentIds: [],
  webUrl: "",
});

const result = (id: number, name: string, overrides: Partial<DeltaResult>): DeltaResult => ({
  repository: {
    id,
    path: `platform/${name}`,
    displayName: name,
    webUrl: `https://git.example.com/platform/${name}`,
  },
  baseRef: "v1",
  targetRef: "v2",
  baseExists: true,
  targetExists: true,
  sameRef: false,
  truncated: false,
  error: null,
  outcome: "no_changes",
  commits: [],
  totalDeltaCommits: 0,
  baseCommitCount: 0,
  targetCommitCount: 0,
  ...overrides,
});

const results: readonly DeltaResult[] = [
  result(1, "accounts", {
    outcome: "changes_found",
    commits: [commit("x2", "Bob"), commit("x1", "Alice")],
    totalDeltaCommits: 2,
    baseCommitCount: 3,
    targetCommitCount: 5,
  }),
  result(2, "billing", { outcome: "ref_missing", baseExists: false }),
  result(3, "catalog", { outcome: "error", error: "transport error (HTTP 502): bad gateway" }),
  result(4, "dispatch", { truncated: true, baseCommitCount: 10, targetCommitCount: 10 }),
];

const report = {
  results,
  summary: summarizeDeltaResults(results, { authorIdentity: "name", baseRef: "v1", targetRef: "v2" }),
};

describe("formatDeltaOutput", () => {
  it("renders a readable summary with the repositories that need attention", () => {
    expect(formatDeltaOutput(report, "summary")).toBe(
      [
        "delta v1..v2 across 4 repositories",
        "outcomes: 1 with changes, 1 unchanged, 1 missing refs, 1 errors",
        "commits: 2 (read 13 base, 15 target)",
        "truncated repositories: 1",
        "authors (2): Alice, Bob",
        "repositories with changes:",
        "      2  platform/accounts",
        "needs attention:",
        "  billing (platform/billing): missing base v1",
        "  catalog (platform/catalog): transport error (HTTP 502): bad gateway",
        "  dispatch (platform/dispatch): history truncated, delta is approximate " +
          "(may include commits shared with base or miss older target commits)",
      ].join("\n"),
    );
  });

  it("renders the full report as JSON", () => {
    const parsed: unknown = JSON.parse(formatDeltaOutput(report, "json"));

    expect(parsed).toEqual(JSON.parse(JSON.stringify({ summary: report.summary, results })));
  });

  it("keeps the summary short when nothing changed", () => {
    const quiet = [result(1, "accounts", {})];
    const output = formatDeltaOutput(
      { results: quiet, summary: summarizeDeltaResults(quiet, { authorIdentity: "name" }) },
      "summary",
    );

    expect(output.split("\n")).toEqual([
      "delta v1..v2 across 1 repositories",
      "outcomes: 0 with changes, 1 unchanged, 0 missing refs, 0 errors",
      "commits: 0 (read 0 base, 0 target)",
      "truncated repositories: 0",
      "authors (0): -",
    ]);
  });
});
