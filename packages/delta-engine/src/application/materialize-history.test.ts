import type { CommitRecord } from "@refdelta/core";
import { describe, expect, it } from "vitest";
import type { ResolvedReference } from "../domain/delta-types.js";
import { TransportError } from "../domain/errors.js";
import { InMemoryCommitTransport } from "../infrastructure/in-memory-commit-transport.js";
import type { CommitPage, CommitTransport } from "./commit-transport.js";
import { materializeHistory, type HistoryProgressEvent } from "./materialize-history.js";

const commit = (id: string, day: number, parentIds: readonly string[]): CommitRecord => ({
  id,
  shortId: id,
  title: id,
  message: id,
  authorName: "Alice",
  authorEmail: "alice@example.com",
  authoredAt: `2024-02-${String(day).padStart(2, "0")}T10:00:00Z`,
  committerName: "Alice",
  committerEmail: "alice@example.com",
  committedAt: `2024-02-${String(day).padStart(2, "0")}T10:00:00Z`,
  parentIds,
  webUrl: "",
});

const c1 = commit("c1", 1, []);
const c2 = commit("c2", 2, ["c1"]);
const c3 = commit("c3", 3, ["c2"]);
const c4 = commit("c4", 4, ["c3"]);
const c5 = commit("c5", 5, ["c4"]);
const history = [c1, c2, c3, c4, c5];

const head: ResolvedReference = { kind: "branch", name: "main", commitId: "c5" };
const unlimited = { maxPages: 100, maxDurationMs: 60_000 };

class ScriptedTransport implements CommitTransport {
  calls = 0;

  constructor(private readonly pages: readonly CommitPage[]) {}

  async listCommits(): Promise<CommitPage> {
    const page = this.pages[this.calls];
    this.calls += 1;
    if (page === undefined) {
      throw new Error("no scripted page left");
    }
    return page;
  }

  async findReference(): Promise<null> {
    return null;
  }
}

describe("materializeHistory", () => {
  it("drains the whole history when the budget allows", async () => {
    const transport = new InMemoryCommitTransport(new Map([[1, { commits: history }]]), { pageSize: 2 });

    const set = await materializeHistory(transport, 1, head, {
      maxRetries: 0,
      baseDelayMs: 0,
      budget: unlimited,
    });

    expect([...set.commits.keys()].sort()).toEqual(["c1", "c2", "c3", "c4", "c5"]);
    expect(set.truncated).toBe(false);
    expect(set.truncationReason).toBeNull();
    expect(set.pagesRead).toBe(3);
    expect(transport.listCalls.every((call) => call.startRef === "c5")).toBe(true);
  });

  it("stops at the page budget and returns a subset of the true history", async () => {
    const transport = new InMemoryCommitTransport(new Map([[1, { commits: history }]]), { pageSize: 2 });
    const events: HistoryProgressEvent[] = [];

    const set = await materializeHistory(transport, 1, head, {
      maxRetries: 0,
      baseDelayMs: 0,
      budget: { maxPages: 1, maxDurationMs: 60_000 },
      onProgress: (event) => events.push(event),
    });

    expect(set.truncated).toBe(true);
    expect(set.truncationReason).toBe("max_pages");
    expect([...set.commits.keys()]).toEqual(["c5", "c4"]);
    const trueIds = new Set(history.map((entry) => entry.id));
    expect([...set.commits.keys()].every((id) => trueIds.has(id))).toBe(true);
    expect(events.at(-1)).toEqual({ stage: "history_truncated", ref: "main", reason: "max_pages", commits: 2 });
  });

  it("is not truncated when the last allowed page is also the final page", async () => {
    const transport = new InMemoryCommitTransport(new Map([[1, { commits: history }]]), { pageSize: 5 });

    const set = await materializeHistory(transport, 1, head, {
      maxRetries: 0,
      baseDelayMs: 0,
      budget: { maxPages: 1, maxDurationMs: 60_000 },
    });

    expect(set.truncated).toBe(false);
    expect(set.commits.size).toBe(5);
  });

  it("stops when the time budget is spent", async () => {
    const transport = new InMemoryCommitTransport(new Map([[1, { commits: history }]]), { pageSize: 1 });
    let clock = 0;

    const set = await materializeHistory(transport, 1, head, {
      maxRetries: 0,
      baseDelayMs: 0,
      budget: { maxPages: 100, maxDurationMs: 250 },
      now: () => {
        const current = clock;
        clock += 100;
        return current;
      },
    });

    expect(set.truncationReason).toBe("max_duration");
    expect(set.pagesRead).toBe(3);
  });

  it("treats duplicate ids across pages as a single entry", async () => {
    const transport = new ScriptedTransport([
      { commits: [c5, c4], nextPageToken: "2" },
      { commits: [c4, c3], nextPageToken: null },
    ]);

    const set = await materializeHistory(transport, 1, head, {
      maxRetries: 0,
      baseDelayMs: 0,
      budget: unlimited,
    });

    expect([...set.commits.keys()]).toEqual(["c5", "c4", "c3"]);
    expect(set.pagesRead).toBe(2);
  });

  it("propagates transport errors instead of truncating silently", async () => {
    const transport = new InMemoryCommitTransport(new Map([[1, { commits: history }]]), {
      pageSize: 2,
      beforeListCommits: (call) => {
        if (call.pageToken !== null) {
          throw new TransportError("connection reset", { status: null, retryable: false });
        }
      },
    });

    await expect(
      materializeHistory(transport, 1, head, { maxRetries: 0, baseDelayMs: 0, budget: unlimited }),
    ).rejects.toThrow("connection reset");
  });

  it("marks the history as cancelled when the signal aborts mid-drain", async () => {
    const controller = new AbortController();
    const transport = new InMemoryCommitTransport(new Map([[1, { commits: history }]]), {
      pageSize: 2,
      beforeListCommits: (call) => {
        if (call.pageToken === "2") {
          controller.abort();
        }
      },
    });

    const set = await materializeHistory(transport, 1, head, {
      maxRetries: 0,
      baseDelayMs: 0,
      budget: unlimited,
      signal: controller.signal,
    });

    expect(set.truncated).toBe(true);
    expect(set.truncationReason).toBe("cancelled");
    expect([...set.commits.keys()]).toEqual(["c5", "c4", "c3", "c2"]);
  });
});
