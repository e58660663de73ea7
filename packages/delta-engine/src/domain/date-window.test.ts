import type { CommitRecord } from "@refdelta/core";
import { describe, expect, it } from "vitest";
import { filterByDateWindow, parseDateBound, parseDateWindow } from "./date-window.js";
import { InvalidDateWindowError } from "./errors.js";

const commit = (id: string, committedAt: string, authoredAt = committedAt): CommitRecord => ({
  id,
  shortId: id,
  title: id,
  message: id,
  authorName: "Alice",
  authorEmail: "alice@example.com",
  authoredAt,
  committerName: "Alice",
  committerEmail: "alice@example.com",
  committedAt,
  parentIds: [],
  webUrl: "",
});

const delta = [
  commit("d3", "2024-03-10T08:00:00Z", "2024-02-01T08:00:00Z"),
  commit("d2", "2024-03-05T00:00:00Z"),
  commit("d1", "2024-03-01T23:59:59Z"),
];

describe("parseDateBound", () => {
  it("reads calendar dates as midnight UTC", () => {
    expect(parseDateBound("2024-03-05")).toBe(Date.UTC(2024, 2, 5));
  });

  it("accepts full timestamps", () => {
    expect(parseDateBound("2024-03-05T12:30:00Z")).toBe(Date.UTC(2024, 2, 5, 12, 30));
  });

  it("rejects impossible calendar dates", () => {
    expect(() => parseDateBound("2024-02-30")).toThrow(InvalidDateWindowError);
  });

  it("rejects text that is not a date", () => {
    expect(() => parseDateBound("soon")).toThrow("invalid date bound: soon");
  });
});

describe("parseDateWindow", () => {
  it("rejects a window whose lower bound is not before its upper bound", () => {
    expect(() => parseDateWindow({ after: "2024-03-05", before: "2024-03-05" })).toThrow(
      InvalidDateWindowError,
    );
  });

  it("leaves missing bounds open", () => {
    expect(parseDateWindow({ before: "2024-03-05" })).toEqual({
      afterMs: null,
      beforeMs: Date.UTC(2024, 2, 5),
    });
  });
});

describe("filterByDateWindow", () => {
  it("returns the delta unchanged for an unbounded window", () => {
    expect(filterByDateWindow(delta, undefined, "committed")).toBe(delta);
    expect(filterByDateWindow(delta, {}, "committed")).toBe(delta);
  });

  it("includes the after date and excludes the before date", () => {
    const filtered = filterByDateWindow(delta, { after: "2024-03-05", before: "2024-03-10" }, "committed");

    expect(filtered.map((entry) => entry.id)).toEqual(["d2"]);
  });

  it("filters on the authored timestamp when asked", () => {
    const filtered = filterByDateWindow(delta, { before: "2024-03-01" }, "authored");

    expect(filtered.map((entry) => entry.id)).toEqual(["d3"]);
  });

  it("keeps commits without a readable timestamp", () => {
    const undated = commit("u1", "");

    expect(filterByDateWindow([undated], { after: "2024-01-01" }, "committed")).toEqual([undated]);
  });
});
