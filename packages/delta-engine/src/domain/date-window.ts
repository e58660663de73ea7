import { commitTimestamp, type CommitRecord, type CommitTimestampField, type DateWindow } from "@refdelta/core";
import { InvalidDateWindowError } from "./errors.js";

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

type ParsedWindow = {
  afterMs: number | null;
  beforeMs: number | null;
};

/**
 * Parses a window bound given as `YYYY-MM-DD` (midnight UTC) or as a full
 * ISO-8601 timestamp.
 */
export const parseDateBound = (value: string): number => {
  const trimmed = value.trim();
  const calendarMatch = trimmed.match(CALENDAR_DATE);
  if (calendarMatch !== null) {
    const year = Number.parseInt(calendarMatch[1] ?? "", 10);
    const month = Number.parseInt(calendarMatch[2] ?? "", 10);
    const day = Number.parseInt(calendarMatch[3] ?? "", 10);
    const epoch = Date.UTC(year, month - 1, day);
    const roundTrip = new Date(epoch);
    if (
      roundTrip.getUTCFullYear() !== year ||
      roundTrip.getUTCMonth() !== month - 1 ||
      roundTrip.getUTCDate() !== day
    ) {
      throw new InvalidDateWindowError(`invalid calendar date: ${value}`, value);
    }

    return epoch;
  }

  const epoch = Date.parse(trimmed);
  if (trimmed.length === 0 || Number.isNaN(epoch)) {
    throw new InvalidDateWindowError(`invalid date bound: ${value}`, value);
  }

  return epoch;
};

export const parseDateWindow = (window: DateWindow | undefined): ParsedWindow => {
  const afterMs = window?.after === undefined ? null : parseDateBound(window.after);
  const beforeMs = window?.before === undefined ? null : parseDateBound(window.before);
  if (afterMs !== null && beforeMs !== null && afterMs >= beforeMs) {
    throw new InvalidDateWindowError(
      `date window is empty: after ${window?.after ?? ""} is not earlier than before ${window?.before ?? ""}`,
      `${window?.after ?? ""}..${window?.before ?? ""}`,
    );
  }

  return { afterMs, beforeMs };
};

export const isUnboundedWindow = (window: DateWindow | undefined): boolean =>
  window?.after === undefined && window?.before === undefined;

/**
 * Keeps commits whose timestamp lies in `[after, before)`. Commits without a
 * parseable timestamp are kept. Must only run on an already computed delta.
 */
export const filterByDateWindow = (
  commits: readonly CommitRecord[],
  window: DateWindow | undefined,
  field: CommitTimestampField,
): readonly CommitRecord[] => {
  if (isUnboundedWindow(window)) {
    return commits;
  }

  const { afterMs, beforeMs } = parseDateWindow(window);
  return commits.filter((commit) => {
    const timestamp = Date.parse(commitTimestamp(commit, field));
    if (Number.isNaN(timestamp)) {
      return true;
    }

    if (afterMs !== null && timestamp < afterMs) {
      return false;
    }

    return beforeMs === null || timestamp < beforeMs;
  });
};
