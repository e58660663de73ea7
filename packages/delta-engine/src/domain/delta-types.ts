import type { CommitRecord, CommitTimestampField } from "@refdelta/core";

export type ResolvedReferenceKind = "tag" | "branch" | "commit";

export type ReferenceKind =
  | { kind: ResolvedReferenceKind; name: string; commitId: string }
  | { kind: "unresolved"; name: string };

export type ResolvedReference = Extract<ReferenceKind, { kind: ResolvedReferenceKind }>;

export const REFERENCE_PROBE_ORDER: readonly ResolvedReferenceKind[] = ["tag", "branch", "commit"];

export const isResolved = (reference: ReferenceKind): reference is ResolvedReference =>
  reference.kind !== "unresolved";

export type TruncationReason = "max_pages" | "max_duration" | "cancelled";

export type RepositoryHistorySet = {
  commits: ReadonlyMap<string, CommitRecord>;
  truncated: boolean;
  truncationReason: TruncationReason | null;
  pagesRead: number;
};

export type HistoryBudget = {
  maxPages: number;
  maxDurationMs: number;
};

export type RetryOptions = {
  maxRetries: number;
  baseDelayMs: number;
  /** Upper bound for any single wait, including a server-sent `retry-after`. */
  maxDelayMs?: number;
};

export type AuthorIdentityKey = "name" | "email";

export type DeltaEngineConfig = {
  concurrency: number;
  maxPages: number;
  maxDurationMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  dateField: CommitTimestampField;
  authorIdentity: AuthorIdentityKey;
};

export const DEFAULT_DELTA_ENGINE_CONFIG: DeltaEngineConfig = {
  concurrency: 4,
  maxPages: 1000,
  maxDurationMs: 300_000,
  maxRetries: 3,
  retryBaseDelayMs: 500,
  retryMaxDelayMs: 30_000,
  dateField: "committed",
  authorIdentity: "name",
};
