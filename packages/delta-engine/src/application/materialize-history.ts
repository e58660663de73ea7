import type { CommitRecord, RepositoryId } from "@refdelta/core";
import type {
  HistoryBudget,
  RepositoryHistorySet,
  ResolvedReference,
  TruncationReason,
} from "../domain/delta-types.js";
import type { CommitTransport } from "./commit-transport.js";
import { readCommitPages } from "./paged-commit-source.js";
import type { TransportRetryOptions } from "./transport-retry.js";

export type HistoryProgressEvent =
  | { stage: "page_read"; ref: string; pagesRead: number; commits: number }
  | { stage: "history_truncated"; ref: string; reason: TruncationReason; commits: number };

export type MaterializeHistoryOptions = TransportRetryOptions & {
  budget: HistoryBudget;
  now?: () => number;
  onProgress?: (event: HistoryProgressEvent) => void;
};

export const materializeHistory = async (
  transport: CommitTransport,
  repositoryId: RepositoryId,
  reference: ResolvedReference,
  options: MaterializeHistoryOptions,
): Promise<RepositoryHistorySet> => {
  const now = options.now ?? Date.now;
  const maxPages = Math.max(1, options.budget.maxPages);
  const startedAt = now();
  const commits = new Map<string, CommitRecord>();
  let pagesRead = 0;
  let exhausted = false;
  let truncationReason: TruncationReason | null = null;

  try {
    // Walk from the resolved commit so both drains see the history the
    // resolver observed, even if the branch moves mid-run.
    for await (const page of readCommitPages(transport, repositoryId, reference.commitId, options)) {
      pagesRead += 1;
      for (const commit of page.commits) {
        commits.set(commit.id, commit);
      }
      options.onProgress?.({ stage: "page_read", ref: reference.name, pagesRead, commits: commits.size });

      if (page.nextPageToken === null) {
        exhausted = true;
        break;
      }
      if (pagesRead >= maxPages) {
        truncationReason = "max_pages";
        break;
      }
      if (now() - startedAt >= options.budget.maxDurationMs) {
        truncationReason = "max_duration";
        break;
      }
    }
  } catch (error) {
    if (options.signal?.aborted !== true) {
      throw error;
    }
  }

  if (!exhausted && truncationReason === null) {
    truncationReason = "cancelled";
  }

  if (truncationReason !== null) {
    options.onProgress?.({
      stage: "history_truncated",
      ref: reference.name,
      reason: truncationReason,
      commits: commits.size,
    });
  }

  return {
    commits,
    truncated: truncationReason !== null,
    truncationReason,
    pagesRead,
  };
};
