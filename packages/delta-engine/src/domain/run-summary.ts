import type { DeltaResult, OutcomeCounts, RepositoryRankingEntry, RunSummary } from "@refdelta/core";
import type { AuthorIdentityKey } from "./delta-types.js";

export type SummarizeOptions = {
  authorIdentity: AuthorIdentityKey;
  baseRef?: string;
  targetRef?: string;
};

const countOutcomes = (results: readonly DeltaResult[]): OutcomeCounts => {
  const counts: OutcomeCounts = { changesFound: 0, noChanges: 0, refMissing: 0, errored: 0 };
  for (const result of results) {
    switch (result.outcome) {
      case "changes_found":
        counts.changesFound += 1;
        break;
      case "no_changes":
        counts.noChanges += 1;
        break;
      case "ref_missing":
        counts.refMissing += 1;
        break;
      case "error":
        counts.errored += 1;
        break;
    }
  }

  return counts;
};

const compareRanking = (left: RepositoryRankingEntry, right: RepositoryRankingEntry): number => {
  if (left.commitCount !== right.commitCount) {
    return right.commitCount - left.commitCount;
  }

  if (left.displayName === right.displayName) {
    return left.repositoryPath < right.repositoryPath ? -1 : left.repositoryPath > right.repositoryPath ? 1 : 0;
  }

  return left.displayName < right.displayName ? -1 : 1;
};

export const summarizeDeltaResults = (
  results: readonly DeltaResult[],
  options: SummarizeOptions,
): RunSummary => {
  const authors = new Set<string>();
  let totalCommits = 0;
  let totalBaseCommits = 0;
  let totalTargetCommits = 0;
  let truncatedRepositories = 0;

  for (const result of results) {
    totalCommits += result.commits.length;
    totalBaseCommits += result.baseCommitCount;
    totalTargetCommits += result.targetCommitCount;
    if (result.truncated) {
      truncatedRepositories += 1;
    }

    for (const commit of result.commits) {
      authors.add(options.authorIdentity === "email" ? commit.authorEmail : commit.authorName);
    }
  }

  const ranking = results
    .filter((result) => result.commits.length > 0)
    .map((result) => ({
      repositoryPath: result.repository.path,
      displayName: result.repository.displayName,
      commitCount: result.commits.length,
    }))
    .sort(compareRanking);

  const first = results[0];
  const uniqueAuthors = [...authors].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  return {
    baseRef: options.baseRef ?? first?.baseRef ?? "",
    targetRef: options.targetRef ?? first?.targetRef ?? "",
    totalRepositories: results.length,
    outcomes: countOutcomes(results),
    truncatedRepositories,
    totalCommits,
    totalBaseCommits,
    totalTargetCommits,
    uniqueAuthorCount: uniqueAuthors.length,
    uniqueAuthors,
    ranking,
  };
};
