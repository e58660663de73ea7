export type RepositoryId = number | string;

export type RepositoryDescriptor = {
  id: RepositoryId;
  path: string;
  displayName: string;
  webUrl: string;
};

export type CommitRecord = {
  id: string;
  shortId: string;
  title: string;
  message: string;
  authorName: string;
  authorEmail: string;
  authoredAt: string;
  committerName: string;
  committerEmail: string;
  committedAt: string;
  parentIds: readonly string[];
  webUrl: string;
};

export type CommitTimestampField = "committed" | "authored";

export type DateWindow = {
  after?: string;
  before?: string;
};

export type DeltaOutcome = "changes_found" | "no_changes" | "ref_missing" | "error";

export type DeltaResult = {
  repository: RepositoryDescriptor;
  baseRef: string;
  targetRef: string;
  baseExists: boolean;
  targetExists: boolean;
  sameRef: boolean;
  truncated: boolean;
  error: string | null;
  outcome: DeltaOutcome;
  commits: readonly CommitRecord[];
  totalDeltaCommits: number;
  baseCommitCount: number;
  targetCommitCount: number;
};

export type RepositoryRankingEntry = {
  repositoryPath: string;
  displayName: string;
  commitCount: number;
};

export type OutcomeCounts = {
  changesFound: number;
  noChanges: number;
  refMissing: number;
  errored: number;
};

export type RunSummary = {
  baseRef: string;
  targetRef: string;
  totalRepositories: number;
  outcomes: OutcomeCounts;
  truncatedRepositories: number;
  totalCommits: number;
  totalBaseCommits: number;
  totalTargetCommits: number;
  uniqueAuthorCount: number;
  uniqueAuthors: readonly string[];
  ranking: readonly RepositoryRankingEntry[];
};

export const commitTimestamp = (commit: CommitRecord, field: CommitTimestampField): string =>
  field === "authored" ? commit.authoredAt : commit.committedAt;
