import type { DeltaResult, RunSummary } from "@refdelta/core";
import {
  runDeltaDiscovery,
  type DeltaDiscoveryInput,
  type DeltaDiscoveryOptions,
} from "./application/run-delta-discovery.js";
import { DEFAULT_DELTA_ENGINE_CONFIG } from "./domain/delta-types.js";
import { summarizeDeltaResults } from "./domain/run-summary.js";
import {
  GitLabCommitTransport,
  type GitLabTransportOptions,
} from "./infrastructure/gitlab-commit-transport.js";

export type { CommitPage, CommitTransport, ReferenceTarget } from "./application/commit-transport.js";
export type {
  DeltaDiscoveryInput,
  DeltaDiscoveryOptions,
  DeltaDiscoveryProgressEvent,
} from "./application/run-delta-discovery.js";
export type { RepositoryProgressEvent, ReferenceSide } from "./application/compare-repository.js";
export type { HistoryProgressEvent } from "./application/materialize-history.js";
export type {
  AuthorIdentityKey,
  DeltaEngineConfig,
  HistoryBudget,
  ReferenceKind,
  RepositoryHistorySet,
  TruncationReason,
} from "./domain/delta-types.js";
export type { GitLabTransportOptions } from "./infrastructure/gitlab-commit-transport.js";

export { DEFAULT_DELTA_ENGINE_CONFIG, runDeltaDiscovery, summarizeDeltaResults, GitLabCommitTransport };
export { computeDelta, compareDeltaCommits } from "./domain/compute-delta.js";
export { filterByDateWindow, parseDateBound, parseDateWindow } from "./domain/date-window.js";
export { InvalidDateWindowError, RunCancelledError, TransportError } from "./domain/errors.js";
export { resolveReference } from "./application/resolve-reference.js";
export { materializeHistory } from "./application/materialize-history.js";
export { readCommitPages } from "./application/paged-commit-source.js";
export { InMemoryCommitTransport } from "./infrastructure/in-memory-commit-transport.js";
export type { InMemoryRepository } from "./infrastructure/in-memory-commit-transport.js";

export type DeltaReport = {
  results: readonly DeltaResult[];
  summary: RunSummary;
};

export const discoverDeltas = async (
  input: DeltaDiscoveryInput,
  transport: GitLabCommitTransport | GitLabTransportOptions,
  options: DeltaDiscoveryOptions = {},
): Promise<DeltaReport> => {
  const commitTransport =
    transport instanceof GitLabCommitTransport ? transport : new GitLabCommitTransport(transport);
  const results = await runDeltaDiscovery(input, commitTransport, options);
  const summary = summarizeDeltaResults(results, {
    authorIdentity: options.config?.authorIdentity ?? DEFAULT_DELTA_ENGINE_CONFIG.authorIdentity,
    baseRef: input.baseRef,
    targetRef: input.targetRef,
  });

  return { results, summary };
};
