import type { DateWindow, DeltaOutcome, DeltaResult, RepositoryDescriptor } from "@refdelta/core";
import { computeDelta } from "../domain/compute-delta.js";
import { filterByDateWindow } from "../domain/date-window.js";
import {
  isResolved,
  type DeltaEngineConfig,
  type ReferenceKind,
  type RepositoryHistorySet,
  type ResolvedReference,
} from "../domain/delta-types.js";
import { TransportError } from "../domain/errors.js";
import type { CommitTransport } from "./commit-transport.js";
import { materializeHistory, type HistoryProgressEvent } from "./materialize-history.js";
import { resolveReference } from "./resolve-reference.js";
import type { RetryEvent, Sleep, TransportRetryOptions } from "./transport-retry.js";

export type ReferenceSide = "base" | "target";

export type CompareRepositoryInput = {
  repository: RepositoryDescriptor;
  baseRef: string;
  targetRef: string;
  dateWindow?: DateWindow;
};

export type RepositoryProgressEvent =
  | { stage: "reference_resolved"; side: ReferenceSide; name: string; kind: ReferenceKind["kind"] }
  | { stage: "same_reference"; commitId: string }
  | { stage: "history"; side: ReferenceSide; event: HistoryProgressEvent }
  | { stage: "transport_retry"; attempt: number; delayMs: number; message: string };

export type CompareRepositoryOptions = {
  config: DeltaEngineConfig;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => number;
  onProgress?: (event: RepositoryProgressEvent) => void;
};

export const describeError = (error: unknown): string => {
  if (error instanceof TransportError) {
    return error.status === null
      ? `transport error: ${error.message}`
      : `transport error (HTTP ${error.status}): ${error.message}`;
  }

  if (error instanceof Error) {
    return `unexpected error: ${error.message}`;
  }

  return `unexpected error: ${String(error)}`;
};

const classifyOutcome = (result: Omit<DeltaResult, "outcome">): DeltaOutcome => {
  if (result.error !== null) {
    return "error";
  }
  if (!result.baseExists || !result.targetExists) {
    return "ref_missing";
  }

  return result.commits.length > 0 ? "changes_found" : "no_changes";
};

const finalize = (result: Omit<DeltaResult, "outcome">): DeltaResult => ({
  ...result,
  outcome: classifyOutcome(result),
});

const createRetryOptions = (options: CompareRepositoryOptions): TransportRetryOptions => ({
  maxRetries: options.config.maxRetries,
  baseDelayMs: options.config.retryBaseDelayMs,
  maxDelayMs: options.config.retryMaxDelayMs,
  ...(options.signal === undefined ? {} : { signal: options.signal }),
  ...(options.sleep === undefined ? {} : { sleep: options.sleep }),
  onRetry: (event: RetryEvent) =>
    options.onProgress?.({
      stage: "transport_retry",
      attempt: event.attempt,
      delayMs: event.delayMs,
      message: event.error.message,
    }),
});

/**
 * Runs resolve, materialize, diff and filter for one repository. Never
 * rejects: every failure is captured in the returned result. Resolves to
 * `null` when the run is cancelled before both refs are known.
 */
export const compareRepository = async (
  transport: CommitTransport,
  input: CompareRepositoryInput,
  options: CompareRepositoryOptions,
): Promise<DeltaResult | null> => {
  const result: Omit<DeltaResult, "outcome"> = {
    repository: input.repository,
    baseRef: input.baseRef,
    targetRef: input.targetRef,
    baseExists: false,
    targetExists: false,
    sameRef: false,
    truncated: false,
    error: null,
    commits: [],
    totalDeltaCommits: 0,
    baseCommitCount: 0,
    targetCommitCount: 0,
  };
  const retryOptions = createRetryOptions(options);
  const repositoryId = input.repository.id;

  const [baseResolution, targetResolution] = await Promise.allSettled([
    resolveReference(transport, repositoryId, input.baseRef, retryOptions, (event) =>
      options.onProgress?.({ stage: "reference_resolved", side: "base", ...event }),
    ),
    resolveReference(transport, repositoryId, input.targetRef, retryOptions, (event) =>
      options.onProgress?.({ stage: "reference_resolved", side: "target", ...event }),
    ),
  ]);

  if (baseResolution.status === "rejected" || targetResolution.status === "rejected") {
    if (options.signal?.aborted === true) {
      return null;
    }
  }
  if (baseResolution.status === "rejected") {
    return finalize({ ...result, error: describeError(baseResolution.reason) });
  }
  if (targetResolution.status === "rejected") {
    return finalize({ ...result, error: describeError(targetResolution.reason) });
  }

  const base = baseResolution.value;
  const target = targetResolution.value;
  const resolved = { ...result, baseExists: isResolved(base), targetExists: isResolved(target) };
  if (!isResolved(base) || !isResolved(target)) {
    return finalize(resolved);
  }

  if (base.commitId === target.commitId) {
    options.onProgress?.({ stage: "same_reference", commitId: base.commitId });
    return finalize({ ...resolved, sameRef: true });
  }

  const materialize = (side: ReferenceSide, reference: ResolvedReference): Promise<RepositoryHistorySet> =>
    materializeHistory(transport, repositoryId, reference, {
      ...retryOptions,
      budget: { maxPages: options.config.maxPages, maxDurationMs: options.config.maxDurationMs },
      ...(options.now === undefined ? {} : { now: options.now }),
      onProgress: (event) => options.onProgress?.({ stage: "history", side, event }),
    });

  const [baseHistory, targetHistory] = await Promise.allSettled([
    materialize("base", base),
    materialize("target", target),
  ]);

  if (baseHistory.status === "rejected") {
    return finalize({ ...resolved, error: describeError(baseHistory.reason) });
  }
  if (targetHistory.status === "rejected") {
    return finalize({ ...resolved, error: describeError(targetHistory.reason) });
  }

  try {
    const delta = computeDelta(baseHistory.value, targetHistory.value);
    const commits = filterByDateWindow(delta, input.dateWindow, options.config.dateField);

    return finalize({
      ...resolved,
      truncated: baseHistory.value.truncated || targetHistory.value.truncated,
      commits,
      totalDeltaCommits: delta.length,
      baseCommitCount: baseHistory.value.commits.size,
      targetCommitCount: targetHistory.value.commits.size,
    });
  } catch (error) {
    return finalize({ ...resolved, error: describeError(error) });
  }
};
