import type { DateWindow, DeltaResult, RepositoryDescriptor } from "@refdelta/core";
import { parseDateWindow } from "../domain/date-window.js";
import { DEFAULT_DELTA_ENGINE_CONFIG, type DeltaEngineConfig } from "../domain/delta-types.js";
import { RunCancelledError } from "../domain/errors.js";
import { summarizeDeltaResults } from "../domain/run-summary.js";
import type { CommitTransport } from "./commit-transport.js";
import { compareRepository, type RepositoryProgressEvent } from "./compare-repository.js";
import type { Sleep } from "./transport-retry.js";

export type DeltaDiscoveryInput = {
  repositories: readonly RepositoryDescriptor[];
  baseRef: string;
  targetRef: string;
  dateWindow?: DateWindow;
};

export type DeltaDiscoveryProgressEvent =
  | { stage: "run_started"; repositories: number; concurrency: number }
  | { stage: "repository_started"; index: number; total: number; repository: RepositoryDescriptor }
  | { stage: "repository"; repository: RepositoryDescriptor; event: RepositoryProgressEvent }
  | { stage: "repository_completed"; index: number; total: number; result: DeltaResult }
  | { stage: "repository_cancelled"; index: number; total: number; repository: RepositoryDescriptor }
  | { stage: "run_cancelled"; reason: "timeout" | "aborted"; completed: number; total: number }
  | { stage: "run_completed"; total: number };

export type DeltaDiscoveryOptions = {
  config?: Partial<DeltaEngineConfig>;
  signal?: AbortSignal;
  timeoutMs?: number;
  sleep?: Sleep;
  now?: () => number;
  onProgress?: (event: DeltaDiscoveryProgressEvent) => void;
};

type RunSignal = {
  signal: AbortSignal;
  reason: () => "timeout" | "aborted";
  dispose: () => void;
};

const withDefaults = (overrides: Partial<DeltaEngineConfig> | undefined): DeltaEngineConfig => ({
  ...DEFAULT_DELTA_ENGINE_CONFIG,
  ...overrides,
});

const createRunSignal = (external: AbortSignal | undefined, timeoutMs: number | undefined): RunSignal => {
  const controller = new AbortController();
  let timedOut = false;
  const abort = (): void => controller.abort();

  if (external?.aborted === true) {
    controller.abort();
  } else {
    external?.addEventListener("abort", abort, { once: true });
  }

  const timer =
    timeoutMs === undefined
      ? null
      : setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs);

  return {
    signal: controller.signal,
    reason: () => (timedOut ? "timeout" : "aborted"),
    dispose: () => {
      if (timer !== null) {
        clearTimeout(timer);
      }
      external?.removeEventListener("abort", abort);
    },
  };
};

const mapWithConcurrency = async <T, R>(
  values: readonly T[],
  limit: number,
  signal: AbortSignal,
  handler: (value: T, index: number) => Promise<R>,
): Promise<ReadonlyArray<R | undefined>> => {
  const effectiveLimit = Math.max(1, limit);
  const workerCount = Math.min(effectiveLimit, values.length);
  // One slot per input position, so completion order never leaks into output.
  const results: Array<R | undefined> = new Array<R | undefined>(values.length).fill(undefined);
  let index = 0;

  const workers: Promise<void>[] = Array.from({ length: workerCount }, async () => {
    while (!signal.aborted) {
      const current = index;
      index += 1;
      if (current >= values.length) {
        return;
      }

      const value = values[current];
      if (value !== undefined) {
        results[current] = await handler(value, current);
      }
    }
  });

  await Promise.all(workers);
  return results;
};

export const runDeltaDiscovery = async (
  input: DeltaDiscoveryInput,
  transport: CommitTransport,
  options: DeltaDiscoveryOptions = {},
): Promise<readonly DeltaResult[]> => {
  const config = withDefaults(options.config);
  parseDateWindow(input.dateWindow);

  const total = input.repositories.length;
  const runSignal = createRunSignal(options.signal, options.timeoutMs);
  options.onProgress?.({ stage: "run_started", repositories: total, concurrency: config.concurrency });

  try {
    const slots = await mapWithConcurrency(
      input.repositories,
      config.concurrency,
      runSignal.signal,
      async (repository, index) => {
        options.onProgress?.({ stage: "repository_started", index, total, repository });
        const result = await compareRepository(
          transport,
          {
            repository,
            baseRef: input.baseRef,
            targetRef: input.targetRef,
            ...(input.dateWindow === undefined ? {} : { dateWindow: input.dateWindow }),
          },
          {
            config,
            signal: runSignal.signal,
            ...(options.sleep === undefined ? {} : { sleep: options.sleep }),
            ...(options.now === undefined ? {} : { now: options.now }),
            onProgress: (event) => options.onProgress?.({ stage: "repository", repository, event }),
          },
        );
        if (result === null) {
          options.onProgress?.({ stage: "repository_cancelled", index, total, repository });
          return undefined;
        }

        options.onProgress?.({ stage: "repository_completed", index, total, result });
        return result;
      },
    );

    const completed = slots.filter((slot): slot is DeltaResult => slot !== undefined);
    if (runSignal.signal.aborted) {
      const reason = runSignal.reason();
      options.onProgress?.({ stage: "run_cancelled", reason, completed: completed.length, total });
      throw new RunCancelledError(
        reason,
        completed,
        summarizeDeltaResults(completed, {
          authorIdentity: config.authorIdentity,
          baseRef: input.baseRef,
          targetRef: input.targetRef,
        }),
      );
    }

    options.onProgress?.({ stage: "run_completed", total });
    return completed;
  } finally {
    runSignal.dispose();
  }
};
