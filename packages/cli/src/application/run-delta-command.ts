import type { DateWindow, DeltaResult, RepositoryDescriptor, RepositoryId } from "@refdelta/core";
import {
  discoverDeltas,
  GitLabCommitTransport,
  type DeltaDiscoveryProgressEvent,
  type DeltaEngineConfig,
  type DeltaReport,
  type RepositoryProgressEvent,
} from "@refdelta/delta-engine";
import { createSilentLogger, type Logger } from "./logger.js";
import type { ConnectionConfig } from "./resolve-config.js";

export type DeltaCommandOptions = {
  baseRef: string;
  targetRef: string;
  repositories: readonly RepositoryId[];
  dateWindow: DateWindow;
  config: Partial<DeltaEngineConfig>;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export class RepositoryNotFoundError extends Error {
  readonly repository: RepositoryId;

  constructor(repository: RepositoryId) {
    super(`repository not found or not accessible: ${String(repository)}`);
    this.name = "RepositoryNotFoundError";
    this.repository = repository;
  }
}

const label = (repository: RepositoryDescriptor): string =>
  repository.path.length > 0 ? repository.path : String(repository.id);

const logRepositoryEvent = (logger: Logger, repository: RepositoryDescriptor, event: RepositoryProgressEvent): void => {
  const name = label(repository);
  switch (event.stage) {
    case "reference_resolved":
      logger.debug(`${name}: ${event.side} ref ${event.name} resolved as ${event.kind}`);
      break;
    case "same_reference":
      logger.debug(`${name}: base and target point at ${event.commitId.slice(0, 8)}, skipping history`);
      break;
    case "history":
      if (event.event.stage === "page_read") {
        logger.debug(
          `${name}: ${event.side} history page ${event.event.pagesRead} (${event.event.commits} commits)`,
        );
      } else {
        logger.warn(
          `${name}: ${event.side} history truncated (${event.event.reason}) after ${event.event.commits} commits`,
        );
      }
      break;
    case "transport_retry":
      logger.warn(`${name}: retry ${event.attempt} in ${event.delayMs}ms (${event.message})`);
      break;
  }
};

const describeMissingRefs = (result: DeltaResult): string =>
  [
    ...(result.baseExists ? [] : [`base ref ${result.baseRef}`]),
    ...(result.targetExists ? [] : [`target ref ${result.targetRef}`]),
  ].join(" and ");

export const createDeltaProgressReporter = (
  logger: Logger,
): ((event: DeltaDiscoveryProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "run_started":
        logger.info(`delta: scanning ${event.repositories} repositories (concurrency ${event.concurrency})`);
        break;
      case "repository_started":
        logger.debug(`delta: [${event.index + 1}/${event.total}] started ${label(event.repository)}`);
        break;
      case "repository":
        logRepositoryEvent(logger, event.repository, event.event);
        break;
      case "repository_completed": {
        const { result } = event;
        const prefix = `delta: [${event.index + 1}/${event.total}] ${label(result.repository)}`;
        switch (result.outcome) {
          case "changes_found":
            logger.info(`${prefix}: ${result.commits.length} commits${result.truncated ? " (truncated)" : ""}`);
            break;
          case "no_changes":
            logger.info(`${prefix}: no changes${result.truncated ? " (truncated)" : ""}`);
            break;
          case "ref_missing":
            logger.warn(`${prefix}: missing ${describeMissingRefs(result)}`);
            break;
          case "error":
            logger.error(`${prefix}: ${result.error ?? "unknown error"}`);
            break;
        }
        break;
      }
      case "repository_cancelled":
        logger.debug(`delta: [${event.index + 1}/${event.total}] ${label(event.repository)} cancelled`);
        break;
      case "run_cancelled":
        logger.warn(
          `delta: run ${event.reason === "timeout" ? "timed out" : "cancelled"} (${event.completed}/${event.total} completed)`,
        );
        break;
      case "run_completed":
        logger.info(`delta: completed ${event.total} repositories`);
        break;
    }
  };
};

const resolveRepositories = async (
  transport: GitLabCommitTransport,
  repositories: readonly RepositoryId[],
  logger: Logger,
  signal: AbortSignal | undefined,
): Promise<readonly RepositoryDescriptor[]> => {
  const descriptors: RepositoryDescriptor[] = [];
  for (const repository of repositories) {
    const descriptor = await transport.getRepository(repository, signal);
    if (descriptor === null) {
      throw new RepositoryNotFoundError(repository);
    }
    logger.debug(`delta: repository ${String(repository)} is ${descriptor.path} (id ${String(descriptor.id)})`);
    descriptors.push(descriptor);
  }

  return descriptors;
};

export const runDeltaCommand = async (
  options: DeltaCommandOptions,
  connection: ConnectionConfig | GitLabCommitTransport,
  logger: Logger = createSilentLogger(),
): Promise<DeltaReport> => {
  const transport = connection instanceof GitLabCommitTransport ? connection : new GitLabCommitTransport(connection);

  logger.info(`delta: resolving ${options.repositories.length} repositories`);
  const repositories = await resolveRepositories(transport, options.repositories, logger, options.signal);

  const report = await discoverDeltas(
    {
      repositories,
      baseRef: options.baseRef,
      targetRef: options.targetRef,
      dateWindow: options.dateWindow,
    },
    transport,
    {
      config: options.config,
      ...(options.timeoutMs === undefined ? {} : { timeoutMs: options.timeoutMs }),
      ...(options.signal === undefined ? {} : { signal: options.signal }),
      onProgress: createDeltaProgressReporter(logger),
    },
  );

  logger.info(
    `delta: ${report.summary.totalCommits} commits across ${report.summary.outcomes.changesFound} repositories with changes`,
  );
  return report;
};
