import type { CommitRecord, RepositoryId } from "@refdelta/core";
import type { CommitPage, CommitTransport, ReferenceTarget } from "../application/commit-transport.js";
import { compareDeltaCommits } from "../domain/compute-delta.js";
import type { ResolvedReferenceKind } from "../domain/delta-types.js";
import { TransportError } from "../domain/errors.js";

export type InMemoryRepository = {
  commits: readonly CommitRecord[];
  tags?: Readonly<Record<string, string>>;
  branches?: Readonly<Record<string, string>>;
};

export type ListCommitsCall = {
  repositoryId: RepositoryId;
  startRef: string;
  pageToken: string | null;
};

export type ReferenceProbeCall = {
  repositoryId: RepositoryId;
  name: string;
  kind: ResolvedReferenceKind;
};

export type InMemoryTransportOptions = {
  pageSize?: number;
  beforeListCommits?: (call: ListCommitsCall) => void | Promise<void>;
  beforeFindReference?: (call: ReferenceProbeCall) => void | Promise<void>;
};

/**
 * Serves commit history from memory, walking parent links the way a remote
 * `git log <ref>` would. Used by tests and fixtures.
 */
export class InMemoryCommitTransport implements CommitTransport {
  readonly listCalls: ListCommitsCall[] = [];
  readonly probeCalls: ReferenceProbeCall[] = [];
  private readonly pageSize: number;

  constructor(
    private readonly repositories: ReadonlyMap<RepositoryId, InMemoryRepository>,
    private readonly options: InMemoryTransportOptions = {},
  ) {
    this.pageSize = Math.max(1, options.pageSize ?? 2);
  }

  private repository(repositoryId: RepositoryId): InMemoryRepository {
    const repository = this.repositories.get(repositoryId);
    if (repository === undefined) {
      throw new TransportError(`unknown repository ${String(repositoryId)}`, { status: 404, retryable: false });
    }

    return repository;
  }

  private reachableFrom(repository: InMemoryRepository, startRef: string): readonly CommitRecord[] {
    const byId = new Map(repository.commits.map((commit) => [commit.id, commit]));
    const startId = repository.tags?.[startRef] ?? repository.branches?.[startRef] ?? startRef;
    const visited = new Map<string, CommitRecord>();
    const pending = [startId];

    while (pending.length > 0) {
      const id = pending.pop();
      if (id === undefined || visited.has(id)) {
        continue;
      }

      const commit = byId.get(id);
      if (commit === undefined) {
        continue;
      }

      visited.set(id, commit);
      pending.push(...commit.parentIds);
    }

    return [...visited.values()].sort(compareDeltaCommits);
  }

  async listCommits(
    repositoryId: RepositoryId,
    startRef: string,
    pageToken: string | null,
  ): Promise<CommitPage> {
    const call = { repositoryId, startRef, pageToken };
    this.listCalls.push(call);
    await this.options.beforeListCommits?.(call);

    const repository = this.repository(repositoryId);
    const history = this.reachableFrom(repository, startRef);
    const offset = pageToken === null ? 0 : Number.parseInt(pageToken, 10);
    const end = offset + this.pageSize;

    return {
      commits: history.slice(offset, end),
      nextPageToken: end < history.length ? String(end) : null,
    };
  }

  async findReference(
    repositoryId: RepositoryId,
    name: string,
    kind: ResolvedReferenceKind,
  ): Promise<ReferenceTarget | null> {
    const call = { repositoryId, name, kind };
    this.probeCalls.push(call);
    await this.options.beforeFindReference?.(call);

    const repository = this.repository(repositoryId);
    let commitId: string | undefined;
    switch (kind) {
      case "tag":
        commitId = repository.tags?.[name];
        break;
      case "branch":
        commitId = repository.branches?.[name];
        break;
      case "commit":
        commitId = repository.commits.some((commit) => commit.id === name) ? name : undefined;
        break;
    }

    return commitId === undefined ? null : { commitId };
  }
}
