import type { CommitRecord, RepositoryId } from "@refdelta/core";
import type { ResolvedReferenceKind } from "../domain/delta-types.js";

export type CommitPage = {
  commits: readonly CommitRecord[];
  nextPageToken: string | null;
};

export type ReferenceTarget = {
  commitId: string;
};

/**
 * Remote history access. Implementations throw `TransportError` for anything
 * other than an absent reference, which `findReference` reports as `null`.
 */
export interface CommitTransport {
  listCommits(
    repositoryId: RepositoryId,
    startRef: string,
    pageToken: string | null,
    signal?: AbortSignal,
  ): Promise<CommitPage>;
  findReference(
    repositoryId: RepositoryId,
    name: string,
    kind: ResolvedReferenceKind,
    signal?: AbortSignal,
  ): Promise<ReferenceTarget | null>;
}
