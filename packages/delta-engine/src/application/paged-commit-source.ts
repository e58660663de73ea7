import type { RepositoryId } from "@refdelta/core";
import type { CommitPage, CommitTransport } from "./commit-transport.js";
import { withTransportRetry, type TransportRetryOptions } from "./transport-retry.js";

/**
 * Lazily walks the commit pages reachable from `startRef`. The sequence ends
 * when the transport reports no next page; a new call starts over from the
 * first page. No request is issued once `options.signal` is aborted.
 */
export async function* readCommitPages(
  transport: CommitTransport,
  repositoryId: RepositoryId,
  startRef: string,
  options: TransportRetryOptions,
): AsyncGenerator<CommitPage, void, undefined> {
  let pageToken: string | null = null;

  do {
    if (options.signal?.aborted === true) {
      return;
    }

    const token: string | null = pageToken;
    const page: CommitPage = await withTransportRetry(
      () => transport.listCommits(repositoryId, startRef, token, options.signal),
      options,
    );
    yield page;
    pageToken = page.nextPageToken;
  } while (pageToken !== null);
}
