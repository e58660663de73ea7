import type { RepositoryId } from "@refdelta/core";
import { REFERENCE_PROBE_ORDER, type ReferenceKind } from "../domain/delta-types.js";
import type { CommitTransport } from "./commit-transport.js";
import { withTransportRetry, type TransportRetryOptions } from "./transport-retry.js";

export type ReferenceProbeEvent = {
  name: string;
  kind: ReferenceKind["kind"];
};

/**
 * Tags win over branches, branches over raw commit ids. A transport failure in
 * any probe rejects instead of falling through to the next kind, and so does
 * an aborted signal: no lookup is sent after it.
 */
export const resolveReference = async (
  transport: CommitTransport,
  repositoryId: RepositoryId,
  name: string,
  options: TransportRetryOptions,
  onResolved?: (event: ReferenceProbeEvent) => void,
): Promise<ReferenceKind> => {
  for (const kind of REFERENCE_PROBE_ORDER) {
    options.signal?.throwIfAborted();
    const target = await withTransportRetry(
      () => transport.findReference(repositoryId, name, kind, options.signal),
      options,
    );
    if (target !== null) {
      onResolved?.({ name, kind });
      return { kind, name, commitId: target.commitId };
    }
  }

  onResolved?.({ name, kind: "unresolved" });
  return { kind: "unresolved", name };
};
