import type { CommitRecord, RepositoryDescriptor, RepositoryId } from "@refdelta/core";
import type { CommitPage, CommitTransport, ReferenceTarget } from "../application/commit-transport.js";
import type { ResolvedReferenceKind } from "../domain/delta-types.js";
import { TransportError } from "../domain/errors.js";

export type GitLabTransportOptions = {
  baseUrl: string;
  token: string;
  apiVersion?: string;
  perPage?: number;
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
};

type JsonObject = Readonly<Record<string, unknown>>;

type GitLabResponse =
  | { found: false }
  | { found: true; body: unknown; headers: Headers };

const DEFAULT_PER_PAGE = 100;
const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (payload: JsonObject, key: string): string => {
  const value = payload[key];
  return typeof value === "string" ? value : "";
};

const readStringArray = (payload: JsonObject, key: string): readonly string[] => {
  const value = payload[key];
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter((entry): entry is string => typeof entry === "string");
};

const parseRetryAfterMs = (value: string | null): number | null => {
  if (value === null) {
    return null;
  }

  const seconds = Number.parseInt(value, 10);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }

  return seconds * 1000;
};

const shouldRetryStatus = (status: number): boolean => status === 429 || status >= 500;

const describeStatus = (status: number): string => {
  switch (status) {
    case 401:
      return "authentication failed, check the access token";
    case 403:
      return "access forbidden, check the token permissions";
    case 429:
      return "rate limited";
    default:
      return `request failed with status ${status}`;
  }
};

const encodeRepositoryId = (repositoryId: RepositoryId): string =>
  typeof repositoryId === "number" ? String(repositoryId) : encodeURIComponent(repositoryId);

export const parseGitLabCommit = (payload: unknown): CommitRecord | null => {
  if (!isObject(payload)) {
    return null;
  }

  const id = readString(payload, "id");
  if (id.length === 0) {
    return null;
  }

  return {
    id,
    shortId: readString(payload, "short_id") || id.slice(0, 8),
    title: readString(payload, "title"),
    message: readString(payload, "message"),
    authorName: readString(payload, "author_name"),
    authorEmail: readString(payload, "author_email"),
    authoredAt: readString(payload, "authored_date"),
    committerName: readString(payload, "committer_name"),
    committerEmail: readString(payload, "committer_email"),
    committedAt: readString(payload, "committed_date"),
    parentIds: readStringArray(payload, "parent_ids"),
    webUrl: readString(payload, "web_url"),
  };
};

const readReferenceCommitId = (body: unknown, kind: ResolvedReferenceKind): string | null => {
  if (!isObject(body)) {
    return null;
  }

  if (kind === "commit") {
    const id = readString(body, "id");
    return id.length > 0 ? id : null;
  }

  const commit = body["commit"];
  if (!isObject(commit)) {
    return null;
  }

  const id = readString(commit, "id");
  return id.length > 0 ? id : null;
};

const referencePath = (kind: ResolvedReferenceKind): string => {
  switch (kind) {
    case "tag":
      return "repository/tags";
    case "branch":
      return "repository/branches";
    case "commit":
      return "repository/commits";
  }
};

export class GitLabCommitTransport implements CommitTransport {
  private readonly apiBase: string;
  private readonly perPage: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GitLabTransportOptions) {
    this.apiBase = `${options.baseUrl.replace(/\/+$/, "")}/api/${options.apiVersion ?? "v4"}`;
    this.perPage = Math.min(Math.max(1, options.perPage ?? DEFAULT_PER_PAGE), 100);
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async request(path: string, signal: AbortSignal | undefined): Promise<GitLabResponse> {
    signal?.throwIfAborted();
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await this.fetchImpl(`${this.apiBase}/${path}`, {
        headers: { "PRIVATE-TOKEN": this.options.token, Accept: "application/json" },
        signal: controller.signal,
      });

      if (response.status === 404) {
        return { found: false };
      }

      if (!response.ok) {
        throw new TransportError(`${describeStatus(response.status)}: ${path}`, {
          status: response.status,
          retryable: shouldRetryStatus(response.status),
          retryAfterMs: parseRetryAfterMs(response.headers.get("retry-after")),
        });
      }

      return { found: true, body: await response.json(), headers: response.headers };
    } catch (error) {
      if (error instanceof TransportError || signal?.aborted === true) {
        throw error;
      }

      const message = timedOut
        ? `request timed out after ${this.requestTimeoutMs}ms: ${path}`
        : `request failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new TransportError(message, { status: null, retryable: true });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  async listCommits(
    repositoryId: RepositoryId,
    startRef: string,
    pageToken: string | null,
    signal?: AbortSignal,
  ): Promise<CommitPage> {
    const query = new URLSearchParams({
      ref_name: startRef,
      per_page: String(this.perPage),
      page: pageToken ?? "1",
    });
    const path = `projects/${encodeRepositoryId(repositoryId)}/repository/commits?${query.toString()}`;
    const response = await this.request(path, signal);
    if (!response.found) {
      throw new TransportError(`repository or ref not found: ${path}`, { status: 404, retryable: false });
    }

    if (!Array.isArray(response.body)) {
      throw new TransportError(`unexpected commit list payload: ${path}`, { status: null, retryable: false });
    }

    const commits = response.body
      .map((entry) => parseGitLabCommit(entry))
      .filter((commit): commit is CommitRecord => commit !== null);
    const nextPage = response.headers.get("x-next-page");

    return {
      commits,
      nextPageToken: nextPage === null || nextPage.trim().length === 0 ? null : nextPage.trim(),
    };
  }

  async findReference(
    repositoryId: RepositoryId,
    name: string,
    kind: ResolvedReferenceKind,
    signal?: AbortSignal,
  ): Promise<ReferenceTarget | null> {
    const path = `projects/${encodeRepositoryId(repositoryId)}/${referencePath(kind)}/${encodeURIComponent(name)}`;
    const response = await this.request(path, signal);
    if (!response.found) {
      return null;
    }

    const commitId = readReferenceCommitId(response.body, kind);
    if (commitId === null) {
      throw new TransportError(`unexpected ${kind} payload: ${path}`, { status: null, retryable: false });
    }

    return { commitId };
  }

  async getRepository(idOrPath: RepositoryId, signal?: AbortSignal): Promise<RepositoryDescriptor | null> {
    const response = await this.request(`projects/${encodeRepositoryId(idOrPath)}`, signal);
    if (!response.found || !isObject(response.body)) {
      return null;
    }

    const id = response.body["id"];
    if (typeof id !== "number" && typeof id !== "string") {
      return null;
    }

    return {
      id,
      path: readString(response.body, "path_with_namespace"),
      displayName: readString(response.body, "name"),
      webUrl: readString(response.body, "web_url"),
    };
  }
}
