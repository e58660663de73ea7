import type { DeltaResult, RunSummary } from "@refdelta/core";

export type TransportErrorOptions = {
  status: number | null;
  retryable: boolean;
  retryAfterMs?: number | null;
};

export class TransportError extends Error {
  readonly status: number | null;
  readonly retryable: boolean;
  readonly retryAfterMs: number | null;

  constructor(message: string, options: TransportErrorOptions) {
    super(message);
    this.name = "TransportError";
    this.status = options.status;
    this.retryable = options.retryable;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export class RunCancelledError extends Error {
  readonly results: readonly DeltaResult[];
  readonly summary: RunSummary;
  readonly reason: "timeout" | "aborted";

  constructor(
    reason: "timeout" | "aborted",
    results: readonly DeltaResult[],
    summary: RunSummary,
  ) {
    super(
      reason === "timeout"
        ? `delta discovery timed out after ${results.length} repositories`
        : `delta discovery cancelled after ${results.length} repositories`,
    );
    this.name = "RunCancelledError";
    this.reason = reason;
    this.results = results;
    this.summary = summary;
  }
}

export class InvalidDateWindowError extends Error {
  readonly value: string;

  constructor(message: string, value: string) {
    super(message);
    this.name = "InvalidDateWindowError";
    this.value = value;
  }
}
