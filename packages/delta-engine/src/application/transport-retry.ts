import { setTimeout as delay } from "node:timers/promises";
import type { RetryOptions } from "../domain/delta-types.js";
import { TransportError } from "../domain/errors.js";

export type RetryEvent = {
  attempt: number;
  delayMs: number;
  error: TransportError;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type TransportRetryOptions = RetryOptions & {
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (event: RetryEvent) => void;
};

export const DEFAULT_MAX_RETRY_DELAY_MS = 30_000;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal === undefined ? undefined : { signal });
};

const shouldRetry = (error: unknown, attempt: number, options: TransportRetryOptions): error is TransportError =>
  error instanceof TransportError &&
  error.retryable &&
  attempt < options.maxRetries &&
  options.signal?.aborted !== true;

export const withTransportRetry = async <T>(
  operation: () => Promise<T>,
  options: TransportRetryOptions,
): Promise<T> => {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (!shouldRetry(error, attempt, options)) {
        throw error;
      }

      const delayMs = Math.min(
        error.retryAfterMs ?? options.baseDelayMs * 2 ** attempt,
        options.maxDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS,
      );
      options.onRetry?.({ attempt: attempt + 1, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
};
