import * as core from "@actions/core";
import pLimit from "p-limit";
import type {
  FetchAttempt,
  FetchError,
  FetchFn,
  FetchResult,
  PagePayload,
} from "../sources/types.js";

export interface BackoffOptions {
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
  jitter: boolean;
}

export interface FetchAllOptions {
  maxConcurrent: number;
  maxRetries: number;
  timeoutMs: number;
  backoff?: BackoffOptions;
  /** Aborts in-flight attempts and keeps anything else from starting. */
  signal?: AbortSignal;
  /** Keeps URLs that have not started yet from starting; in-flight work finishes. */
  stopSignal?: AbortSignal;
  onResult?: (result: FetchResult) => void;
}

const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 500,
  factor: 1.5,
  maxDelayMs: 5000,
  jitter: true,
};

// Statuses that will not change on a second request.
const PERMANENT_STATUSES = new Set([401, 403, 404, 410]);

export function isRetryable(error: FetchError): boolean {
  switch (error.kind) {
    case "timeout":
    case "network":
      return true;
    case "http_status":
      return (
        error.httpStatus === undefined ||
        !PERMANENT_STATUSES.has(error.httpStatus)
      );
    default:
      return false;
  }
}

export function backoffDelay(retry: number, backoff: BackoffOptions): number {
  const exponential = Math.min(
    backoff.maxDelayMs,
    backoff.baseDelayMs * backoff.factor ** retry
  );
  const delay = backoff.jitter
    ? exponential * (0.5 + Math.random() * 0.5)
    : exponential;
  return Math.round(delay);
}

export function hasUsablePayload(payload: PagePayload): boolean {
  return Boolean(
    payload.product?.price ||
      payload.product?.productName ||
      payload.content?.trim()
  );
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function describeThrown(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

async function attemptOnce(
  url: string,
  fetchFn: FetchFn,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<FetchAttempt> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<FetchAttempt>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({
        ok: false,
        kind: "timeout",
        message: `Request timed out after ${timeoutMs}ms`,
      });
    }, timeoutMs);
  });

  const fetched = fetchFn(url, { signal: controller.signal, timeoutMs }).catch(
    (error: unknown): FetchAttempt => {
      if (signal?.aborted) {
        return { ok: false, kind: "cancelled", message: "Fetch cancelled" };
      }
      if (isAbortError(error)) {
        return {
          ok: false,
          kind: "timeout",
          message: `Request timed out after ${timeoutMs}ms`,
        };
      }
      return { ok: false, kind: "network", message: describeThrown(error) };
    }
  );

  try {
    return await Promise.race([fetched, timedOut]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

async function fetchWithRetry(
  url: string,
  index: number,
  fetchFn: FetchFn,
  options: FetchAllOptions
): Promise<FetchResult> {
  const backoff = options.backoff ?? DEFAULT_BACKOFF;
  let lastError: FetchError = { kind: "cancelled", message: "Fetch cancelled" };
  let attempts = 0;

  for (let retry = 0; retry <= options.maxRetries; retry++) {
    // A URL that was already tried keeps its last real error.
    if (options.signal?.aborted) break;

    attempts++;
    const attempt = await attemptOnce(
      url,
      fetchFn,
      options.timeoutMs,
      options.signal
    );

    if (attempt.ok) {
      if (hasUsablePayload(attempt.payload)) {
        return {
          status: "success",
          url,
          index,
          attempts,
          payload: attempt.payload,
        };
      }
      lastError = { kind: "malformed", message: "No extractable content" };
      break;
    }

    lastError = {
      kind: attempt.kind,
      message: attempt.message,
      httpStatus: attempt.httpStatus,
    };

    if (retry === options.maxRetries || !isRetryable(lastError)) break;

    const delay = backoffDelay(retry, backoff);
    core.debug(
      `Retrying ${url} in ${delay}ms (attempt ${attempts + 1}/${options.maxRetries + 1}): ${lastError.message}`
    );
    await sleep(delay, options.signal);
  }

  return { status: "error", url, index, attempts, error: lastError };
}

/**
 * Fetches every URL with at most `maxConcurrent` in flight. Returns exactly one
 * result per input URL, in input order; failures are reported as data.
 */
export async function fetchAll(
  urls: readonly string[],
  fetchFn: FetchFn,
  options: FetchAllOptions
): Promise<FetchResult[]> {
  if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
    throw new RangeError("maxConcurrent must be a positive integer");
  }
  if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
    throw new RangeError("maxRetries must be a non-negative integer");
  }

  const limit = pLimit(options.maxConcurrent);

  return Promise.all(
    urls.map((url, index) =>
      limit(async (): Promise<FetchResult> => {
        let result: FetchResult;
        if (options.signal?.aborted || options.stopSignal?.aborted) {
          result = {
            status: "error",
            url,
            index,
            attempts: 0,
            error: { kind: "cancelled", message: "Not started: gathering stopped" },
          };
        } else {
          result = await fetchWithRetry(url, index, fetchFn, options);
        }
        options.onResult?.(result);
        return result;
      })
    )
  );
}
