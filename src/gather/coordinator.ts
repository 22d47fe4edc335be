import * as core from "@actions/core";
import { fetchAll, type BackoffOptions } from "../fetch/parallel.js";
import { summarizeFetches } from "../fetch/stats.js";
import { dedupCandidates } from "../filter/dedup.js";
import { rankByAuthority, scoreAuthority } from "../scoring/authority.js";
import type {
  Candidate,
  FetchFailure,
  FetchFn,
  FetchResult,
  FetchSuccess,
  GatheringOutcome,
  GatheringStatus,
  RejectedCandidate,
  ScoredSource,
} from "../sources/types.js";
import { validateContent } from "./validation.js";

export interface GatherOptions {
  fetchFn: FetchFn;
  targetCount?: number;
  maxAttempts?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  timeoutMs?: number;
  minContentLength?: number;
  earlyStop?: boolean;
  backoff?: BackoffOptions;
  signal?: AbortSignal;
}

const GATHER_DEFAULTS = {
  targetCount: 3,
  maxAttempts: 5,
  maxConcurrent: 5,
  maxRetries: 2,
  timeoutMs: 10_000,
  minContentLength: 100,
  earlyStop: true,
} as const;

function rejectionFor(result: FetchFailure): RejectedCandidate {
  return {
    url: result.url,
    index: result.index,
    reason: result.error.kind === "timeout" ? "timeout" : "fetch_error",
    detail: result.error.message,
  };
}

function statusFor(
  accepted: number,
  target: number,
  considered: number
): GatheringStatus {
  if (considered === 0) return "no_candidates";
  if (accepted === 0) return "all_failed";
  return accepted >= target ? "complete" : "partial";
}

function emptyOutcome(query: string): GatheringOutcome {
  return {
    query,
    status: "no_candidates",
    accepted: [],
    surplus: [],
    rejected: [],
    skipped: [],
    counters: { attempted: 0, succeeded: 0, failed: 0 },
    fetchStats: {
      total: 0,
      successful: 0,
      failed: 0,
      successRate: 0,
      errorTypes: {},
    },
  };
}

/**
 * Fetches up to `maxAttempts` candidates, keeps the `targetCount` best
 * validated sources by authority, and reports everything else with a reason.
 * Data problems never throw; only invalid options do.
 */
export async function gather(
  query: string,
  candidates: readonly Candidate[],
  options: GatherOptions
): Promise<GatheringOutcome> {
  const targetCount = options.targetCount ?? GATHER_DEFAULTS.targetCount;
  const maxAttempts = options.maxAttempts ?? GATHER_DEFAULTS.maxAttempts;
  const minContentLength =
    options.minContentLength ?? GATHER_DEFAULTS.minContentLength;
  const earlyStop = options.earlyStop ?? GATHER_DEFAULTS.earlyStop;

  if (!Number.isInteger(targetCount) || targetCount <= 0) {
    throw new RangeError("targetCount must be a positive integer");
  }
  if (!Number.isInteger(maxAttempts) || maxAttempts < targetCount) {
    throw new RangeError("maxAttempts must be an integer >= targetCount");
  }

  const toTry = dedupCandidates(candidates).slice(0, maxAttempts);
  if (toTry.length === 0) {
    core.warning(`No candidates to gather for "${query}"`);
    return emptyOutcome(query);
  }

  core.info(
    `Gathering up to ${targetCount} sources from ${toTry.length} candidates`
  );

  const stop = new AbortController();
  let validatedCount = 0;

  const onResult = (result: FetchResult) => {
    if (result.status === "error") {
      if (result.error.kind !== "cancelled") {
        core.warning(`  Failed ${result.url}: ${result.error.message}`);
      }
      return;
    }
    if (validateContent(result.payload, minContentLength).valid) {
      validatedCount++;
      if (earlyStop && validatedCount >= targetCount && !stop.signal.aborted) {
        core.info(`  Collected ${validatedCount} usable sources, stopping early`);
        stop.abort();
      }
    }
  };

  const results = await fetchAll(
    toTry.map((c) => c.url),
    options.fetchFn,
    {
      maxConcurrent: options.maxConcurrent ?? GATHER_DEFAULTS.maxConcurrent,
      maxRetries: options.maxRetries ?? GATHER_DEFAULTS.maxRetries,
      timeoutMs: options.timeoutMs ?? GATHER_DEFAULTS.timeoutMs,
      backoff: options.backoff,
      signal: options.signal,
      stopSignal: stop.signal,
      onResult,
    }
  );

  const validated: ScoredSource[] = [];
  const rejected: RejectedCandidate[] = [];
  const skipped: string[] = [];

  for (const result of results) {
    if (result.status === "error") {
      if (result.error.kind === "cancelled") {
        skipped.push(result.url);
      } else {
        rejected.push(rejectionFor(result));
      }
      continue;
    }

    const verdict = validateContent(result.payload, minContentLength);
    if (!verdict.valid) {
      rejected.push({
        url: result.url,
        index: result.index,
        reason: "insufficient_content",
        detail: verdict.detail,
      });
      continue;
    }

    validated.push(scoreSource(result, toTry[result.index] ?? { url: result.url }));
  }

  const ranked = rankByAuthority(validated);
  const accepted = ranked.slice(0, targetCount);
  const fetchStats = summarizeFetches(results);

  core.info(
    `  ${accepted.length} accepted, ${rejected.length} rejected, ${skipped.length} skipped (${fetchStats.successRate}% fetch success)`
  );

  return {
    query,
    status: statusFor(accepted.length, targetCount, toTry.length),
    accepted,
    surplus: ranked.slice(targetCount),
    rejected,
    skipped,
    counters: {
      attempted: fetchStats.total,
      succeeded: fetchStats.successful,
      failed: fetchStats.failed,
    },
    fetchStats,
  };
}

export function scoreSource(
  result: FetchSuccess,
  candidate: Candidate
): ScoredSource {
  const title = result.payload.title ?? candidate.title ?? "";
  return {
    ...result,
    candidate,
    authority: scoreAuthority(result.url, title, result.payload.content ?? ""),
  };
}
