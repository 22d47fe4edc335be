import * as core from "@actions/core";
import type { Candidate } from "../sources/types.js";

const TRACKING_PARAMS = /^(?:utm_\w+|gclid|fbclid|ref|ref_src)$/i;

/**
 * Canonical form used to spot the same page behind cosmetic URL differences:
 * host case, `www.`, trailing slashes, fragments and tracking parameters.
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const host = parsed.hostname.toLowerCase().replace(/^www\./, "");
    const path =
      parsed.pathname.length > 1 ? parsed.pathname.replace(/\/+$/, "") : "";
    const params = [...parsed.searchParams.entries()]
      .filter(([key]) => !TRACKING_PARAMS.test(key))
      .map(([key, value]) => `${key}=${value}`)
      .sort();
    const query = params.length > 0 ? `?${params.join("&")}` : "";
    return `${parsed.protocol}//${host}${path}${query}`;
  } catch {
    return url.trim().toLowerCase();
  }
}

// Keeps the first occurrence, so the search engine's ordering survives.
export function dedupCandidates(candidates: readonly Candidate[]): Candidate[] {
  const seen = new Set<string>();
  const unique: Candidate[] = [];

  for (const candidate of candidates) {
    const key = normalizeUrl(candidate.url);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(candidate);
  }

  if (unique.length < candidates.length) {
    core.info(
      `Dedup: ${candidates.length} → ${unique.length} candidates`
    );
  }
  return unique;
}
