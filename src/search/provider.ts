import * as core from "@actions/core";
import type { ResearchContext } from "../context.js";
import type { Candidate } from "../sources/types.js";

export interface SearchOptions {
  count: number;
  country?: string;
  language?: string;
}

export interface SearchProvider {
  readonly name: string;
  search(query: string, options: SearchOptions): Promise<Candidate[]>;
}

export interface SearchOutcome {
  query: string;
  candidates: Candidate[];
  error?: string;
}

/**
 * Runs one search against the provider, charging it to the context's quota.
 * Provider failures and an exhausted quota come back in `error`.
 */
export async function searchCandidates(
  provider: SearchProvider,
  query: string,
  options: SearchOptions,
  context: ResearchContext
): Promise<SearchOutcome> {
  if (!context.consumeSearch()) {
    const error = `Search quota of ${context.searchQuota} exhausted`;
    core.warning(error);
    return { query, candidates: [], error };
  }

  try {
    const candidates = await provider.search(query, options);
    core.info(`  ${provider.name} returned ${candidates.length} results`);
    return { query, candidates };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.warning(`Search failed for "${query}": ${message}`);
    return { query, candidates: [], error: message };
  }
}
