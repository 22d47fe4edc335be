import type { GatheringStatus } from "./sources/types.js";

export interface QueryRecord {
  query: string;
  finalQuery: string;
  status: GatheringStatus;
  sourcesAccepted: number;
  at: string;
}

/**
 * Per-process research state: the search quota and the history of queries
 * run so far. Created once by the entry point and passed down explicitly.
 */
export class ResearchContext {
  private searchesUsed = 0;
  private readonly history: QueryRecord[] = [];

  constructor(readonly searchQuota: number) {
    if (!Number.isInteger(searchQuota) || searchQuota < 0) {
      throw new RangeError("searchQuota must be a non-negative integer");
    }
  }

  get remainingSearches(): number {
    return this.searchQuota - this.searchesUsed;
  }

  /** Returns false, without consuming anything, once the quota is spent. */
  consumeSearch(): boolean {
    if (this.remainingSearches <= 0) return false;
    this.searchesUsed++;
    return true;
  }

  remember(record: QueryRecord): void {
    this.history.push(record);
  }

  // Newest first.
  recentQueries(limit = 5): QueryRecord[] {
    return this.history.slice(-limit).reverse();
  }
}
