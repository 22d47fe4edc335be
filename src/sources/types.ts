export interface Candidate {
  url: string;
  title?: string;
  snippet?: string;
  publishedAt?: string;
}

export interface ProductDetails {
  productName?: string;
  price?: string;
  listPrice?: string;
  currency?: string;
  availability?: string;
  rating?: number;
  reviewCount?: number;
  features?: string[];
  images?: string[];
  brand?: string;
  description?: string;
  specifications?: Record<string, string>;
}

export interface PagePayload {
  kind: "page" | "product";
  title?: string;
  content?: string;
  author?: string;
  publishedAt?: string;
  product?: ProductDetails;
}

export type FetchErrorKind =
  | "network"
  | "http_status"
  | "timeout"
  | "malformed"
  | "cancelled";

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  httpStatus?: number;
}

/** What a single fetch attempt reports back to the parallel fetcher. */
export type FetchAttempt =
  | { ok: true; payload: PagePayload }
  | ({ ok: false } & FetchError);

export interface FetchFnOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

export type FetchFn = (
  url: string,
  options: FetchFnOptions
) => Promise<FetchAttempt>;

export interface FetchSuccess {
  readonly status: "success";
  readonly url: string;
  readonly index: number;
  readonly attempts: number;
  readonly payload: Readonly<PagePayload>;
}

export interface FetchFailure {
  readonly status: "error";
  readonly url: string;
  readonly index: number;
  readonly attempts: number;
  readonly error: Readonly<FetchError>;
}

export type FetchResult = FetchSuccess | FetchFailure;

export type AuthorityCategory =
  | "Academic/Government"
  | "Medical Authority"
  | "News/Tech"
  | "Encyclopedia"
  | "General"
  | "User-Generated";

export interface AuthorityScore {
  score: number;
  category: AuthorityCategory;
  reasons: string[];
}

export interface ScoredSource extends FetchSuccess {
  readonly candidate: Candidate;
  readonly authority: AuthorityScore;
}

export type RejectionReason = "fetch_error" | "timeout" | "insufficient_content";

export interface RejectedCandidate {
  url: string;
  index: number;
  reason: RejectionReason;
  detail: string;
}

export type GatheringStatus =
  | "complete"
  | "partial"
  | "all_failed"
  | "no_candidates";

export interface FetchStats {
  total: number;
  successful: number;
  failed: number;
  successRate: number;
  errorTypes: Partial<Record<FetchErrorType, number>>;
}

export type FetchErrorType =
  | "not_found"
  | "forbidden"
  | "timeout"
  | "connection_error"
  | "other_error";

export interface GatheringOutcome {
  query: string;
  status: GatheringStatus;
  accepted: ScoredSource[];
  surplus: ScoredSource[];
  rejected: RejectedCandidate[];
  skipped: string[];
  counters: {
    attempted: number;
    succeeded: number;
    failed: number;
  };
  fetchStats: FetchStats;
}
