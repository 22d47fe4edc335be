import type {
  FetchError,
  FetchErrorType,
  FetchResult,
  FetchStats,
} from "../sources/types.js";

export function classifyFetchError(error: FetchError): FetchErrorType {
  if (error.httpStatus === 404) return "not_found";
  if (error.httpStatus === 403) return "forbidden";
  if (error.kind === "timeout") return "timeout";
  if (error.kind === "network") return "connection_error";
  return "other_error";
}

// Cancelled URLs were never attempted and are left out of the totals.
export function summarizeFetches(results: readonly FetchResult[]): FetchStats {
  const attempted = results.filter(
    (r) => r.status === "success" || r.error.kind !== "cancelled"
  );
  const errorTypes: FetchStats["errorTypes"] = {};
  let successful = 0;

  for (const result of attempted) {
    if (result.status === "success") {
      successful++;
      continue;
    }
    const type = classifyFetchError(result.error);
    errorTypes[type] = (errorTypes[type] ?? 0) + 1;
  }

  const total = attempted.length;
  const successRate =
    total > 0 ? Math.round((successful / total) * 10_000) / 100 : 0;

  return {
    total,
    successful,
    failed: total - successful,
    successRate,
    errorTypes,
  };
}
