import type { PagePayload } from "../sources/types.js";

export type ValidationVerdict =
  | { valid: true }
  | { valid: false; detail: string };

const PRODUCT_QUERY_WORDS = [
  "price",
  "prices",
  "cost",
  "buy",
  "purchase",
  "cheapest",
  "best deal",
  "discount",
];

export function isProductQuery(query: string): boolean {
  const lower = query.toLowerCase();
  return PRODUCT_QUERY_WORDS.some((word) =>
    new RegExp(`\\b${word}\\b`).test(lower)
  );
}

/**
 * Product pages count when they yielded a price or a product name; anything
 * else needs more than `minContentLength` characters of text.
 */
export function validateContent(
  payload: PagePayload,
  minContentLength: number
): ValidationVerdict {
  if (payload.kind === "product") {
    if (payload.product?.price || payload.product?.productName) {
      return { valid: true };
    }
    return { valid: false, detail: "No price or product name extracted" };
  }

  const length = payload.content?.trim().length ?? 0;
  if (length > minContentLength) return { valid: true };
  return {
    valid: false,
    detail: `Only ${length} characters of content (need more than ${minContentLength})`,
  };
}
