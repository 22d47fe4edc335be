import * as cheerio from "cheerio";
import type { FetchAttempt, FetchFn, PagePayload } from "../sources/types.js";
import { extractPage } from "./page.js";
import {
  extractProductFrom,
  hasProductEvidence,
  isProductUrl,
} from "./product.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface PageFetcherOptions {
  maxContentLength?: number;
  /** Bytes of HTML read before the rest of the response is dropped. */
  maxBodyBytes?: number;
  userAgent?: string;
  /** Treat every page as a product page, e.g. for shopping queries. */
  productMode?: boolean;
  fetchFn?: typeof fetch;
}

const DEFAULT_MAX_BODY_BYTES = 2_000_000;

export function httpErrorMessage(status: number): string {
  if (status === 404) return "Page not found (404)";
  if (status === 403) {
    return "Access forbidden (403). The website may be blocking automated requests.";
  }
  return `HTTP error ${status}`;
}

export function parsePage(
  html: string,
  url: string,
  options: Pick<PageFetcherOptions, "maxContentLength" | "productMode"> = {}
): PagePayload {
  const page = extractPage(html, options.maxContentLength);
  const productUrl = isProductUrl(url);

  if (!options.productMode && !productUrl) {
    return { kind: "page", ...page };
  }

  const $ = cheerio.load(html);
  const product = extractProductFrom($, url);
  if (!productUrl && !hasProductEvidence($, product)) {
    return { kind: "page", ...page };
  }
  return {
    kind: "product",
    ...page,
    title: page.title ?? product.productName,
    product,
  };
}

async function readBody(response: Response, maxBytes: number): Promise<string> {
  if (!response.body) return "";
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = "";
  let received = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const remaining = maxBytes - received;
    const chunk =
      value.byteLength > remaining ? value.subarray(0, remaining) : value;
    received += chunk.byteLength;
    text += decoder.decode(chunk, { stream: true });
    if (received >= maxBytes) {
      await reader.cancel();
      break;
    }
  }

  return text + decoder.decode();
}

/**
 * The HTTP-backed fetch capability handed to the parallel fetcher. Status and
 * scheme problems come back as failed attempts; transport errors propagate and
 * are classified by the fetcher.
 */
export function createPageFetcher(options: PageFetcherOptions = {}): FetchFn {
  const fetcher = options.fetchFn ?? fetch;

  return async (url, { signal }): Promise<FetchAttempt> => {
    if (!/^https?:\/\//i.test(url)) {
      return {
        ok: false,
        kind: "malformed",
        message: "Invalid URL format. URL must start with http:// or https://",
      };
    }

    const response = await fetcher(url, {
      signal,
      redirect: "follow",
      headers: {
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        Accept:
          "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
    });

    if (!response.ok) {
      await response.body?.cancel();
      return {
        ok: false,
        kind: "http_status",
        httpStatus: response.status,
        message: httpErrorMessage(response.status),
      };
    }

    const html = await readBody(
      response,
      options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES
    );
    return { ok: true, payload: parsePage(html, url, options) };
  };
}
