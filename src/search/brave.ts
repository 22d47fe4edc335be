import { z } from "zod";
import type { Candidate } from "../sources/types.js";
import type { SearchOptions, SearchProvider } from "./provider.js";

export const BRAVE_SEARCH_URL = "https://api.search.brave.com/res/v1/web/search";

const BraveResultSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  page_age: z.string().optional(),
  age: z.string().optional(),
});

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z.array(BraveResultSchema).default([]),
    })
    .optional(),
});

type BraveResult = z.infer<typeof BraveResultSchema>;

// Brave wraps matched terms in <strong> tags.
function stripMarkup(text: string | undefined): string | undefined {
  if (text === undefined) return undefined;
  return text.replace(/<[^>]+>/g, "").trim();
}

function toCandidate(result: BraveResult): Candidate {
  return {
    url: result.url,
    title: stripMarkup(result.title),
    snippet: stripMarkup(result.description),
    publishedAt: result.page_age ?? result.age,
  };
}

export class BraveSearchProvider implements SearchProvider {
  readonly name = "Brave Search";

  constructor(
    private readonly apiKey: string,
    private readonly fetchFn: typeof fetch = fetch
  ) {
    if (!apiKey) {
      throw new Error("Brave Search API key is required");
    }
  }

  async search(query: string, options: SearchOptions): Promise<Candidate[]> {
    const params = new URLSearchParams({
      q: query,
      count: String(options.count),
    });
    if (options.country) params.append("country", options.country);
    if (options.language) params.append("search_lang", options.language);

    const response = await this.fetchFn(`${BRAVE_SEARCH_URL}?${params}`, {
      method: "GET",
      headers: {
        Accept: "application/json",
        "X-Subscription-Token": this.apiKey,
      },
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Brave Search API error (${response.status}): ${body}`);
    }

    const data = BraveResponseSchema.parse(await response.json());
    return (data.web?.results ?? [])
      .filter((r) => /^https?:\/\//i.test(r.url))
      .map(toCandidate);
  }
}
