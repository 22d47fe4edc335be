import { describe, it, expect } from "vitest";
import type { QueryClassification } from "../../src/classifier/llm.js";
import {
  buildReport,
  escapeTableCell,
  excerpt,
  reportableSources,
} from "../../src/output/report.js";
import { categorize } from "../../src/scoring/authority.js";
import type {
  GatheringOutcome,
  PagePayload,
  ScoredSource,
} from "../../src/sources/types.js";

const classification: QueryClassification = {
  queryType: "factual",
  complexityScore: 2,
  researchStrategy: "quick-answer",
  keyTopics: ["tea"],
  productIntent: false,
  reasoning: "",
  source: "heuristic",
};

function source(
  index: number,
  url: string,
  score: number,
  payload: PagePayload,
  reasons: string[] = []
): ScoredSource {
  return {
    status: "success",
    url,
    index,
    attempts: 1,
    payload,
    candidate: { url },
    authority: { score, category: categorize(score), reasons },
  };
}

function outcome(overrides: Partial<GatheringOutcome>): GatheringOutcome {
  return {
    query: "green tea benefits",
    status: "complete",
    accepted: [],
    surplus: [],
    rejected: [],
    skipped: [],
    counters: { attempted: 0, succeeded: 0, failed: 0 },
    fetchStats: { total: 0, successful: 0, failed: 0, successRate: 0, errorTypes: {} },
    ...overrides,
  };
}

describe("escapeTableCell", () => {
  it("escapes pipe characters", () => {
    expect(escapeTableCell("a|b|c")).toBe("a\\|b\\|c");
  });

  it("replaces newlines with spaces", () => {
    expect(escapeTableCell("line1\nline2")).toBe("line1 line2");
  });
});

describe("excerpt", () => {
  it("collapses whitespace and cuts long text", () => {
    expect(excerpt("abcdefghij   klmnop", 11)).toBe("abcdefghij...");
    expect(excerpt(" short\ntext ", 50)).toBe("short text");
  });
});

describe("buildReport", () => {
  it("renders findings, sources and unavailable URLs", () => {
    const report = buildReport(
      "green tea benefits",
      classification,
      outcome({
        status: "partial",
        accepted: [
          source(
            0,
            "https://example.edu/tea",
            8.5,
            { kind: "page", title: "Tea Study", content: "Green tea contains\n catechins." },
            ["Academic or government domain", "Secure connection (HTTPS)"]
          ),
        ],
        rejected: [
          {
            url: "https://bad.example.com/a|b",
            index: 1,
            reason: "fetch_error",
            detail: "HTTP error 500\nretry",
          },
        ],
      })
    );

    expect(report).toBe(
      [
        "# Research: green tea benefits",
        "",
        "**Query type:** factual | **Strategy:** quick-answer | **Status:** partial",
        "",
        "Gathered 1 source, 1 unavailable.",
        "",
        "## Findings",
        "",
        "### [1] Tea Study",
        "",
        "**Authority:** 8.5/10 (Academic/Government)",
        "",
        "> Green tea contains catechins.",
        "",
        "## Sources",
        "",
        "[1] Tea Study - https://example.edu/tea",
        "Credibility: High | Academic or government domain; Secure connection (HTTPS)",
        "",
        "## Unavailable Sources",
        "",
        "| URL | Reason | Detail |",
        "|-----|--------|--------|",
        "| https://bad.example.com/a\\|b | fetch_error | HTTP error 500 retry |",
        "",
      ].join("\n")
    );
  });

  it("lists product facts", () => {
    const report = buildReport(
      "kettle price",
      classification,
      outcome({
        accepted: [
          source(0, "https://www.amazon.com/dp/B0TEST", 5.5, {
            kind: "product",
            title: "Kettle",
            product: {
              productName: "Kettle",
              price: "$24.99",
              listPrice: "$29.99",
              availability: "In Stock",
              rating: 4.3,
              reviewCount: 1204,
            },
          }),
        ],
      })
    );

    expect(report).toContain(
      [
        "- **Product:** Kettle",
        "- **Price:** $24.99 (list $29.99)",
        "- **Availability:** In Stock",
        "- **Rating:** 4.3 (1204 reviews)",
      ].join("\n")
    );
    expect(report).toContain("Credibility: Low\n");
  });

  it("leaves out sources under the minimum authority and renumbers", () => {
    const report = buildReport(
      "q",
      classification,
      outcome({
        accepted: [
          source(0, "https://blog.example.com", 3.5, { kind: "page", title: "Blog", content: "text" }),
          source(1, "https://example.gov", 8, { kind: "page", title: "Agency", content: "text" }),
        ],
      }),
      { minAuthorityScore: 4 }
    );

    expect(report).toContain("[1] Agency - https://example.gov");
    expect(report).not.toContain("Blog");
    expect(report).toContain("Gathered 1 source.");
  });

  it("uses the candidate title and snippet when the page has none", () => {
    const accepted: ScoredSource = {
      ...source(0, "https://example.com", 5.5, { kind: "page" }),
      candidate: { url: "https://example.com", title: "From search", snippet: "Search snippet" },
    };

    const report = buildReport("q", classification, outcome({ accepted: [accepted] }));

    expect(report).toContain("### [1] From search");
    expect(report).toContain("> Search snippet");
  });

  it("explains an empty outcome", () => {
    const empty = buildReport("q", classification, outcome({ status: "no_candidates" }));
    expect(empty).toContain("No candidate sources were found for this query.");
    expect(empty).not.toContain("## Sources");

    const failed = buildReport("q", classification, outcome({ status: "all_failed" }));
    expect(failed).toContain("None of the candidate sources could be used.");
  });

  it("mentions skipped candidates", () => {
    const report = buildReport(
      "q",
      classification,
      outcome({
        accepted: [source(0, "https://a.example.com", 5.5, { kind: "page", content: "text" })],
        skipped: ["https://b.example.com", "https://c.example.com"],
      })
    );
    expect(report).toContain("Gathered 1 source, 2 not needed.");
  });

  it("lists key facts and conflicts before the findings", () => {
    const report = buildReport(
      "q",
      classification,
      outcome({
        accepted: [
          source(0, "https://example.gov", 8, { kind: "page", title: "Agency", content: "text" }),
          source(1, "https://example.com", 5.5, { kind: "page", title: "Site", content: "text" }),
        ],
      }),
      {
        analysis: {
          keyFacts: [
            { statement: "Tea has catechins.", sources: [1, 2], confidence: "high" },
          ],
          conflicts: ["Sources disagree on brewing time."],
          summary: "",
          source: "llm",
        },
      }
    );

    expect(report).toContain(
      [
        "Gathered 2 sources.",
        "",
        "## Key Facts",
        "",
        "- Tea has catechins. [1][2] (high confidence)",
        "",
        "## Conflicting Information",
        "",
        "- Sources disagree on brewing time.",
        "",
        "## Findings",
      ].join("\n")
    );
  });

  it("says so when every source is under the minimum authority", () => {
    const report = buildReport(
      "q",
      classification,
      outcome({
        accepted: [
          source(0, "https://blog.example.com", 3.5, { kind: "page", title: "Blog", content: "text" }),
        ],
      }),
      { minAuthorityScore: 6 }
    );

    expect(report).toContain("No source reached the minimum authority score of 6.");
    expect(report).not.toContain("## Findings");
  });
});

describe("reportableSources", () => {
  it("keeps ranked sources at or above the minimum", () => {
    const kept = reportableSources(
      outcome({
        accepted: [
          source(0, "https://example.gov", 8, { kind: "page" }),
          source(1, "https://a.example.com", 6, { kind: "page" }),
          source(2, "https://blog.example.com", 3.5, { kind: "page" }),
        ],
      }),
      6
    );

    expect(kept.map((s) => s.url)).toEqual(["https://example.gov", "https://a.example.com"]);
  });
});
