import { describe, it, expect, vi, type Mock } from "vitest";
import type { SourceAnalysis } from "../src/analysis/llm.js";
import type { QueryClassification } from "../src/classifier/llm.js";
import { ResearchConfigSchema } from "../src/config.js";
import { ResearchContext } from "../src/context.js";
import {
  reformulateQuery,
  runPipeline,
  type PipelineDeps,
} from "../src/pipeline.js";
import type { FetchAttempt, FetchFn } from "../src/sources/types.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
  debug: vi.fn(),
}));

const config = ResearchConfigSchema.parse({
  gathering: {
    backoff: { base_delay_ms: 0, max_delay_ms: 0, jitter: false },
  },
});

const classification: QueryClassification = {
  queryType: "exploratory",
  complexityScore: 5,
  researchStrategy: "multi-source",
  keyTopics: ["green", "tea"],
  productIntent: false,
  reasoning: "",
  source: "heuristic",
};

const page: FetchAttempt = {
  ok: true,
  payload: { kind: "page", title: "Tea", content: "Lorem ipsum dolor sit amet. ".repeat(10) },
};

const analysis: SourceAnalysis = {
  keyFacts: [{ statement: "Green tea is brewed cool.", sources: [1], confidence: "medium" }],
  conflicts: [],
  summary: "One fact.",
  source: "llm",
};

function makeDeps(searchResults: string[][]): PipelineDeps & {
  search: Mock<PipelineDeps["search"]>;
  analyze: Mock<PipelineDeps["analyze"]>;
  publish: Mock<PipelineDeps["publish"]>;
} {
  const search = vi.fn<PipelineDeps["search"]>();
  for (const urls of searchResults) {
    search.mockImplementationOnce(async (query) => ({
      query,
      candidates: urls.map((url) => ({ url })),
    }));
  }
  const fetchFn: FetchFn = async () => page;

  return {
    classify: vi.fn(async () => classification),
    search,
    createFetcher: vi.fn(() => fetchFn),
    analyze: vi.fn<PipelineDeps["analyze"]>().mockResolvedValue(analysis),
    publish: vi.fn<PipelineDeps["publish"]>().mockResolvedValue(1),
  };
}

describe("runPipeline", () => {
  it("classifies, gathers, reports and publishes", async () => {
    const deps = makeDeps([
      ["https://a.example.com", "https://b.example.com", "https://c.example.com"],
    ]);
    const context = new ResearchContext(10);

    const result = await runPipeline("green tea", config, deps, context, false);

    expect(deps.classify).toHaveBeenCalledWith("green tea");
    expect(deps.search).toHaveBeenCalledWith("green tea", context);
    expect(deps.createFetcher).toHaveBeenCalledWith(classification);
    expect(result).toMatchObject({
      finalQuery: "green tea",
      reformulated: false,
      status: "complete",
      sourcesAccepted: 3,
      sourcesRejected: 0,
      issuesCreated: 1,
    });
    expect(result.report).toContain("# Research: green tea");
    expect(deps.analyze).toHaveBeenCalledWith(
      "green tea",
      classification,
      expect.arrayContaining([expect.objectContaining({ url: "https://a.example.com" })])
    );
    expect(result.report).toContain("- Green tea is brewed cool. [1] (medium confidence)");
    expect(deps.publish).toHaveBeenCalledWith(result.report, "green tea", config, false);
  });

  it("passes dryRun to the publish stage", async () => {
    const deps = makeDeps([["https://a.example.com"]]);

    await runPipeline("green tea", config, deps, new ResearchContext(10), true);

    expect(deps.publish).toHaveBeenCalledWith(
      expect.any(String),
      "green tea",
      config,
      true
    );
  });

  it("retries with a broadened query when nothing was accepted", async () => {
    const deps = makeDeps([[], ["https://a.example.com"]]);

    const result = await runPipeline("green tea", config, deps, new ResearchContext(10), false);

    expect(deps.search).toHaveBeenCalledTimes(2);
    expect(deps.search.mock.calls[1]?.[0]).toBe("green tea overview guide");
    expect(result.reformulated).toBe(true);
    expect(result.finalQuery).toBe("green tea overview guide");
    expect(result.sourcesAccepted).toBe(1);
  });

  it("keeps the first outcome when the broadened query does no better", async () => {
    const deps = makeDeps([[], []]);

    const result = await runPipeline("green tea", config, deps, new ResearchContext(10), false);

    expect(result.reformulated).toBe(true);
    expect(result.finalQuery).toBe("green tea");
    expect(result.status).toBe("no_candidates");
    expect(result.report).toContain("No candidate sources were found for this query.");
  });

  it("does not reformulate when disabled", async () => {
    const deps = makeDeps([[]]);
    const noReformulation = ResearchConfigSchema.parse({
      reformulation: { enabled: false },
    });

    const result = await runPipeline(
      "green tea",
      noReformulation,
      deps,
      new ResearchContext(10),
      false
    );

    expect(deps.search).toHaveBeenCalledTimes(1);
    expect(result.reformulated).toBe(false);
  });

  it("counts only the sources that reach the report", async () => {
    const deps = makeDeps([["https://a.example.com"]]);
    const strict = ResearchConfigSchema.parse({
      ...config,
      report: { min_authority_score: 6 },
    });

    const result = await runPipeline("green tea", strict, deps, new ResearchContext(10), false);

    expect(result.status).toBe("partial");
    expect(result.sourcesAccepted).toBe(0);
    expect(result.report).toContain("No source reached the minimum authority score of 6.");
    expect(deps.analyze).not.toHaveBeenCalled();
  });

  it("skips analysis when it is disabled", async () => {
    const deps = makeDeps([["https://a.example.com"]]);
    const noAnalysis = ResearchConfigSchema.parse({
      ...config,
      analysis: { enabled: false },
    });

    const result = await runPipeline("green tea", noAnalysis, deps, new ResearchContext(10), false);

    expect(deps.analyze).not.toHaveBeenCalled();
    expect(result.report).not.toContain("## Key Facts");
  });

  it("records the query in the context history", async () => {
    const deps = makeDeps([["https://a.example.com"]]);
    const context = new ResearchContext(10);

    await runPipeline("green tea", config, deps, context, false);

    expect(context.recentQueries()).toEqual([
      expect.objectContaining({
        query: "green tea",
        finalQuery: "green tea",
        status: "partial",
        sourcesAccepted: 1,
      }),
    ]);
  });
});

describe("reformulateQuery", () => {
  it("appends product keywords for product queries", () => {
    expect(
      reformulateQuery("kettle price", { ...classification, productIntent: true }, config)
    ).toBe("kettle price product review");
  });

  it("appends general keywords otherwise", () => {
    expect(reformulateQuery("green tea", classification, config)).toBe(
      "green tea overview guide"
    );
  });

  it("returns the query unchanged when every keyword is present", () => {
    expect(reformulateQuery("tea overview guide", classification, config)).toBe(
      "tea overview guide"
    );
  });
});
