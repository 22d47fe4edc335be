import * as core from "@actions/core";
import type { SourceAnalysis } from "./analysis/llm.js";
import type { QueryClassification } from "./classifier/llm.js";
import type { ResearchConfig } from "./config.js";
import type { ResearchContext } from "./context.js";
import { gather } from "./gather/coordinator.js";
import { buildReport, reportableSources } from "./output/report.js";
import type { SearchOutcome } from "./search/provider.js";
import type {
  FetchFn,
  GatheringOutcome,
  ScoredSource,
} from "./sources/types.js";

export interface PipelineResult {
  finalQuery: string;
  reformulated: boolean;
  status: GatheringOutcome["status"];
  /** Sources that made it into the report. */
  sourcesAccepted: number;
  sourcesRejected: number;
  report: string;
  issuesCreated: number;
}

export interface PipelineDeps {
  classify: (query: string) => Promise<QueryClassification>;
  search: (query: string, context: ResearchContext) => Promise<SearchOutcome>;
  createFetcher: (classification: QueryClassification) => FetchFn;
  analyze: (
    query: string,
    classification: QueryClassification,
    sources: readonly ScoredSource[]
  ) => Promise<SourceAnalysis>;
  publish: (
    report: string,
    query: string,
    config: ResearchConfig,
    dryRun: boolean
  ) => Promise<number>;
}

/** Appends the broadening keywords the query does not already contain. */
export function reformulateQuery(
  query: string,
  classification: QueryClassification,
  config: ResearchConfig
): string {
  const keywords = classification.productIntent
    ? config.reformulation.product_keywords
    : config.reformulation.general_keywords;
  const present = new Set(query.toLowerCase().split(/\s+/));
  const missing = keywords.filter((k) => !present.has(k.toLowerCase()));
  return missing.length > 0 ? `${query.trim()} ${missing.join(" ")}` : query;
}

async function searchAndGather(
  query: string,
  classification: QueryClassification,
  config: ResearchConfig,
  deps: PipelineDeps,
  context: ResearchContext
): Promise<GatheringOutcome> {
  const search = await deps.search(query, context);
  const g = config.gathering;

  return gather(query, search.candidates, {
    fetchFn: deps.createFetcher(classification),
    targetCount: g.target_count,
    maxAttempts: g.max_attempts,
    maxConcurrent: g.max_concurrent,
    maxRetries: g.max_retries,
    timeoutMs: g.timeout_ms,
    minContentLength: g.min_content_length,
    earlyStop: g.early_stop,
    backoff: {
      baseDelayMs: g.backoff.base_delay_ms,
      factor: g.backoff.factor,
      maxDelayMs: g.backoff.max_delay_ms,
      jitter: g.backoff.jitter,
    },
  });
}

export async function runPipeline(
  query: string,
  config: ResearchConfig,
  deps: PipelineDeps,
  context: ResearchContext,
  dryRun: boolean
): Promise<PipelineResult> {
  core.info("Stage 1/5: Classifying query...");
  const classification = await deps.classify(query);
  core.info(
    `  ${classification.queryType}, complexity ${classification.complexityScore}, ${classification.researchStrategy} (${classification.source})`
  );

  core.info("Stage 2/5: Gathering sources...");
  let outcome = await searchAndGather(query, classification, config, deps, context);
  let finalQuery = query;
  let reformulated = false;

  if (outcome.accepted.length === 0 && config.reformulation.enabled) {
    const broader = reformulateQuery(query, classification, config);
    if (broader !== query) {
      core.info(`  No usable sources, retrying as "${broader}"`);
      const retry = await searchAndGather(
        broader,
        classification,
        config,
        deps,
        context
      );
      reformulated = true;
      if (retry.accepted.length > outcome.accepted.length) {
        outcome = retry;
        finalQuery = broader;
      }
    }
  }
  core.info(
    `  ${outcome.accepted.length} sources accepted, ${outcome.rejected.length} rejected`
  );

  core.info("Stage 3/5: Analyzing sources...");
  const sources = reportableSources(outcome, config.report.min_authority_score);
  let analysis: SourceAnalysis | undefined;
  if (!config.analysis.enabled) {
    core.info("  Analysis disabled");
  } else if (sources.length === 0) {
    core.info("  No sources to analyze");
  } else {
    analysis = await deps.analyze(query, classification, sources);
    core.info(
      `  ${analysis.keyFacts.length} key facts, ${analysis.conflicts.length} conflicts (${analysis.source})`
    );
  }

  core.info("Stage 4/5: Building report...");
  const report = buildReport(query, classification, outcome, {
    minAuthorityScore: config.report.min_authority_score,
    excerptLength: config.report.excerpt_length,
    analysis,
  });
  core.info(`  ${report.length} characters`);

  core.info("Stage 5/5: Publishing...");
  const issuesCreated = await deps.publish(report, query, config, dryRun);
  core.info(`  ${issuesCreated} issues created`);

  context.remember({
    query,
    finalQuery,
    status: outcome.status,
    sourcesAccepted: outcome.accepted.length,
    at: new Date().toISOString(),
  });

  return {
    finalQuery,
    reformulated,
    status: outcome.status,
    sourcesAccepted: sources.length,
    sourcesRejected: outcome.rejected.length,
    report,
    issuesCreated,
  };
}
