import Anthropic from "@anthropic-ai/sdk";
import * as core from "@actions/core";
import { analyzeSources } from "./analysis/llm.js";
import { anthropicCompletion, classifyQuery } from "./classifier/llm.js";
import { loadConfig } from "./config.js";
import { ResearchContext } from "./context.js";
import { createPageFetcher } from "./extract/http.js";
import { publishReport } from "./output/issues.js";
import { runPipeline } from "./pipeline.js";
import { BraveSearchProvider } from "./search/brave.js";
import { searchCandidates } from "./search/provider.js";

async function run(): Promise<void> {
  try {
    const query = core.getInput("query", { required: true });
    const configPath = core.getInput("config_path") || ".github/research.yml";
    const dryRun = core.getInput("dry_run") === "true";

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);

    const anthropicKey = core.getInput("anthropic_api_key");
    const complete = anthropicKey
      ? anthropicCompletion(
          new Anthropic({ apiKey: anthropicKey }),
          config.classification.model
        )
      : undefined;
    if (!complete) {
      core.info(
        "No anthropic_api_key given, using keyword classification and heuristic analysis"
      );
    }

    const provider = new BraveSearchProvider(
      core.getInput("brave_api_key", { required: true })
    );
    const context = new ResearchContext(config.search.quota);

    const result = await runPipeline(
      query,
      config,
      {
        classify: (q) => classifyQuery(q, complete),
        search: (q, ctx) =>
          searchCandidates(
            provider,
            q,
            {
              count: config.search.num_results,
              country: config.search.country,
              language: config.search.language,
            },
            ctx
          ),
        createFetcher: (classification) =>
          createPageFetcher({
            maxContentLength: config.gathering.max_content_length,
            maxBodyBytes: config.gathering.max_body_bytes,
            productMode: classification.productIntent,
          }),
        analyze: (q, classification, sources) =>
          analyzeSources(
            q,
            classification,
            sources,
            complete,
            config.analysis.max_facts
          ),
        publish: publishReport,
      },
      context,
      dryRun
    );

    core.setOutput("report", result.report);
    core.setOutput("sources_accepted", result.sourcesAccepted);
    core.setOutput("sources_rejected", result.sourcesRejected);
    core.setOutput("issues_created", result.issuesCreated);
    core.setOutput("reformulated", result.reformulated);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
