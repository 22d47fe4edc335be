import type { SourceAnalysis } from "../analysis/llm.js";
import type { QueryClassification } from "../classifier/llm.js";
import { collapseWhitespace } from "../extract/page.js";
import {
  credibilityLevel,
  selectTopAuthoritative,
} from "../scoring/authority.js";
import type {
  GatheringOutcome,
  ProductDetails,
  ScoredSource,
} from "../sources/types.js";

export interface ReportOptions {
  minAuthorityScore?: number;
  excerptLength?: number;
  analysis?: SourceAnalysis;
}

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function excerpt(text: string, maxLength: number): string {
  const flat = collapseWhitespace(text);
  if (flat.length <= maxLength) return flat;
  return `${flat.slice(0, maxLength).trimEnd()}...`;
}

function sourceTitle(source: ScoredSource): string {
  return source.payload.title ?? source.candidate.title ?? source.url;
}

function productFacts(product: Readonly<ProductDetails>): string[] {
  const facts: string[] = [];
  if (product.productName) facts.push(`- **Product:** ${product.productName}`);
  if (product.price) {
    const was = product.listPrice ? ` (list ${product.listPrice})` : "";
    facts.push(`- **Price:** ${product.price}${was}`);
  }
  if (product.availability) {
    facts.push(`- **Availability:** ${product.availability}`);
  }
  if (product.rating !== undefined) {
    const reviews =
      product.reviewCount !== undefined ? ` (${product.reviewCount} reviews)` : "";
    facts.push(`- **Rating:** ${product.rating}${reviews}`);
  }
  if (product.features?.length) {
    facts.push(`- **Features:** ${product.features.slice(0, 5).join("; ")}`);
  }
  return facts;
}

/** Accepted sources at or above the minimum authority, in ranked order. */
export function reportableSources(
  outcome: GatheringOutcome,
  minAuthorityScore = 0
): ScoredSource[] {
  return selectTopAuthoritative(
    outcome.accepted,
    outcome.accepted.length,
    minAuthorityScore
  );
}

function summaryLine(
  outcome: GatheringOutcome,
  shown: number,
  minScore: number
): string {
  if (outcome.status === "no_candidates") {
    return "No candidate sources were found for this query.";
  }
  if (shown === 0 && outcome.accepted.length > 0) {
    return `No source reached the minimum authority score of ${minScore}.`;
  }
  if (shown === 0) {
    return "None of the candidate sources could be used.";
  }
  const parts = [`Gathered ${shown} source${shown === 1 ? "" : "s"}`];
  if (outcome.rejected.length > 0) {
    parts.push(`${outcome.rejected.length} unavailable`);
  }
  if (outcome.skipped.length > 0) {
    parts.push(`${outcome.skipped.length} not needed`);
  }
  return `${parts.join(", ")}.`;
}

function analysisLines(analysis: SourceAnalysis): string[] {
  const lines: string[] = [];
  if (analysis.keyFacts.length > 0) {
    lines.push(``, `## Key Facts`, ``);
    for (const fact of analysis.keyFacts) {
      const cites = fact.sources.map((n) => `[${n}]`).join("");
      lines.push(`- ${fact.statement} ${cites} (${fact.confidence} confidence)`);
    }
  }
  if (analysis.conflicts.length > 0) {
    lines.push(``, `## Conflicting Information`, ``);
    for (const conflict of analysis.conflicts) lines.push(`- ${conflict}`);
  }
  return lines;
}

/**
 * Renders a gathering outcome as markdown. Sources are numbered in ranked
 * order; the numbers match between the key facts, the findings and the
 * `Sources` list.
 */
export function buildReport(
  query: string,
  classification: QueryClassification,
  outcome: GatheringOutcome,
  options: ReportOptions = {}
): string {
  const minScore = options.minAuthorityScore ?? 0;
  const excerptLength = options.excerptLength ?? 300;
  const sources = reportableSources(outcome, minScore);

  const lines: string[] = [
    `# Research: ${query}`,
    ``,
    `**Query type:** ${classification.queryType} | **Strategy:** ${classification.researchStrategy} | **Status:** ${outcome.status}`,
    ``,
    summaryLine(outcome, sources.length, minScore),
  ];

  if (sources.length > 0 && options.analysis) {
    lines.push(...analysisLines(options.analysis));
  }

  if (sources.length > 0) {
    lines.push(``, `## Findings`);
    sources.forEach((source, i) => {
      lines.push(
        ``,
        `### [${i + 1}] ${sourceTitle(source)}`,
        ``,
        `**Authority:** ${source.authority.score}/10 (${source.authority.category})`
      );
      const text = source.payload.content ?? source.candidate.snippet;
      if (text) lines.push(``, `> ${excerpt(text, excerptLength)}`);
      if (source.payload.product) {
        const facts = productFacts(source.payload.product);
        if (facts.length > 0) lines.push(``, ...facts);
      }
    });

    lines.push(``, `## Sources`);
    sources.forEach((source, i) => {
      const level = credibilityLevel(source.authority.score);
      const reasons = source.authority.reasons.join("; ");
      lines.push(
        ``,
        `[${i + 1}] ${sourceTitle(source)} - ${source.url}`,
        reasons ? `Credibility: ${level} | ${reasons}` : `Credibility: ${level}`
      );
    });
  }

  if (outcome.rejected.length > 0) {
    lines.push(
      ``,
      `## Unavailable Sources`,
      ``,
      `| URL | Reason | Detail |`,
      `|-----|--------|--------|`
    );
    for (const r of outcome.rejected) {
      lines.push(
        `| ${escapeTableCell(r.url)} | ${r.reason} | ${escapeTableCell(r.detail)} |`
      );
    }
  }

  return lines.join("\n") + "\n";
}

export { escapeTableCell, excerpt };
