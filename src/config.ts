import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const SearchSchema = z.object({
  provider: z.enum(["brave"]).default("brave"),
  num_results: z.number().int().positive().max(20).default(5),
  country: z.string().length(2).optional(),
  language: z.string().min(2).optional(),
  quota: z.number().int().nonnegative().default(100),
});

const BackoffSchema = z.object({
  base_delay_ms: z.number().int().nonnegative().default(500),
  factor: z.number().min(1).default(1.5),
  max_delay_ms: z.number().int().nonnegative().default(5000),
  jitter: z.boolean().default(true),
});

const GatheringSchema = z
  .object({
    target_count: z.number().int().positive().default(3),
    max_attempts: z.number().int().positive().default(5),
    max_concurrent: z.number().int().positive().default(5),
    max_retries: z.number().int().nonnegative().default(2),
    timeout_ms: z.number().int().positive().default(10_000),
    min_content_length: z.number().int().nonnegative().default(100),
    max_content_length: z.number().int().positive().default(10_000),
    max_body_bytes: z.number().int().positive().default(2_000_000),
    early_stop: z.boolean().default(true),
    backoff: BackoffSchema.default({}),
  })
  .refine(
    (g) => g.max_attempts >= g.target_count,
    "max_attempts must be at least target_count"
  );

const ReformulationSchema = z.object({
  enabled: z.boolean().default(true),
  product_keywords: z
    .array(z.string().min(1))
    .default(["product", "review", "price"]),
  general_keywords: z.array(z.string().min(1)).default(["overview", "guide"]),
});

const ClassificationSchema = z.object({
  model: z.string().default("claude-haiku-4-5-20251001"),
});

const AnalysisSchema = z.object({
  enabled: z.boolean().default(true),
  max_facts: z.number().int().positive().max(20).default(5),
});

const ReportSchema = z.object({
  min_authority_score: z.number().min(0).max(10).default(0),
  excerpt_length: z.number().int().positive().default(300),
  publish_issue: z.boolean().default(false),
  labels: z.array(z.string()).default(["research"]),
});

export const ResearchConfigSchema = z.object({
  search: SearchSchema.default({}),
  gathering: GatheringSchema.default({}),
  reformulation: ReformulationSchema.default({}),
  classification: ClassificationSchema.default({}),
  analysis: AnalysisSchema.default({}),
  report: ReportSchema.default({}),
});

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;

export function parseConfig(yamlContent: string): ResearchConfig {
  // An empty document parses to null; treat it as "all defaults".
  const raw: unknown = parseYaml(yamlContent) ?? {};
  return ResearchConfigSchema.parse(raw);
}

export function loadConfig(filePath: string): ResearchConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}
