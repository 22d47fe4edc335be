import { Octokit } from "@octokit/rest";
import * as core from "@actions/core";
import type { ResearchConfig } from "../config.js";

const MAX_TITLE_QUERY_LENGTH = 200;

export interface IssueClient {
  listIssues(labels: string[]): Promise<{ title: string; body?: string }[]>;
  createIssue(
    title: string,
    body: string,
    labels: string[]
  ): Promise<{ number: number; html_url: string }>;
}

function buildIssueTitle(query: string): string {
  const flat = query.replace(/\s+/g, " ").trim();
  return `[Research] ${flat.slice(0, MAX_TITLE_QUERY_LENGTH)}`;
}

function parseRepository(value: string | undefined): { owner: string; repo: string } {
  const [owner, repo, ...rest] = (value ?? "").split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new Error(
      `GITHUB_REPOSITORY must look like "owner/repo", got "${value ?? ""}"`
    );
  }
  return { owner, repo };
}

export function createOctokitIssueClient(
  token: string,
  repository = process.env.GITHUB_REPOSITORY,
  octokit: Octokit = new Octokit({ auth: token })
): IssueClient {
  const { owner, repo } = parseRepository(repository);

  return {
    async listIssues(labels) {
      const { data } = await octokit.rest.issues.listForRepo({
        owner,
        repo,
        state: "open",
        labels: labels.join(","),
        per_page: 100,
      });
      return data.map((issue) => ({
        title: issue.title,
        body: issue.body ?? undefined,
      }));
    },
    async createIssue(title, body, labels) {
      const { data } = await octokit.rest.issues.create({
        owner,
        repo,
        title,
        body,
        labels,
      });
      return { number: data.number, html_url: data.html_url };
    },
  };
}

export async function publishReport(
  report: string,
  query: string,
  config: ResearchConfig,
  dryRun: boolean,
  client?: IssueClient
): Promise<number> {
  if (!config.report.publish_issue) {
    core.info("  Issue publishing disabled");
    return 0;
  }

  const title = buildIssueTitle(query);
  const labels = config.report.labels;

  if (dryRun) {
    core.info(`[DRY RUN] Would create issue: ${title}`);
    return 1;
  }

  let issues: IssueClient;
  try {
    issues = client ?? createOctokitIssueClient(core.getInput("github_token"));
  } catch (error) {
    core.warning(
      `Cannot publish "${title}": ${error instanceof Error ? error.message : String(error)}`
    );
    return 0;
  }

  try {
    const existing = await issues.listIssues(labels);
    if (existing.some((i) => i.title.toLowerCase() === title.toLowerCase())) {
      core.info(`Skipping "${title}": an open issue already exists`);
      return 0;
    }
  } catch (error) {
    core.warning(
      `Failed to list existing issues: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    const created = await issues.createIssue(title, report, labels);
    core.info(`Created issue #${created.number}: ${created.html_url}`);
    return 1;
  } catch (error) {
    core.warning(
      `Failed to create issue "${title}": ${error instanceof Error ? error.message : String(error)}`
    );
    return 0;
  }
}

export { buildIssueTitle, parseRepository };
