import type {
  AuthorityCategory,
  AuthorityScore,
  ScoredSource,
} from "../sources/types.js";

const BASE_SCORE = 5;
const MIN_SCORE = 0;
const MAX_SCORE = 10;

interface DomainTier {
  label: string;
  bonus: number;
  suffixes?: string[];
  hosts?: string[];
}

// Checked in order; the first tier that matches the host wins.
const DOMAIN_TIERS: DomainTier[] = [
  {
    label: "Academic or government domain",
    bonus: 3,
    suffixes: [".edu", ".ac.uk", ".edu.au", ".gov", ".gov.uk", ".gc.ca", ".mil", ".int"],
  },
  {
    label: "Recognized medical authority",
    bonus: 2.5,
    hosts: [
      "mayoclinic.org",
      "webmd.com",
      "hopkinsmedicine.org",
      "clevelandclinic.org",
    ],
  },
  {
    label: "Established news or technical publication",
    bonus: 2,
    hosts: [
      "bbc.com",
      "bbc.co.uk",
      "reuters.com",
      "apnews.com",
      "npr.org",
      "theguardian.com",
      "nytimes.com",
      "washingtonpost.com",
      "wsj.com",
      "economist.com",
      "bloomberg.com",
      "nature.com",
      "science.org",
      "scientificamerican.com",
      "arstechnica.com",
      "wired.com",
      "theverge.com",
      "techcrunch.com",
      "developer.mozilla.org",
      "stackoverflow.com",
      "github.com",
    ],
  },
  {
    label: "Collaborative or reference encyclopedia",
    bonus: 1.5,
    hosts: ["wikipedia.org", "britannica.com"],
  },
];

const USER_GENERATED_HOSTS = [
  "blogspot.com",
  "wordpress.com",
  "tumblr.com",
  "medium.com",
  "quora.com",
  "reddit.com",
  "answers.yahoo.com",
];
const USER_GENERATED_PENALTY = -2;

const CONTENT_BONUS = 0.5;
const HTTPS_BONUS = 0.5;

const CITATION_PATTERN = /\[\d+\]|\b(?:References|Bibliography|Citations|Sources)\b/i;
const DATE_PATTERN =
  /\b(?:January|February|March|April|May|June|July|August|September|October|November|December)\s+\d{1,2},?\s+\d{4}\b|\b\d{4}-\d{2}-\d{2}\b|\b(?:Published|Updated)\b/i;
const AUTHOR_PATTERN = /\b(?:Author:|Written by|By)\s+[A-Z][\w.'-]+/;

const CATEGORY_THRESHOLDS: Array<[number, AuthorityCategory]> = [
  [8.5, "Academic/Government"],
  [7.5, "Medical Authority"],
  [7.0, "News/Tech"],
  [6.5, "Encyclopedia"],
  [5.0, "General"],
];

function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function parseHost(url: string): { host: string; protocol: string } | null {
  try {
    const parsed = new URL(url);
    return {
      host: parsed.hostname.toLowerCase().replace(/^www\./, ""),
      protocol: parsed.protocol,
    };
  } catch {
    return null;
  }
}

function matchTier(host: string): DomainTier | undefined {
  return DOMAIN_TIERS.find(
    (tier) =>
      (tier.suffixes ?? []).some((suffix) => host.endsWith(suffix)) ||
      (tier.hosts ?? []).some((domain) => hostMatches(host, domain))
  );
}

export function categorize(score: number): AuthorityCategory {
  for (const [threshold, category] of CATEGORY_THRESHOLDS) {
    if (score >= threshold) return category;
  }
  return "User-Generated";
}

/**
 * Additive credibility heuristic for a fetched page. Pure and total: an
 * unparseable URL or a missing title/content simply contributes nothing.
 */
export function scoreAuthority(
  url: string,
  title = "",
  content = ""
): AuthorityScore {
  let score = BASE_SCORE;
  const reasons: string[] = [];
  const parsed = parseHost(url);

  if (parsed) {
    const tier = matchTier(parsed.host);
    if (tier) {
      score += tier.bonus;
      reasons.push(tier.label);
    }

    const ugc = USER_GENERATED_HOSTS.find((domain) =>
      hostMatches(parsed.host, domain)
    );
    if (ugc) {
      score += USER_GENERATED_PENALTY;
      reasons.push(`User-generated content platform (${ugc})`);
    }
  }

  const text = `${title}\n${content}`;
  if (CITATION_PATTERN.test(text)) {
    score += CONTENT_BONUS;
    reasons.push("Contains citations or references");
  }
  if (DATE_PATTERN.test(text)) {
    score += CONTENT_BONUS;
    reasons.push("Publication date present");
  }
  if (AUTHOR_PATTERN.test(text)) {
    score += CONTENT_BONUS;
    reasons.push("Author information present");
  }

  if (parsed?.protocol === "https:") {
    score += HTTPS_BONUS;
    reasons.push("Secure connection (HTTPS)");
  }

  const clamped = Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
  const rounded = Math.round(clamped * 10) / 10;

  return { score: rounded, category: categorize(rounded), reasons };
}

// Highest score first; ties fall back to discovery order.
export function rankByAuthority<T extends Pick<ScoredSource, "authority" | "index">>(
  sources: readonly T[]
): T[] {
  return [...sources].sort(
    (a, b) => b.authority.score - a.authority.score || a.index - b.index
  );
}

export function selectTopAuthoritative<
  T extends Pick<ScoredSource, "authority" | "index">,
>(sources: readonly T[], count = 5, minScore = 4): T[] {
  return rankByAuthority(sources)
    .filter((s) => s.authority.score >= minScore)
    .slice(0, count);
}

export function credibilityLevel(score: number): "High" | "Medium" | "Low" {
  if (score >= 8) return "High";
  if (score >= 6) return "Medium";
  return "Low";
}
