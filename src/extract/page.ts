import * as cheerio from "cheerio";

const TRUNCATION_SUFFIX = "... [content truncated]";

const STRIPPED_ELEMENTS = "script, style, noscript, nav, footer, header, iframe";

// Content containers, in priority order.
const CONTENT_SELECTORS = [
  "article",
  "main",
  '[role="main"]',
  ".content",
  ".main-content",
  "#content",
  "#main-content",
];

export interface ExtractedPage {
  title?: string;
  content: string;
  author?: string;
  publishedAt?: string;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function truncateContent(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + TRUNCATION_SUFFIX;
}

export function extractTitle($: cheerio.CheerioAPI): string | undefined {
  const title =
    collapseWhitespace($("title").first().text()) ||
    $('meta[property="og:title"]').attr("content")?.trim() ||
    collapseWhitespace($("h1").first().text());
  return title || undefined;
}

function extractAuthor($: cheerio.CheerioAPI): string | undefined {
  const author =
    $('meta[name="author"]').attr("content") ||
    $('meta[property="article:author"]').attr("content") ||
    $('[rel="author"]').first().text();
  return author?.trim() || undefined;
}

function extractPublishedAt($: cheerio.CheerioAPI): string | undefined {
  const date =
    $('meta[property="article:published_time"]').attr("content") ||
    $('meta[name="date"]').attr("content") ||
    $("time[datetime]").first().attr("datetime");
  return date?.trim() || undefined;
}

function extractMainText($: cheerio.CheerioAPI): string {
  $(STRIPPED_ELEMENTS).remove();

  for (const selector of CONTENT_SELECTORS) {
    const container = $(selector).first();
    if (container.length > 0) {
      const text = collapseWhitespace(container.text());
      if (text) return text;
    }
  }

  return collapseWhitespace($("body").text());
}

/**
 * Generic article extraction: title, main text (capped at `maxLength`) and
 * whatever author/date metadata the page declares.
 */
export function extractPage(html: string, maxLength = 10_000): ExtractedPage {
  const $ = cheerio.load(html);

  // Metadata first: the header element is stripped with the page chrome.
  const title = extractTitle($);
  const author = extractAuthor($);
  const publishedAt = extractPublishedAt($);
  const content = truncateContent(extractMainText($), maxLength);

  return { title, content, author, publishedAt };
}
