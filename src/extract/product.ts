import * as cheerio from "cheerio";
import { z } from "zod";
import type { ProductDetails } from "../sources/types.js";
import { collapseWhitespace, extractTitle } from "./page.js";

/**
 * One way of reading product facts off a page. Parsers run in a fixed order
 * (structured data, then site-specific selectors, then generic heuristics) and
 * a field keeps the first value any of them finds.
 */
export interface ProductParser {
  readonly name: "structured-data" | "site-specific" | "generic";
  appliesTo(url: URL | null): boolean;
  parse($: cheerio.CheerioAPI): ProductDetails;
}

const CURRENCY_SYMBOLS: Record<string, string> = {
  USD: "$",
  EUR: "€",
  GBP: "£",
  INR: "₹",
};

const PRICE_PATTERN = /([$€£₹])\s*(\d+(?:,\d{3})*(?:\.\d{2})?)/;

const RETAILER_HOSTS = ["amazon.", "ebay.", "bestbuy.com", "walmart.com"];
const PRODUCT_PATH_PATTERN = /\/(?:product|products|dp|item|itm|p)\//i;

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

export function isProductUrl(url: string): boolean {
  const parsed = parseUrl(url);
  if (!parsed) return false;
  const host = parsed.hostname.toLowerCase();
  return (
    RETAILER_HOSTS.some((retailer) => host.includes(retailer)) ||
    PRODUCT_PATH_PATTERN.test(`${parsed.pathname}/`)
  );
}

export function formatPrice(value: string, currency?: string): string {
  const trimmed = value.trim();
  if (!/^\d+(?:\.\d+)?$/.test(trimmed)) return trimmed;
  const symbol = currency ? CURRENCY_SYMBOLS[currency.toUpperCase()] : undefined;
  const amount = Number(trimmed).toFixed(2);
  if (symbol) return `${symbol}${amount}`;
  return currency ? `${amount} ${currency}` : amount;
}

function currencyForSymbol(symbol: string): string | undefined {
  return Object.keys(CURRENCY_SYMBOLS).find(
    (code) => CURRENCY_SYMBOLS[code] === symbol
  );
}

function matchPrice(text: string): { price: string; currency?: string } | null {
  const match = PRICE_PATTERN.exec(text);
  if (!match) return null;
  const [, symbol = "", amount = ""] = match;
  return {
    price: `${symbol}${amount}`,
    currency: currencyForSymbol(symbol),
  };
}

function parseCount(text: string): number | undefined {
  const match = /(\d[\d,]*)/.exec(text);
  return match?.[1] ? Number(match[1].replace(/,/g, "")) : undefined;
}

function parseRating(text: string): number | undefined {
  const match = /(\d+(?:\.\d+)?)/.exec(text);
  return match?.[1] ? Number(match[1]) : undefined;
}

function textOf($: cheerio.CheerioAPI, selector: string): string | undefined {
  const text = collapseWhitespace($(selector).first().text());
  return text || undefined;
}

function listItems(
  $: cheerio.CheerioAPI,
  selector: string,
  limit = 10
): string[] | undefined {
  const items: string[] = [];
  $(selector).each((_, element) => {
    const text = collapseWhitespace($(element).text());
    if (text.length > 10 && items.length < limit) items.push(text);
  });
  return items.length > 0 ? items : undefined;
}

// ---------------------------------------------------------------------------
// Structured data (schema.org JSON-LD)

const NumberLike = z.coerce.number().finite().optional().catch(undefined);
const PriceLike = z
  .union([z.string(), z.number()])
  .transform(String)
  .optional()
  .catch(undefined);

const OfferSchema = z
  .object({
    price: PriceLike,
    priceCurrency: z.string().optional().catch(undefined),
    availability: z.string().optional().catch(undefined),
    priceSpecification: z
      .object({ price: PriceLike })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

const ProductLdSchema = z
  .object({
    name: z.string().optional().catch(undefined),
    description: z.string().optional().catch(undefined),
    offers: z
      .union([OfferSchema, z.array(OfferSchema)])
      .optional()
      .catch(undefined),
    aggregateRating: z
      .object({
        ratingValue: NumberLike,
        reviewCount: NumberLike,
        ratingCount: NumberLike,
      })
      .passthrough()
      .optional()
      .catch(undefined),
    image: z
      .union([z.string(), z.array(z.string())])
      .optional()
      .catch(undefined),
    brand: z
      .union([z.string(), z.object({ name: z.string().optional() }).passthrough()])
      .optional()
      .catch(undefined),
  })
  .passthrough();

function isProductNode(node: unknown): node is Record<string, unknown> {
  if (typeof node !== "object" || node === null || Array.isArray(node)) {
    return false;
  }
  const type: unknown = Reflect.get(node, "@type");
  return (
    type === "Product" || (Array.isArray(type) && type.includes("Product"))
  );
}

function findProductNode(data: unknown): Record<string, unknown> | undefined {
  if (isProductNode(data)) return data;
  if (Array.isArray(data)) {
    for (const item of data) {
      const found = findProductNode(item);
      if (found) return found;
    }
    return undefined;
  }
  if (typeof data === "object" && data !== null) {
    return findProductNode(Reflect.get(data, "@graph"));
  }
  return undefined;
}

function findJsonLdProduct(
  $: cheerio.CheerioAPI
): Record<string, unknown> | undefined {
  const scripts = $('script[type="application/ld+json"]').toArray();
  for (const script of scripts) {
    let data: unknown;
    try {
      data = JSON.parse($(script).text());
    } catch {
      continue;
    }
    const product = findProductNode(data);
    if (product) return product;
  }
  return undefined;
}

const structuredDataParser: ProductParser = {
  name: "structured-data",
  appliesTo: () => true,
  parse($) {
    const node = findJsonLdProduct($);
    if (!node) return {};
    const parsed = ProductLdSchema.safeParse(node);
    if (!parsed.success) return {};
    const ld = parsed.data;

    const offer = Array.isArray(ld.offers) ? ld.offers[0] : ld.offers;
    const currency = offer?.priceCurrency;
    const listPrice = offer?.priceSpecification?.price;
    const images = typeof ld.image === "string" ? [ld.image] : ld.image;
    const brand = typeof ld.brand === "string" ? ld.brand : ld.brand?.name;

    return {
      productName: ld.name?.trim() || undefined,
      price: offer?.price ? formatPrice(offer.price, currency) : undefined,
      listPrice: listPrice ? formatPrice(listPrice, currency) : undefined,
      currency,
      availability: offer?.availability?.split("/").pop() || undefined,
      rating: ld.aggregateRating?.ratingValue,
      reviewCount:
        ld.aggregateRating?.reviewCount ?? ld.aggregateRating?.ratingCount,
      images: images?.slice(0, 3),
      brand: brand || undefined,
      description: ld.description?.trim() || undefined,
    };
  },
};

// ---------------------------------------------------------------------------
// Known retailers

interface SiteRule {
  hosts: string[];
  parse($: cheerio.CheerioAPI): ProductDetails;
}

const SITE_RULES: SiteRule[] = [
  {
    hosts: ["amazon."],
    parse($) {
      const whole = textOf($, ".a-price-whole")?.replace(/[.,]/g, "");
      const fraction = textOf($, ".a-price-fraction");
      const rating = textOf($, "span.a-icon-alt");
      const reviews = textOf($, "#acrCustomerReviewText");
      return {
        productName: textOf($, "#productTitle"),
        price: whole ? `$${whole}${fraction ? `.${fraction}` : ""}` : undefined,
        currency: whole ? "USD" : undefined,
        listPrice: textOf($, ".a-price.a-text-price .a-offscreen"),
        availability: textOf($, "#availability"),
        rating: rating && /out of\s*5/i.test(rating) ? parseRating(rating) : undefined,
        reviewCount: reviews ? parseCount(reviews) : undefined,
        features: listItems($, "#feature-bullets li span.a-list-item"),
      };
    },
  },
  {
    hosts: ["bestbuy.com"],
    parse($) {
      const priceText =
        textOf($, '[data-testid="customer-price"]') ??
        textOf($, ".priceView-customer-price");
      const price = priceText ? matchPrice(priceText) : null;
      const cart = textOf($, "button.add-to-cart-button")?.toLowerCase();
      const reviews = textOf($, ".c-reviews");
      return {
        productName: textOf($, "h1"),
        price: price?.price,
        currency: price?.currency,
        availability: cart
          ? cart.includes("sold out")
            ? "Out of Stock"
            : "In Stock"
          : undefined,
        reviewCount: reviews ? parseCount(reviews) : undefined,
        features: listItems($, "ul.feature-list li"),
      };
    },
  },
  {
    hosts: ["walmart.com"],
    parse($) {
      const priceText = textOf($, '[itemprop="price"]');
      const price = priceText ? matchPrice(priceText) : null;
      const rating = textOf($, '[itemprop="ratingValue"]');
      const reviews = textOf($, '[itemprop="reviewCount"]');
      return {
        productName: textOf($, 'h1[itemprop="name"]') ?? textOf($, "h1"),
        price: price?.price,
        currency: price?.currency,
        rating: rating ? parseRating(rating) : undefined,
        reviewCount: reviews ? parseCount(reviews) : undefined,
        features: listItems($, '[data-automation-id="product-highlights"] li'),
      };
    },
  },
];

function siteRuleFor(url: URL | null): SiteRule | undefined {
  const host = url?.hostname.toLowerCase() ?? "";
  return SITE_RULES.find((rule) => rule.hosts.some((h) => host.includes(h)));
}

function createSiteSpecificParser(url: URL | null): ProductParser {
  const rule = siteRuleFor(url);
  return {
    name: "site-specific",
    appliesTo: () => rule !== undefined,
    parse: ($) => rule?.parse($) ?? {},
  };
}

// ---------------------------------------------------------------------------
// Generic fallback

const PRICE_SELECTORS = [
  '[itemprop="price"]',
  ".product-price",
  "#price",
  '[class*="price"]',
  '[id*="price"]',
];

const AVAILABILITY_PHRASES: Array<[string, string]> = [
  ["out of stock", "Out of Stock"],
  ["unavailable", "Unavailable"],
  ["pre-order", "Pre-order"],
  ["coming soon", "Coming Soon"],
  ["in stock", "In Stock"],
];

function genericPrice($: cheerio.CheerioAPI): { price: string; currency?: string } | null {
  for (const selector of PRICE_SELECTORS) {
    for (const element of $(selector).toArray()) {
      const $element = $(element);
      const match = matchPrice($element.text());
      if (match) return match;
      const content = $element.attr("content");
      if (content && /^\d+(?:\.\d+)?$/.test(content.trim())) {
        const currency = $('[itemprop="priceCurrency"]').attr("content");
        return { price: formatPrice(content, currency), currency };
      }
    }
  }
  return null;
}

function genericSpecifications(
  $: cheerio.CheerioAPI
): Record<string, string> | undefined {
  const specs: Record<string, string> = {};

  $('table[class*="spec"] tr, table[class*="detail"] tr').each((_, row) => {
    const cells = $(row).find("td, th").toArray();
    if (cells.length < 2) return;
    const key = collapseWhitespace($(cells[0]).text());
    const value = collapseWhitespace($(cells[1]).text());
    if (key && value) specs[key] = value;
  });

  if (Object.keys(specs).length === 0) {
    $('[class*="spec"] dl, dl[class*="spec"]').each((_, list) => {
      const terms = $(list).find("dt").toArray();
      const definitions = $(list).find("dd").toArray();
      terms.forEach((term, i) => {
        const key = collapseWhitespace($(term).text());
        const value = collapseWhitespace($(definitions[i]).text());
        if (key && value) specs[key] = value;
      });
    });
  }

  return Object.keys(specs).length > 0 ? specs : undefined;
}

const genericParser: ProductParser = {
  name: "generic",
  appliesTo: () => true,
  parse($) {
    const price = genericPrice($);
    const bodyText = collapseWhitespace($("body").text());
    const lower = bodyText.toLowerCase();
    const availability = AVAILABILITY_PHRASES.find(([phrase]) =>
      lower.includes(phrase)
    )?.[1];
    const rating = /(\d+(?:\.\d+)?)\s*(?:out of|\/)\s*5\b/i.exec(bodyText);
    const reviews = /(\d+(?:,\d{3})*)\s*(?:reviews?|ratings?)\b/i.exec(bodyText);

    return {
      productName: textOf($, "h1") ?? extractTitle($),
      price: price?.price,
      currency: price?.currency,
      availability,
      rating: rating?.[1] ? Number(rating[1]) : undefined,
      reviewCount: reviews?.[1] ? parseCount(reviews[1]) : undefined,
      features: listItems(
        $,
        'ul[class*="feature"] li, ul[class*="highlight"] li, ol[class*="feature"] li'
      ),
      specifications: genericSpecifications($),
    };
  },
};

export function productParsersFor(url: string): ProductParser[] {
  const parsed = parseUrl(url);
  return [structuredDataParser, createSiteSpecificParser(parsed), genericParser]
    .filter((parser) => parser.appliesTo(parsed));
}

function mergeMissing(target: ProductDetails, source: ProductDetails): void {
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && Reflect.get(target, key) === undefined) {
      Object.assign(target, { [key]: value });
    }
  }
}

export function extractProductFrom(
  $: cheerio.CheerioAPI,
  url: string
): ProductDetails {
  const details: ProductDetails = {};
  for (const parser of productParsersFor(url)) {
    mergeMissing(details, parser.parse($));
  }
  return details;
}

/**
 * Whether a page outside the known retailers is really about a product: a
 * price from any parser, or a name declared in schema.org Product data. The
 * generic heading fallback alone does not count.
 */
export function hasProductEvidence(
  $: cheerio.CheerioAPI,
  details: ProductDetails
): boolean {
  return Boolean(details.price || structuredDataParser.parse($).productName);
}

export function extractProduct(html: string, url: string): ProductDetails {
  return extractProductFrom(cheerio.load(html), url);
}
