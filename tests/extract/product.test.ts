import { describe, it, expect } from "vitest";
import {
  extractProduct,
  formatPrice,
  isProductUrl,
  productParsersFor,
} from "../../src/extract/product.js";

const JSON_LD_PAGE = `<html><head>
<title>Widget Pro - Shop</title>
<script type="application/ld+json">
{
  "@context": "https://schema.org",
  "@type": "Product",
  "name": "Widget Pro",
  "brand": { "@type": "Brand", "name": "Acme" },
  "image": ["a.jpg", "b.jpg", "c.jpg", "d.jpg"],
  "offers": {
    "@type": "Offer",
    "price": "49.5",
    "priceCurrency": "USD",
    "availability": "https://schema.org/InStock"
  },
  "aggregateRating": { "ratingValue": "4.6", "reviewCount": "128" }
}
</script>
</head><body><h1>Widget Pro</h1></body></html>`;

describe("isProductUrl", () => {
  it("recognizes retailers and product paths", () => {
    expect(isProductUrl("https://www.amazon.com/dp/B0TEST")).toBe(true);
    expect(isProductUrl("https://www.walmart.com/ip/123")).toBe(true);
    expect(isProductUrl("https://shop.example.com/products/widget")).toBe(true);
  });

  it("rejects ordinary pages and invalid URLs", () => {
    expect(isProductUrl("https://example.com/blog/post")).toBe(false);
    expect(isProductUrl("not a url")).toBe(false);
  });
});

describe("formatPrice", () => {
  it("formats numeric prices with the currency symbol", () => {
    expect(formatPrice("19.9", "USD")).toBe("$19.90");
    expect(formatPrice("12", "eur")).toBe("€12.00");
  });

  it("falls back to the currency code", () => {
    expect(formatPrice("10", "JPY")).toBe("10.00 JPY");
    expect(formatPrice("7")).toBe("7.00");
  });

  it("returns non-numeric prices unchanged", () => {
    expect(formatPrice(" $5 - $10 ")).toBe("$5 - $10");
  });
});

describe("extractProduct", () => {
  it("reads schema.org Product data", () => {
    const product = extractProduct(
      JSON_LD_PAGE,
      "https://shop.example.com/products/widget-pro"
    );

    expect(product).toEqual({
      productName: "Widget Pro",
      price: "$49.50",
      currency: "USD",
      availability: "InStock",
      rating: 4.6,
      reviewCount: 128,
      images: ["a.jpg", "b.jpg", "c.jpg"],
      brand: "Acme",
    });
  });

  it("finds a Product inside @graph", () => {
    const html = `<html><head><script type="application/ld+json">
      {"@graph": [
        {"@type": "WebPage", "name": "Page"},
        {"@type": "Product", "name": "Graph Item", "offers": [{"price": 12, "priceCurrency": "EUR"}]}
      ]}
    </script></head><body></body></html>`;

    const product = extractProduct(html, "https://example.com/x");
    expect(product.productName).toBe("Graph Item");
    expect(product.price).toBe("€12.00");
    expect(product.currency).toBe("EUR");
  });

  it("skips JSON-LD blocks that do not parse", () => {
    const html = `<html><head>
      <script type="application/ld+json">{ not json</script>
      <script type="application/ld+json">{"@type": "Product", "name": "Second"}</script>
    </head><body></body></html>`;

    expect(extractProduct(html, "https://example.com/x").productName).toBe("Second");
  });

  it("uses retailer-specific selectors", () => {
    const html = `<html><body>
      <span id="productTitle"> Test Kettle </span>
      <span class="a-price-whole">24.</span><span class="a-price-fraction">99</span>
      <span class="a-icon-alt">4.3 out of 5 stars</span>
      <span id="acrCustomerReviewText">1,204 ratings</span>
      <div id="availability"> In Stock </div>
    </body></html>`;

    const product = extractProduct(html, "https://www.amazon.com/dp/B0TEST");
    expect(product).toMatchObject({
      productName: "Test Kettle",
      price: "$24.99",
      currency: "USD",
      rating: 4.3,
      reviewCount: 1204,
      availability: "In Stock",
    });
  });

  it("falls back to generic heuristics", () => {
    const html = `<html><body>
      <h1>Desk Lamp</h1>
      <div class="product-price">Now only £35.00</div>
      <p>Currently in stock. Rated 4.5 out of 5 by 87 reviews.</p>
      <table class="specs">
        <tr><th>Weight</th><td>1.2 kg</td></tr>
        <tr><th>Color</th><td>Black</td></tr>
      </table>
    </body></html>`;

    const product = extractProduct(html, "https://lamps.example.com/item/desk-lamp");
    expect(product).toEqual({
      productName: "Desk Lamp",
      price: "£35.00",
      currency: "GBP",
      availability: "In Stock",
      rating: 4.5,
      reviewCount: 87,
      specifications: { Weight: "1.2 kg", Color: "Black" },
    });
  });
});

describe("productParsersFor", () => {
  it("adds the site-specific parser only for known retailers", () => {
    expect(
      productParsersFor("https://www.walmart.com/ip/123").map((p) => p.name)
    ).toEqual(["structured-data", "site-specific", "generic"]);
    expect(
      productParsersFor("https://example.com/x").map((p) => p.name)
    ).toEqual(["structured-data", "generic"]);
  });
});
