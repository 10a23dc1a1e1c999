/**
 * 테스트 공통 픽스처 (카탈로그, 문서 빌더, 레코드)
 */

import { jest } from "@jest/globals";
import type { CandidateRecord } from "@/core/domain/Book";
import type { ItemPageContent } from "@/core/domain/ItemPageContent";
import {
  CatalogConfigSchema,
  type CatalogConfig,
} from "@/core/domain/CatalogConfig";
import type { JsonValue, PageScript } from "@/core/interfaces/IPageCapability";
import {
  collectLinkHrefs,
  readFirstImageSource,
  readSkuElement,
  readStructuredDataBlocks,
} from "@/extractors/common/PageScripts";
import { Throttle } from "@/utils/Throttle";
import type { FakeDocument } from "./FakePage";

export const LISTING_URL = "https://books.example.test/collections/rare";

export const TEST_CATALOG: CatalogConfig = CatalogConfigSchema.parse({
  catalog: "testbooks",
  name: "Test Books",
  baseUrl: "https://books.example.test",
  listingUrl: LISTING_URL,
  skuPrefix: "TST",
  category: "Rare Non-Fiction",
  selectors: {
    itemLink: ".grid-view-item__link",
    title: "h1.product__title",
    author: ".product-author",
    price: ".price-item--regular",
    condition: ".product-condition-text",
    description: ".product__description",
    details: ".product-details-wrapper",
    image: ".product__media img",
    skuElement: "[data-sku], .product-single__sku",
    structuredData: 'script[type="application/ld+json"]',
  },
});

const S = TEST_CATALOG.selectors;

export function itemUrl(slug: string): string {
  return `https://books.example.test/products/${slug}`;
}

export function listingDoc(links: string[]): FakeDocument {
  return { scripts: new Map<PageScript, JsonValue>([[collectLinkHrefs, links]]) };
}

export interface ItemDocInput {
  title?: string;
  author?: string;
  price?: string;
  condition?: string;
  description?: string;
  details?: string;
  body?: string;
  skuElement?: string;
  structuredData?: string[];
  image?: string;
  status?: number | null;
}

export function itemDoc(input: ItemDocInput): FakeDocument {
  const texts: Record<string, string> = {};
  const put = (selector: string, value: string | undefined) => {
    if (value !== undefined) {
      texts[selector] = value;
    }
  };
  put(S.title, input.title);
  put(S.author, input.author);
  put(S.price, input.price);
  put(S.condition, input.condition);
  put(S.description, input.description);
  put(S.details, input.details);
  put(S.body, input.body);

  const scripts = new Map<PageScript, JsonValue>();
  if (input.skuElement !== undefined) {
    scripts.set(readSkuElement, input.skuElement);
  }
  if (input.structuredData !== undefined) {
    scripts.set(readStructuredDataBlocks, input.structuredData);
  }
  if (input.image !== undefined) {
    scripts.set(readFirstImageSource, input.image);
  }

  return { texts, scripts, status: input.status };
}

export function candidateRecord(overrides: Partial<CandidateRecord> = {}): CandidateRecord {
  return {
    title: "Seed Book",
    author: "Seed Author",
    sku: "seed-book-001",
    isbn: null,
    price: null,
    condition: null,
    binding: null,
    publisher: null,
    publicationYear: null,
    description: null,
    imageUrl: null,
    sourceUrl: itemUrl("seed-book-001"),
    category: null,
    subcategory: null,
    ...overrides,
  };
}

/**
 * 대기 없이 지연값만 기록하는 Throttle
 */
export function instantThrottle(): { throttle: Throttle; sleeps: number[] } {
  const sleeps: number[] = [];
  const sleep = jest.fn(async (ms: number) => {
    sleeps.push(ms);
  });
  const throttle = new Throttle(
    { itemDelayMinMs: 2000, itemDelayMaxMs: 5000, pageDelayExtraMs: 3000 },
    { random: () => 0, sleep },
  );
  return { throttle, sleeps };
}

export function pageContent(overrides: Partial<ItemPageContent> = {}): ItemPageContent {
  return {
    url: itemUrl("sample-book-001"),
    title: "Sample Book",
    author: null,
    priceText: null,
    condition: null,
    description: null,
    detailsText: null,
    bodyText: null,
    skuElement: null,
    imageUrl: null,
    structuredData: { sku: null, isbn: null },
    ...overrides,
  };
}
