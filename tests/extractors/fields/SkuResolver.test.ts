/**
 * SkuResolver Test
 *
 * 목적: URL → 페이지 → 합성 3단계 SKU 결정 검증
 */

import { describe, it, expect } from "@jest/globals";
import {
  SkuResolver,
  fallbackSku,
  fnv1a32,
  skuFromUrl,
} from "@/extractors/fields/SkuResolver";
import { pageContent } from "../../helpers/fixtures";

describe("SkuResolver", () => {
  describe("skuFromUrl - 1단계", () => {
    it("마지막 경로 세그먼트를 사용해야 함", () => {
      expect(skuFromUrl("https://books.example.test/products/gm9781840223456")).toBe(
        "gm9781840223456",
      );
    });

    it("끝 슬래시와 쿼리스트링은 무시해야 함", () => {
      expect(skuFromUrl("https://books.example.test/products/book-001/?variant=2")).toBe(
        "book-001",
      );
    });

    it("5자 이하면 null", () => {
      expect(skuFromUrl("https://books.example.test/products/abc")).toBeNull();
      expect(skuFromUrl("https://books.example.test/p/12345")).toBeNull();
      expect(skuFromUrl("https://books.example.test/p/123456")).toBe("123456");
    });

    it("경로가 없거나 URL이 아니면 null", () => {
      expect(skuFromUrl("https://books.example.test/")).toBeNull();
      expect(skuFromUrl("not a url")).toBeNull();
    });
  });

  describe("fnv1a32 / fallbackSku - 3단계", () => {
    it("알려진 FNV-1a 값과 일치해야 함", () => {
      expect(fnv1a32("")).toBe(0x811c9dc5);
      expect(fnv1a32("a")).toBe(0xe40c292c);
    });

    it("같은 URL은 항상 같은 7자리 SKU", () => {
      const url = "https://books.example.test/products/abc";

      expect(fallbackSku(url, "TST")).toBe("TST-9213580");
      expect(fallbackSku(url, "TST")).toBe(fallbackSku(url, "TST"));
    });

    it("7자리 미만이면 0으로 채워야 함", () => {
      expect(fallbackSku("https://books.example.test/p/12345", "WOB")).toBe("WOB-1549249");
      expect(fallbackSku("", "WOB")).toBe("WOB-6136261");
    });

    it("UTF-8 바이트 기준으로 해시해야 함", () => {
      expect(fallbackSku("https://books.example.test/products/café", "TST")).toBe(
        "TST-5915658",
      );
    });
  });

  describe("resolve - 우선순위", () => {
    const resolver = new SkuResolver("TST");
    const shortUrl = "https://books.example.test/products/abc";

    it("URL SKU가 있으면 페이지 값보다 우선", () => {
      const result = resolver.resolve(
        pageContent({
          url: "https://books.example.test/products/book-001",
          skuElement: "EL-1",
        }),
      );

      expect(result).toEqual({ sku: "book-001", source: "url", strategy: "url_segment" });
    });

    it("SKU 요소 → JSON-LD → 본문 텍스트 순", () => {
      expect(
        resolver.resolve(
          pageContent({
            url: shortUrl,
            skuElement: "EL-1",
            structuredData: { sku: "LD-1", isbn: null },
          }),
        ),
      ).toEqual({ sku: "EL-1", source: "page", strategy: "sku_element" });

      expect(
        resolver.resolve(
          pageContent({
            url: shortUrl,
            structuredData: { sku: "LD-1", isbn: null },
            bodyText: "SKU: TXT-1",
          }),
        ),
      ).toEqual({ sku: "LD-1", source: "page", strategy: "structured_data" });

      expect(
        resolver.resolve(pageContent({ url: shortUrl, bodyText: "Ref sku:  GB-778-1 (used)" })),
      ).toEqual({ sku: "GB-778-1", source: "page", strategy: "page_text" });
    });

    it("모두 없으면 합성 SKU", () => {
      expect(resolver.resolve(pageContent({ url: shortUrl, skuElement: "  " }))).toEqual({
        sku: "TST-9213580",
        source: "fallback",
        strategy: "url_hash",
      });
    });

    it("fromUrl은 1단계만 사용해야 함", () => {
      expect(resolver.fromUrl(shortUrl)).toBeNull();
      expect(resolver.fromUrl("https://books.example.test/products/book-001")).toBe("book-001");
    });
  });
});
