/**
 * 상품 페이지 → ExtractedBook
 *
 * SOLID 원칙:
 * - SRP: 상품 1건 추출만 담당 (중복 확인/저장은 오케스트레이터)
 * - DIP: IPageCapability에만 의존
 *
 * 결과:
 * - ok(item): 제목이 있는 레코드
 * - skip("navigation_failed"): 이동 실패 (예외, 응답 없음, non-2xx)
 * - skip("missing_title"): 제목 없음
 * - skip("extraction_error"): 그 외 예외
 * 선택 필드 누락은 null로 기록, 상품을 건너뛰지 않는다.
 */

import { CRAWL_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type { ExtractedBook } from "@/core/domain/Book";
import type { CatalogSelectors } from "@/core/domain/CatalogConfig";
import { ok, skip, type Ok, type Skip } from "@/core/domain/CrawlOutcome";
import { errorMessage } from "@/core/interfaces/CrawlErrorType";
import type { IPageCapability } from "@/core/interfaces/IPageCapability";
import { extractBinding } from "@/extractors/fields/BindingExtractor";
import { extractIsbn } from "@/extractors/fields/IsbnExtractor";
import { extractPrice } from "@/extractors/fields/PriceExtractor";
import { extractPublication } from "@/extractors/fields/PublicationExtractor";
import { SkuResolver, type ResolvedSku } from "@/extractors/fields/SkuResolver";
import { ItemPageReader } from "@/extractors/ItemPageReader";

/**
 * 추출 결과 + SKU 출처 (방문 후 중복 재확인 판단용)
 */
export interface ExtractedItem {
  book: ExtractedBook;
  sku: ResolvedSku;
}

export type ItemExtractionResult = Ok<ExtractedItem> | Skip;

export class ItemExtractor {
  private readonly reader: ItemPageReader;

  constructor(
    selectors: CatalogSelectors,
    private readonly skuResolver: SkuResolver,
    private readonly log = logger,
  ) {
    this.reader = new ItemPageReader(selectors);
  }

  async extract(page: IPageCapability, url: string): Promise<ItemExtractionResult> {
    try {
      const response = await page.goto(url);
      if (!response.ok) {
        this.log.warn(
          { url, status: response.status },
          "[ItemExtractor] 상품 페이지 로드 실패",
        );
        return skip("navigation_failed", `status ${response.status ?? "none"}`);
      }
    } catch (error) {
      this.log.warn(
        { url, error: errorMessage(error) },
        "[ItemExtractor] 상품 페이지 이동 에러",
      );
      return skip("navigation_failed", errorMessage(error));
    }

    try {
      const title = await this.reader.readTitle(page);
      if (!title) {
        this.log.warn({ url }, "[ItemExtractor] 제목 없음, 건너뜀");
        return skip("missing_title");
      }

      const content = await this.reader.readContent(page, url, title);
      const sku = this.skuResolver.resolve(content);
      if (sku.source === "fallback") {
        this.log.warn({ url, sku: sku.sku }, "[ItemExtractor] 합성 SKU 사용");
      }

      const { publisher, publicationYear } = extractPublication(content);

      const book: ExtractedBook = {
        title,
        author: content.author ?? CRAWL_CONFIG.UNKNOWN_AUTHOR,
        sku: sku.sku,
        isbn: extractIsbn(content),
        price: extractPrice(content),
        condition: content.condition,
        binding: extractBinding(content),
        publisher,
        publicationYear,
        description: content.description,
        imageUrl: content.imageUrl,
        sourceUrl: url,
      };

      this.log.debug(
        { url, sku: sku.sku, sku_source: sku.strategy },
        "[ItemExtractor] 추출 완료",
      );
      return ok({ book, sku });
    } catch (error) {
      this.log.error(
        { url, error: errorMessage(error) },
        "[ItemExtractor] 추출 에러",
      );
      return skip("extraction_error", errorMessage(error));
    }
  }
}
