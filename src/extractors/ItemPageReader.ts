/**
 * 상품 페이지 Reader
 *
 * 현재 로드된 상품 페이지에서 필드 추출에 필요한 원시 값을 한 번에 읽는다.
 * - 제목: 예외 전파 (ItemExtractor가 extraction_error로 처리)
 * - 그 외: DOMHelper 안전 조회 (실패 시 null)
 * - JSON-LD: 페이지당 1회 읽고 SKU / ISBN 체인이 공유
 */

import type { CatalogSelectors } from "@/core/domain/CatalogConfig";
import type { ItemPageContent } from "@/core/domain/ItemPageContent";
import type { IPageCapability } from "@/core/interfaces/IPageCapability";
import { DOMHelper } from "@/extractors/common/DOMHelper";
import {
  readFirstImageSource,
  readSkuElement,
  readStructuredDataBlocks,
} from "@/extractors/common/PageScripts";
import { StructuredDataExtractor } from "@/extractors/StructuredDataExtractor";

export class ItemPageReader {
  constructor(private readonly selectors: CatalogSelectors) {}

  /**
   * 제목 (공백뿐이면 null)
   */
  async readTitle(page: IPageCapability): Promise<string | null> {
    const title = await page.queryOne(this.selectors.title);
    return title?.trim() || null;
  }

  /**
   * 제목 외 원시 값 읽기
   */
  async readContent(
    page: IPageCapability,
    url: string,
    title: string,
  ): Promise<ItemPageContent> {
    const s = this.selectors;

    const author = await DOMHelper.safeText(page, s.author);
    const priceText = await DOMHelper.safeText(page, s.price);
    const condition = await DOMHelper.safeText(page, s.condition);
    const description = await DOMHelper.safeText(page, s.description);
    const detailsText = await DOMHelper.safeText(page, s.details);
    const bodyText = await DOMHelper.safeText(page, s.body);

    const skuElement = DOMHelper.asText(
      await DOMHelper.safeEvaluate(page, readSkuElement, s.skuElement),
    );
    const structuredData = StructuredDataExtractor.extract(
      DOMHelper.asTextList(
        await DOMHelper.safeEvaluate(page, readStructuredDataBlocks, s.structuredData),
      ),
    );
    const imageSource = DOMHelper.asText(
      await DOMHelper.safeEvaluate(page, readFirstImageSource, s.image),
    );

    return {
      url,
      title,
      author,
      priceText,
      condition,
      description,
      detailsText,
      bodyText,
      skuElement,
      imageUrl: resolveUrl(imageSource, url),
      structuredData,
    };
  }
}

/**
 * 상대 경로 → 절대 URL (해석 불가 시 null)
 */
export function resolveUrl(href: string | null, base: string): string | null {
  if (!href) {
    return null;
  }
  try {
    return new URL(href, base).href;
  } catch {
    return null;
  }
}
