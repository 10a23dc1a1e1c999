/**
 * 목록 페이지 상품 링크 수집
 *
 * - 문서 순서 유지, 페이지 내 중복 제거 없음
 * - 상대 경로는 목록 URL 기준으로 해석, 빈 href 제외
 * - 에러 시 빈 배열 (로그만 남김)
 */

import { logger } from "@/config/logger";
import { errorMessage } from "@/core/interfaces/CrawlErrorType";
import type { IPageCapability } from "@/core/interfaces/IPageCapability";
import { DOMHelper } from "@/extractors/common/DOMHelper";
import { collectLinkHrefs } from "@/extractors/common/PageScripts";
import { resolveUrl } from "@/extractors/ItemPageReader";

export class LinkDiscovery {
  constructor(
    private readonly itemLinkSelector: string,
    private readonly log = logger,
  ) {}

  /**
   * 현재 로드된 목록 페이지에서 상품 URL 수집
   * @param listingUrl 상대 경로 해석 기준
   */
  async discover(page: IPageCapability, listingUrl: string): Promise<string[]> {
    try {
      const hrefs = DOMHelper.asTextList(
        await page.evaluate(collectLinkHrefs, this.itemLinkSelector),
      );

      const urls: string[] = [];
      for (const href of hrefs) {
        const url = resolveUrl(href.trim(), listingUrl);
        if (url) {
          urls.push(url);
        }
      }
      return urls;
    } catch (error) {
      this.log.error(
        { listingUrl, error: errorMessage(error) },
        "[LinkDiscovery] 링크 수집 실패",
      );
      return [];
    }
  }
}
