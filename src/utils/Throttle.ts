/**
 * Throttle Utility
 *
 * SOLID 원칙:
 * - SRP: 요청 간 무작위 대기만 담당
 *
 * - 상품 대기: [min, max) 균등분포
 * - 페이지 대기: [max, max + pageExtra) 균등분포
 */

import { CRAWL_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { CrawlError, CrawlErrorType } from "@/core/interfaces/CrawlErrorType";

export interface ThrottleOptions {
  itemDelayMinMs: number;
  itemDelayMaxMs: number;
  pageDelayExtraMs: number;
}

/**
 * 테스트에서 교체 가능한 의존성
 */
export interface ThrottleDeps {
  /** [0, 1) 난수 */
  random: () => number;
  sleep: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const DEFAULT_THROTTLE_OPTIONS: ThrottleOptions = {
  itemDelayMinMs: CRAWL_CONFIG.ITEM_DELAY_MIN_MS,
  itemDelayMaxMs: CRAWL_CONFIG.ITEM_DELAY_MAX_MS,
  pageDelayExtraMs: CRAWL_CONFIG.PAGE_DELAY_EXTRA_MS,
};

export class Throttle {
  private readonly deps: ThrottleDeps;

  constructor(
    private readonly options: ThrottleOptions = DEFAULT_THROTTLE_OPTIONS,
    deps: Partial<ThrottleDeps> = {},
  ) {
    const { itemDelayMinMs, itemDelayMaxMs, pageDelayExtraMs } = options;
    if (
      itemDelayMinMs < 0 ||
      itemDelayMaxMs < itemDelayMinMs ||
      pageDelayExtraMs < 0
    ) {
      throw new CrawlError(
        CrawlErrorType.CONFIG_ERROR,
        `Invalid throttle range: item [${itemDelayMinMs}, ${itemDelayMaxMs}), page extra ${pageDelayExtraMs}`,
      );
    }

    this.deps = {
      random: deps.random ?? Math.random,
      sleep: deps.sleep ?? defaultSleep,
    };
  }

  /**
   * 상품 방문 전 대기
   * @returns 실제 대기 시간 (ms)
   */
  async itemDelay(): Promise<number> {
    const { itemDelayMinMs, itemDelayMaxMs } = this.options;
    return this.wait(itemDelayMinMs, itemDelayMaxMs, "item");
  }

  /**
   * 다음 목록 페이지 이동 전 대기
   * @returns 실제 대기 시간 (ms)
   */
  async pageDelay(): Promise<number> {
    const { itemDelayMaxMs, pageDelayExtraMs } = this.options;
    return this.wait(itemDelayMaxMs, itemDelayMaxMs + pageDelayExtraMs, "page");
  }

  private async wait(min: number, max: number, kind: string): Promise<number> {
    const delay = Math.floor(min + this.deps.random() * (max - min));
    logger.debug({ delay_ms: delay, kind }, "[Throttle] 대기");
    await this.deps.sleep(delay);
    return delay;
  }
}
