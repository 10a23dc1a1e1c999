/**
 * Browser Controller 구현체
 *
 * 브라우저 생명주기 관리
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당 (추출/파싱 X)
 * - LSP: IBrowserController 대체 가능
 * - DIP: 인터페이스에 의존
 *
 * 책임:
 * 1. 브라우저/컨텍스트 생명주기 관리
 * 2. 페이지 생성 (IPageCapability 어댑터로 반환)
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, BrowserContext } from "playwright";

import { IBrowserController, BrowserInitOptions } from "./IBrowserController";
import { PlaywrightPage } from "./PlaywrightPage";
import type { IPageCapability } from "@/core/interfaces/IPageCapability";
import { BROWSER_ARGS } from "@/config/BrowserArgs";
import { logger } from "@/config/logger";
import { SCRAPER_CONFIG } from "@/config/constants";

// Stealth 플러그인 적용 (모듈 레벨)
chromium.use(StealthPlugin());

/**
 * Browser Controller 구현체
 */
export class BrowserController implements IBrowserController {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private navigationTimeoutMs: number = SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS;
  private _initialized: boolean = false;

  /**
   * 브라우저 초기화
   */
  async initialize(options: BrowserInitOptions): Promise<void> {
    if (this._initialized) {
      logger.debug("[BrowserController] 이미 초기화됨");
      return;
    }

    logger.info(
      { headless: options.headless, locale: options.locale },
      "[BrowserController] 브라우저 초기화 시작",
    );

    this.navigationTimeoutMs =
      options.navigationTimeoutMs ?? SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS;

    this.browser = await chromium.launch({
      headless: options.headless,
      args: options.args ?? BROWSER_ARGS.DEFAULT,
    });

    this.context = await this.browser.newContext({
      viewport: SCRAPER_CONFIG.DEFAULT_VIEWPORT,
      userAgent: SCRAPER_CONFIG.DEFAULT_USER_AGENT,
      locale: options.locale,
      timezoneId: options.timezoneId,
    });

    // Anti-detection 설정
    await this.context.addInitScript(() => {
      Object.defineProperty(navigator, "webdriver", {
        get: () => false,
      });
    });

    this._initialized = true;
    logger.info("[BrowserController] 브라우저 초기화 완료");
  }

  /**
   * 새 페이지 생성
   */
  async newPage(): Promise<IPageCapability> {
    if (!this.context) {
      throw new Error("BrowserController가 초기화되지 않음");
    }
    const page = await this.context.newPage();
    return new PlaywrightPage(page, this.navigationTimeoutMs);
  }

  /**
   * 리소스 정리
   */
  async cleanup(): Promise<void> {
    if (!this.browser && !this.context) {
      return;
    }

    logger.info("[BrowserController] 정리 중...");

    if (this.context) {
      await this.context.close();
      this.context = null;
    }

    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }

    this._initialized = false;
    logger.info("[BrowserController] 정리 완료");
  }

  /**
   * 초기화 상태 확인
   */
  isInitialized(): boolean {
    return this._initialized;
  }
}
