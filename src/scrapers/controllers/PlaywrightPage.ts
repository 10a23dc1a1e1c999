/**
 * Playwright Page → IPageCapability 어댑터
 *
 * 에러는 그대로 전파 (호출 측에서 skip / fatal 판단)
 */

import type { Page } from "playwright";
import { SCRAPER_CONFIG } from "@/config/constants";
import type {
  IPageCapability,
  JsonValue,
  NavigationResponse,
  PageScript,
} from "@/core/interfaces/IPageCapability";

export class PlaywrightPage implements IPageCapability {
  constructor(
    private readonly page: Page,
    private readonly navigationTimeoutMs: number = SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS,
  ) {}

  async goto(url: string): Promise<NavigationResponse> {
    const response = await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: this.navigationTimeoutMs,
    });

    if (!response) {
      return { ok: false, status: null };
    }
    return { ok: response.ok(), status: response.status() };
  }

  async queryOne(selector: string): Promise<string | null> {
    const element = await this.page.$(selector);
    if (!element) {
      return null;
    }
    const text = await element.textContent();
    return text?.trim() ?? null;
  }

  async evaluate(script: PageScript, selector: string): Promise<JsonValue> {
    return this.page.evaluate(script, selector);
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}
