/**
 * Crawl 실행 진입점
 *
 * 외부 호출자(CLI, 스케줄러)가 사용하는 함수
 * - maxItems 검증 (양의 정수)
 * - 카탈로그 설정 로드
 * - 저장소 선택 (dry-run: 메모리, 그 외: Supabase) + health check
 * - 오케스트레이터 실행
 *
 * 예외: 잘못된 입력, 설정 오류, 저장소 연결 실패, 브라우저 시작 실패
 * 그 외 실행 중 문제는 요약(stopReason)으로 반환
 */

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { ConfigLoader } from "@/config/ConfigLoader";
import { CRAWL_CONFIG, SCRAPER_CONFIG } from "@/config/constants";
import type { CrawlSummary } from "@/core/domain/CrawlRunState";
import { CrawlError, CrawlErrorType } from "@/core/interfaces/CrawlErrorType";
import type { IBookRepository } from "@/core/interfaces/IBookRepository";
import { InMemoryBookRepository } from "@/repositories/InMemoryBookRepository";
import { SupabaseBookRepository } from "@/repositories/SupabaseBookRepository";
import { BrowserController } from "@/scrapers/controllers/BrowserController";
import type { IBrowserController } from "@/scrapers/controllers/IBrowserController";
import { CrawlOrchestrator } from "@/services/CrawlOrchestrator";
import { createRunLogger, logImportant } from "@/utils/LoggerContext";
import { Throttle } from "@/utils/Throttle";

const MaxItemsSchema = z.number().int().positive();

export interface RunCrawlOptions {
  /** 카탈로그 ID (기본: CRAWL_CONFIG.DEFAULT_CATALOG) */
  catalogId?: string;
  /** true면 메모리 저장소 사용, health check 생략 */
  dryRun?: boolean;
  /** 최대 목록 페이지 수 (기본: CRAWL_CONFIG.MAX_PAGES) */
  maxPages?: number;
  configLoader?: ConfigLoader;
  repository?: IBookRepository;
  browser?: IBrowserController;
  throttle?: Throttle;
}

export async function runCrawl(
  maxItems: number,
  options: RunCrawlOptions = {},
): Promise<CrawlSummary> {
  const validated = MaxItemsSchema.safeParse(maxItems);
  if (!validated.success) {
    throw new CrawlError(
      CrawlErrorType.INVALID_INPUT,
      `maxItems must be a positive integer (got ${maxItems})`,
    );
  }

  const catalogId = options.catalogId ?? CRAWL_CONFIG.DEFAULT_CATALOG;
  const dryRun = options.dryRun ?? false;
  const log = createRunLogger(uuidv4(), catalogId);

  const catalog = (options.configLoader ?? ConfigLoader.getInstance()).loadCatalog(
    catalogId,
  );

  const repository =
    options.repository ??
    (dryRun ? new InMemoryBookRepository() : new SupabaseBookRepository());

  if (!dryRun && !(await repository.healthCheck())) {
    throw new CrawlError(
      CrawlErrorType.PERSISTENCE_ERROR,
      "Repository health check failed",
    );
  }

  logImportant(log, "[runCrawl] 크롤링 시작", {
    max_items: validated.data,
    listing_url: catalog.listingUrl,
    dry_run: dryRun,
  });

  const orchestrator = new CrawlOrchestrator({
    catalog,
    browser: options.browser ?? new BrowserController(),
    browserOptions: {
      headless: SCRAPER_CONFIG.HEADLESS,
      locale: catalog.browser.locale,
      timezoneId: catalog.browser.timezoneId,
      navigationTimeoutMs: SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS,
    },
    repository,
    throttle: options.throttle ?? new Throttle(),
    maxPages: options.maxPages ?? CRAWL_CONFIG.MAX_PAGES,
    log,
  });

  return orchestrator.run(validated.data);
}
