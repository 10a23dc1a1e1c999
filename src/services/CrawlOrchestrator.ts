/**
 * Crawl Orchestrator
 *
 * 목록 페이지 → 링크 수집 → 상품별 (중복 확인 → 대기 → 추출 → 저장) → 다음 페이지
 *
 * SOLID 원칙:
 * - SRP: 크롤링 흐름 제어만 담당 (추출/저장은 협력 객체)
 * - DIP: IBrowserController, IPageCapability, IBookRepository에 의존
 *
 * 상태 전이:
 *   LOAD_LISTING → EXTRACT_LINKS → ITEM_LOOP → PAGINATE_OR_STOP → (LOAD_LISTING | DONE)
 *
 * 종료 조건:
 * - 목록 페이지 로드 실패 (재시도 없음)
 * - 링크 0개
 * - accepted === maxItems
 * - maxPages 도달
 * - 루프 내 예상치 못한 에러 (부분 결과 반환)
 *
 * 페이지 1개를 목록/상품 이동에 재사용하며, 모든 종료 경로에서 페이지와 브라우저를 해제한다.
 */

import { logger, type Logger } from "@/config/logger";
import {
  CandidateRecordSchema,
  type CandidateRecord,
} from "@/core/domain/Book";
import type { CatalogConfig } from "@/core/domain/CatalogConfig";
import {
  fatal,
  ok,
  skip,
  type Fatal,
  type Ok,
  type Skip,
} from "@/core/domain/CrawlOutcome";
import {
  CrawlRunState,
  type CrawlStopReason,
  type CrawlSummary,
} from "@/core/domain/CrawlRunState";
import {
  CrawlError,
  CrawlErrorType,
  DuplicateKeyError,
  errorMessage,
} from "@/core/interfaces/CrawlErrorType";
import type { IBookRepository } from "@/core/interfaces/IBookRepository";
import type { IPageCapability } from "@/core/interfaces/IPageCapability";
import { ItemExtractor, type ExtractedItem } from "@/extractors/ItemExtractor";
import { LinkDiscovery } from "@/extractors/LinkDiscovery";
import { SkuResolver } from "@/extractors/fields/SkuResolver";
import type {
  BrowserInitOptions,
  IBrowserController,
} from "@/scrapers/controllers/IBrowserController";
import { DedupGate } from "@/services/DedupGate";
import { Throttle } from "@/utils/Throttle";
import { logImportant } from "@/utils/LoggerContext";

export type CrawlPhase =
  | "LOAD_LISTING"
  | "EXTRACT_LINKS"
  | "ITEM_LOOP"
  | "PAGINATE_OR_STOP"
  | "DONE";

export interface CrawlOrchestratorOptions {
  catalog: CatalogConfig;
  browser: IBrowserController;
  browserOptions: BrowserInitOptions;
  repository: IBookRepository;
  throttle: Throttle;
  /** 최대 목록 페이지 수 (0 = 제한 없음) */
  maxPages?: number;
  log?: Logger;
}

/**
 * 목록 페이지 URL 생성
 *
 * - 1페이지: 설정된 URL 그대로
 * - 2페이지 이상: 쿼리스트링이 있으면 "&", 없으면 "?" 뒤에 `<pageParam>=<n>`
 */
export function buildListingUrl(
  listingUrl: string,
  pageParam: string,
  pageIndex: number,
): string {
  if (pageIndex <= 1) {
    return listingUrl;
  }

  let separator = "";
  if (!listingUrl.endsWith("?") && !listingUrl.endsWith("&")) {
    separator = listingUrl.includes("?") ? "&" : "?";
  }
  return `${listingUrl}${separator}${pageParam}=${pageIndex}`;
}

export class CrawlOrchestrator {
  private readonly catalog: CatalogConfig;
  private readonly browser: IBrowserController;
  private readonly browserOptions: BrowserInitOptions;
  private readonly repository: IBookRepository;
  private readonly throttle: Throttle;
  private readonly maxPages: number;
  private readonly log: Logger;
  private readonly skuResolver: SkuResolver;
  private readonly linkDiscovery: LinkDiscovery;
  private readonly itemExtractor: ItemExtractor;
  private readonly dedupGate: DedupGate;
  private _phase: CrawlPhase = "DONE";

  constructor(options: CrawlOrchestratorOptions) {
    this.catalog = options.catalog;
    this.browser = options.browser;
    this.browserOptions = options.browserOptions;
    this.repository = options.repository;
    this.throttle = options.throttle;
    this.maxPages = options.maxPages ?? 0;
    this.log = options.log ?? logger;

    this.skuResolver = new SkuResolver(this.catalog.skuPrefix);
    this.linkDiscovery = new LinkDiscovery(
      this.catalog.selectors.itemLink,
      this.log,
    );
    this.itemExtractor = new ItemExtractor(
      this.catalog.selectors,
      this.skuResolver,
      this.log,
    );
    this.dedupGate = new DedupGate(this.repository);
  }

  /**
   * 현재 상태 (실행 중이 아니면 DONE)
   */
  get phase(): CrawlPhase {
    return this._phase;
  }

  /**
   * 크롤링 실행
   *
   * @throws CrawlError(BROWSER_ERROR) 브라우저/페이지 생성 실패
   */
  async run(maxItems: number): Promise<CrawlSummary> {
    const page = await this.openPage();
    const state = new CrawlRunState(maxItems);

    let stopReason: CrawlStopReason;
    try {
      stopReason = await this.loop(page, state);
    } catch (error) {
      this.log.error(
        { error: errorMessage(error), page_index: state.pageIndex },
        "[CrawlOrchestrator] 예상치 못한 에러, 실행 중단",
      );
      stopReason = "unexpected_error";
    } finally {
      this._phase = "DONE";
      await this.release(page);
    }

    const summary = state.finalize(stopReason);
    logImportant(this.log, "[CrawlOrchestrator] 크롤링 완료", {
      accepted: summary.accepted,
      skipped: summary.skipped,
      failed: summary.failed,
      pages_visited: summary.pagesVisited,
      stop_reason: summary.stopReason,
    });
    return summary;
  }

  /**
   * 상태 머신 루프
   * @returns 종료 사유
   */
  private async loop(
    page: IPageCapability,
    state: CrawlRunState,
  ): Promise<CrawlStopReason> {
    let stopReason: CrawlStopReason = "catalog_exhausted";
    let listingUrl = "";
    let links: string[] = [];
    this._phase = "LOAD_LISTING";

    while (this._phase !== "DONE") {
      switch (this._phase) {
        case "LOAD_LISTING": {
          listingUrl = buildListingUrl(
            this.catalog.listingUrl,
            this.catalog.pageParam,
            state.pageIndex,
          );
          const loaded = await this.loadListing(page, listingUrl);
          if (loaded.kind === "fatal") {
            stopReason = "listing_failed";
            this._phase = "DONE";
            break;
          }
          state.recordPageVisited();
          this._phase = "EXTRACT_LINKS";
          break;
        }

        case "EXTRACT_LINKS": {
          links = await this.linkDiscovery.discover(page, listingUrl);
          if (links.length === 0) {
            this.log.info(
              { page_index: state.pageIndex },
              "[CrawlOrchestrator] 상품 링크 없음, 종료",
            );
            stopReason = "catalog_exhausted";
            this._phase = "DONE";
            break;
          }
          this.log.info(
            { page_index: state.pageIndex, links: links.length },
            "[CrawlOrchestrator] 상품 링크 수집",
          );
          this._phase = "ITEM_LOOP";
          break;
        }

        case "ITEM_LOOP": {
          await this.processLinks(page, links, state);
          this._phase = "PAGINATE_OR_STOP";
          break;
        }

        case "PAGINATE_OR_STOP": {
          if (state.budgetReached) {
            stopReason = "budget_reached";
            this._phase = "DONE";
            break;
          }
          if (this.maxPages > 0 && state.pageIndex >= this.maxPages) {
            this.log.info(
              { max_pages: this.maxPages },
              "[CrawlOrchestrator] 최대 페이지 도달, 종료",
            );
            stopReason = "max_pages_reached";
            this._phase = "DONE";
            break;
          }
          const delay = await this.throttle.pageDelay();
          state.advancePage();
          this.log.info(
            { page_index: state.pageIndex, delay_ms: delay },
            "[CrawlOrchestrator] 다음 페이지로 이동",
          );
          this._phase = "LOAD_LISTING";
          break;
        }
      }
    }

    return stopReason;
  }

  /**
   * 목록 페이지 로드 (실패 = 실행 종료, 재시도 없음)
   */
  private async loadListing(
    page: IPageCapability,
    url: string,
  ): Promise<Ok<string> | Fatal> {
    try {
      const response = await page.goto(url);
      if (!response.ok) {
        this.log.warn(
          { url, status: response.status },
          "[CrawlOrchestrator] 목록 페이지 로드 실패, 종료",
        );
        return fatal("listing_navigation_failed", `status ${response.status ?? "none"}`);
      }
      this.log.debug({ url, status: response.status }, "[CrawlOrchestrator] 목록 페이지 로드");
      return ok(url);
    } catch (error) {
      this.log.error(
        { url, error: errorMessage(error) },
        "[CrawlOrchestrator] 목록 페이지 이동 에러, 종료",
      );
      return fatal("listing_navigation_failed", errorMessage(error));
    }
  }

  /**
   * 상품 링크 순회 (예산 도달 시 중단)
   */
  private async processLinks(
    page: IPageCapability,
    links: ReadonlyArray<string>,
    state: CrawlRunState,
  ): Promise<void> {
    for (const url of links) {
      if (state.budgetReached) {
        return;
      }

      const urlSku = this.skuResolver.fromUrl(url);
      if (await this.dedupGate.isKnown(urlSku)) {
        this.log.debug({ url, sku: urlSku }, "[CrawlOrchestrator] 이미 저장된 SKU, 건너뜀");
        state.recordSkip("duplicate");
        continue;
      }

      await this.throttle.itemDelay();

      const outcome = await this.processItem(page, url);
      if (outcome.kind === "skip") {
        state.recordSkip(outcome.reason);
        continue;
      }

      state.recordAccepted();
      this.log.info(
        {
          url,
          id: outcome.value,
          progress: `${state.accepted}/${state.maxItems}`,
        },
        "[CrawlOrchestrator] 도서 저장",
      );
    }
  }

  /**
   * 상품 1건: 추출 → 레코드 검증 → (필요 시) 중복 재확인 → 저장
   * @returns 저장된 ID 또는 건너뜀 사유
   */
  private async processItem(
    page: IPageCapability,
    url: string,
  ): Promise<Ok<string> | Skip> {
    const extracted = await this.itemExtractor.extract(page, url);
    if (extracted.kind === "skip") {
      return extracted;
    }

    const parsed = CandidateRecordSchema.safeParse(this.toCandidate(extracted.value));
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      this.log.warn({ url, detail }, "[CrawlOrchestrator] 레코드 검증 실패");
      return skip("invalid_record", detail);
    }
    const record = parsed.data;

    // URL에서 알 수 없던 SKU는 방문 후 다시 확인
    if (extracted.value.sku.source !== "url" && (await this.dedupGate.isKnown(record.sku))) {
      this.log.debug({ url, sku: record.sku }, "[CrawlOrchestrator] 이미 저장된 SKU, 건너뜀");
      return skip("duplicate");
    }

    return this.persist(record);
  }

  private toCandidate(item: ExtractedItem): CandidateRecord {
    return {
      ...item.book,
      category: this.catalog.category,
      subcategory: this.catalog.subcategory,
    };
  }

  private async persist(record: CandidateRecord): Promise<Ok<string> | Skip> {
    try {
      const id = await this.repository.insert(record);
      this.dedupGate.remember(record.sku);
      return ok(id);
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        this.log.debug({ sku: record.sku }, "[CrawlOrchestrator] 저장 시 중복 키, 건너뜀");
        this.dedupGate.remember(record.sku);
        return skip("duplicate_key");
      }
      this.log.error(
        { sku: record.sku, url: record.sourceUrl, error: errorMessage(error) },
        "[CrawlOrchestrator] 저장 실패",
      );
      return skip("persist_failed", errorMessage(error));
    }
  }

  /**
   * 브라우저 초기화 + 페이지 생성
   * 실패 시 브라우저 정리 후 BROWSER_ERROR
   */
  private async openPage(): Promise<IPageCapability> {
    try {
      await this.browser.initialize(this.browserOptions);
      return await this.browser.newPage();
    } catch (error) {
      await this.cleanupBrowser();
      throw new CrawlError(
        CrawlErrorType.BROWSER_ERROR,
        `Failed to start browser session: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * 페이지 → 브라우저 순서로 해제 (해제 에러는 로그만)
   */
  private async release(page: IPageCapability): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "[CrawlOrchestrator] 페이지 닫기 실패");
    }
    await this.cleanupBrowser();
  }

  private async cleanupBrowser(): Promise<void> {
    try {
      await this.browser.cleanup();
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "[CrawlOrchestrator] 브라우저 정리 실패");
    }
  }
}
