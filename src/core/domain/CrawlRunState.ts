/**
 * 크롤링 실행 상태
 *
 * CrawlOrchestrator만 소유/변경한다.
 * finalize() 이후에는 읽기 전용.
 */

import { isDuplicateReason, type SkipReason } from "@/core/domain/CrawlOutcome";

/**
 * 실행 종료 사유
 */
export type CrawlStopReason =
  | "budget_reached"
  | "catalog_exhausted"
  | "listing_failed"
  | "max_pages_reached"
  | "unexpected_error";

/**
 * 실행 요약 (runCrawl 반환값)
 */
export interface CrawlSummary {
  accepted: number;
  skipped: number;
  failed: number;
  pagesVisited: number;
  lastPageIndex: number;
  stopReason: CrawlStopReason;
  skipReasons: Partial<Record<SkipReason, number>>;
}

export class CrawlRunState {
  private _accepted = 0;
  private _skipped = 0;
  private _failed = 0;
  private _pageIndex = 1;
  private _pagesVisited = 0;
  private readonly skipReasons: Partial<Record<SkipReason, number>> = {};
  private summary: CrawlSummary | null = null;

  constructor(public readonly maxItems: number) {}

  get accepted(): number {
    return this._accepted;
  }

  get skipped(): number {
    return this._skipped;
  }

  get failed(): number {
    return this._failed;
  }

  get pageIndex(): number {
    return this._pageIndex;
  }

  get pagesVisited(): number {
    return this._pagesVisited;
  }

  get budgetReached(): boolean {
    return this._accepted >= this.maxItems;
  }

  get isFinalized(): boolean {
    return this.summary !== null;
  }

  recordAccepted(): void {
    this.assertMutable();
    this._accepted++;
  }

  recordSkip(reason: SkipReason): void {
    this.assertMutable();
    if (isDuplicateReason(reason)) {
      this._skipped++;
    } else {
      this._failed++;
    }
    this.skipReasons[reason] = (this.skipReasons[reason] ?? 0) + 1;
  }

  recordPageVisited(): void {
    this.assertMutable();
    this._pagesVisited++;
  }

  advancePage(): void {
    this.assertMutable();
    this._pageIndex++;
  }

  /**
   * 상태 확정 (이후 변경 불가)
   * 두 번째 호출부터는 최초 요약을 그대로 반환
   */
  finalize(stopReason: CrawlStopReason): CrawlSummary {
    if (this.summary) {
      return this.summary;
    }

    this.summary = Object.freeze({
      accepted: this._accepted,
      skipped: this._skipped,
      failed: this._failed,
      pagesVisited: this._pagesVisited,
      lastPageIndex: this._pageIndex,
      stopReason,
      skipReasons: Object.freeze({ ...this.skipReasons }),
    });
    return this.summary;
  }

  private assertMutable(): void {
    if (this.summary) {
      throw new Error("CrawlRunState is finalized");
    }
  }
}
