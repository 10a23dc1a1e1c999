/**
 * Browser Controller Interface
 *
 * 브라우저 생명주기 관리 인터페이스
 *
 * SOLID 원칙:
 * - SRP: 브라우저 제어만 담당
 * - ISP: 최소 인터페이스 (크롤링에 필요한 것만)
 * - DIP: 오케스트레이터는 이 인터페이스에 의존
 */

import type { IPageCapability } from "@/core/interfaces/IPageCapability";

/**
 * 브라우저 초기화 옵션
 */
export interface BrowserInitOptions {
  /** Headless 모드 */
  headless: boolean;
  /** 브라우저 locale (예: en-IE) */
  locale: string;
  /** 브라우저 timezone (예: Europe/Dublin) */
  timezoneId: string;
  /** Chromium 실행 플래그 (기본: BROWSER_ARGS.DEFAULT) */
  args?: string[];
  /** 네비게이션 타임아웃 (ms) */
  navigationTimeoutMs?: number;
}

/**
 * Browser Controller Interface
 */
export interface IBrowserController {
  /**
   * 브라우저 / 컨텍스트 초기화
   * @throws 브라우저 실행 실패
   */
  initialize(options: BrowserInitOptions): Promise<void>;

  /**
   * 새 페이지 생성 (initialize 이후)
   */
  newPage(): Promise<IPageCapability>;

  /**
   * 리소스 정리 (여러 번 호출해도 안전)
   */
  cleanup(): Promise<void>;

  /**
   * 초기화 상태 확인
   */
  isInitialized(): boolean;
}
