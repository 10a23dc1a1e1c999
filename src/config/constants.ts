/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 카탈로그별 설정(셀렉터, URL)은 catalogs/*.yaml 참고
 */

import * as path from "path";

/**
 * 숫자 환경변수 파싱 (없거나 숫자가 아니면 기본값)
 */
function numberFromEnv(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 "version"과 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Catalog Crawler",
} as const;

/**
 * 크롤링 설정
 */
export const CRAWL_CONFIG = {
  /**
   * 기본 카탈로그 ID (catalogs/{id}.yaml)
   * 환경변수: CRAWL_CATALOG
   */
  DEFAULT_CATALOG: process.env.CRAWL_CATALOG || "worldofbooks",

  /**
   * 1회 실행당 최대 수집 건수
   * 환경변수: MAX_BOOKS_PER_RUN
   */
  MAX_ITEMS_PER_RUN: numberFromEnv("MAX_BOOKS_PER_RUN", 50),

  /**
   * 최대 페이지 수 (0 = 제한 없음)
   * 환경변수: CRAWL_MAX_PAGES
   */
  MAX_PAGES: numberFromEnv("CRAWL_MAX_PAGES", 0),

  /**
   * 상품 간 대기 범위 [min, max) (ms)
   * 환경변수: CRAWL_DELAY_MIN_MS, CRAWL_DELAY_MAX_MS
   */
  ITEM_DELAY_MIN_MS: numberFromEnv("CRAWL_DELAY_MIN_MS", 2000),
  ITEM_DELAY_MAX_MS: numberFromEnv("CRAWL_DELAY_MAX_MS", 5000),

  /**
   * 페이지 이동 대기 추가 폭 (ms)
   * 페이지 대기 범위: [ITEM_DELAY_MAX_MS, ITEM_DELAY_MAX_MS + 이 값)
   * 환경변수: CRAWL_PAGE_DELAY_EXTRA_MS
   */
  PAGE_DELAY_EXTRA_MS: numberFromEnv("CRAWL_PAGE_DELAY_EXTRA_MS", 3000),

  /**
   * 저자 정보가 없을 때 기록하는 값
   */
  UNKNOWN_AUTHOR: "Unknown",
} as const;

/**
 * 스크래퍼 (브라우저) 설정
 */
export const SCRAPER_CONFIG = {
  /**
   * Headless 모드
   * 환경변수: HEADLESS (기본 true)
   */
  HEADLESS: process.env.HEADLESS !== "false",

  /**
   * 페이지 이동 타임아웃 (ms)
   * 환경변수: NAVIGATION_TIMEOUT_MS
   */
  NAVIGATION_TIMEOUT_MS: numberFromEnv("NAVIGATION_TIMEOUT_MS", 30000),

  DEFAULT_VIEWPORT: { width: 1366, height: 900 },

  DEFAULT_USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
} as const;

/**
 * 데이터베이스 설정
 */
export const DATABASE_CONFIG = {
  /**
   * 도서 테이블명
   * 환경변수: BOOK_TABLE_NAME
   */
  BOOK_TABLE_NAME: process.env.BOOK_TABLE_NAME || "books",

  /**
   * Postgres unique_violation 코드
   */
  UNIQUE_VIOLATION_CODE: "23505",

  /**
   * 중복 확인 시 SELECT 필드
   */
  DEDUP_SELECT: "id, sku, title, source_url",
} as const;

/**
 * 경로 설정
 */
export const PATH_CONFIG = {
  /**
   * 카탈로그 YAML 디렉터리
   * 환경변수: CATALOG_DIR
   */
  CATALOGS_DIR: process.env.CATALOG_DIR || path.join(__dirname, "catalogs"),
} as const;

/**
 * 로깅 서비스 이름
 */
export const SERVICE_NAMES = {
  CRAWLER: "crawler",
} as const;
