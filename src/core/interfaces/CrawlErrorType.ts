/**
 * Crawl Error Type
 *
 * 목적:
 * - 실패 원인 세분화
 * - 에러별 로깅 전략 차별화
 */

export enum CrawlErrorType {
  /** 설정 오류 (카탈로그 YAML, 환경변수) */
  CONFIG_ERROR = "CONFIG_ERROR",

  /** 잘못된 실행 인자 */
  INVALID_INPUT = "INVALID_INPUT",

  /** Browser/Page 생성 실패 */
  BROWSER_ERROR = "BROWSER_ERROR",

  /** 저장소 오류 */
  PERSISTENCE_ERROR = "PERSISTENCE_ERROR",
}

export class CrawlError extends Error {
  public readonly type: CrawlErrorType;
  public readonly errorCause?: unknown;

  constructor(
    type: CrawlErrorType,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "CrawlError";
    this.type = type;
    this.errorCause = options?.cause;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      cause:
        this.errorCause instanceof Error
          ? this.errorCause.message
          : this.errorCause,
      stack: this.stack,
    };
  }
}

/**
 * SKU unique 충돌 (이미 저장된 도서)
 * 크롤러는 중복 건너뜀과 동일하게 취급
 */
export class DuplicateKeyError extends Error {
  constructor(public readonly sku: string) {
    super(`Duplicate sku: ${sku}`);
    this.name = "DuplicateKeyError";
  }
}

/**
 * unknown 에러 → 메시지
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
