/**
 * 크롤링 단계별 결과 타입
 *
 * - Ok: 정상 처리
 * - Skip: 해당 상품만 건너뜀 (실행 계속)
 * - Fatal: 실행 중단 (부분 결과 반환)
 */

/**
 * 상품 단위 건너뜀 사유
 */
export type SkipReason =
  | "duplicate" // DedupGate 적중
  | "duplicate_key" // 저장 시 unique 충돌
  | "navigation_failed"
  | "missing_title"
  | "extraction_error"
  | "invalid_record"
  | "persist_failed";

/**
 * 실행 중단 사유
 */
export type FatalReason = "listing_navigation_failed" | "unexpected_error";

export interface Ok<T> {
  kind: "ok";
  value: T;
}

export interface Skip {
  kind: "skip";
  reason: SkipReason;
  detail?: string;
}

export interface Fatal {
  kind: "fatal";
  reason: FatalReason;
  detail?: string;
}

export type Outcome<T> = Ok<T> | Skip | Fatal;

export const ok = <T>(value: T): Ok<T> => ({ kind: "ok", value });

export const skip = (reason: SkipReason, detail?: string): Skip => ({
  kind: "skip",
  reason,
  detail,
});

export const fatal = (reason: FatalReason, detail?: string): Fatal => ({
  kind: "fatal",
  reason,
  detail,
});

/**
 * 중복으로 집계되는 사유 (skipped 카운터)
 * 그 외 사유는 failed 카운터로 집계
 */
export function isDuplicateReason(reason: SkipReason): boolean {
  return reason === "duplicate" || reason === "duplicate_key";
}
