/**
 * 로거 컨텍스트 유틸리티
 *
 * 실행(run) 단위 자식 로거 생성 헬퍼
 */

import { logger, Logger } from "@/config/logger";

/**
 * Crawl 실행 전용 로거 생성
 * @param runId - 실행 ID (UUID)
 * @param catalogId - 카탈로그 ID
 * @returns 실행 컨텍스트가 포함된 자식 로거
 */
export function createRunLogger(runId: string, catalogId: string): Logger {
  return logger.child({
    run_id: runId,
    catalog: catalogId,
  });
}

/**
 * 중요 정보 로깅 (콘솔에 표시됨)
 * @param log - 로거 인스턴스
 * @param message - 로그 메시지
 * @param data - 추가 데이터
 */
export function logImportant(
  log: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  log.info({ ...data, important: true }, message);
}
