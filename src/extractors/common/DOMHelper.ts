/**
 * DOMHelper Utility
 *
 * 목적: IPageCapability 안전 접근 유틸리티
 * 패턴: Utility Class (Static Methods)
 *
 * 선택 필드 조회용: 에러 발생 시 기본값(null) 반환
 */

import type {
  IPageCapability,
  JsonValue,
  PageScript,
} from "@/core/interfaces/IPageCapability";
import { logger } from "@/config/logger";

export class DOMHelper {
  /**
   * 안전한 텍스트 추출
   *
   * 요소가 없거나, 공백뿐이거나, 에러 발생 시 null
   */
  static async safeText(
    page: IPageCapability,
    selector: string,
  ): Promise<string | null> {
    try {
      const text = await page.queryOne(selector);
      const trimmed = text?.trim();
      return trimmed || null;
    } catch (error) {
      logger.debug(
        { selector, error: error instanceof Error ? error.message : String(error) },
        "[DOMHelper] 텍스트 조회 실패",
      );
      return null;
    }
  }

  /**
   * 안전한 스크립트 실행
   *
   * 에러 발생 시 null
   */
  static async safeEvaluate(
    page: IPageCapability,
    script: PageScript,
    selector: string,
  ): Promise<JsonValue> {
    try {
      return await page.evaluate(script, selector);
    } catch (error) {
      logger.debug(
        { selector, error: error instanceof Error ? error.message : String(error) },
        "[DOMHelper] 스크립트 실행 실패",
      );
      return null;
    }
  }

  /**
   * JsonValue → 문자열 (빈 문자열/비문자열은 null)
   */
  static asText(value: JsonValue): string | null {
    if (typeof value !== "string") {
      return null;
    }
    const trimmed = value.trim();
    return trimmed || null;
  }

  /**
   * JsonValue → 문자열 배열 (문자열이 아닌 원소 제외)
   */
  static asTextList(value: JsonValue): string[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.filter((item): item is string => typeof item === "string");
  }
}
