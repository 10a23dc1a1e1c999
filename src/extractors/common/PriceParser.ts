/**
 * PriceParser Utility
 *
 * 목적: 가격 텍스트 파싱 유틸리티
 * 패턴: Utility Class (Static Methods)
 */

/**
 * 통화 기호 + 소수점 두 자리 (예: "€12.34", "12.34")
 */
const DECIMAL_PRICE_PATTERN = /[€£$]?\s?(\d+\.\d{2})/;

/**
 * 정수부 + 선택적 센트 (예: "15" → 15.00, "15.5" → 15.00)
 */
const LOOSE_PRICE_PATTERN = /(\d+)\.?(\d{2})?/;

/**
 * 천 단위 구분 쉼표 (예: "1,234.56")
 */
const THOUSANDS_SEPARATOR = /(\d),(?=\d{3}(?!\d))/g;

export class PriceParser {
  /**
   * 가격 문자열을 숫자로 변환
   *
   * 1. 소수점 두 자리 금액 ("€12.34" → 12.34)
   * 2. 정수 + 선택적 센트 ("15" → 15, 센트 없으면 "00")
   * 3. 실패 시 null
   *
   * @param text 가격 문자열
   */
  static parse(text: string | null | undefined): number | null {
    if (!text) {
      return null;
    }

    const normalized = this.stripThousandsSeparators(text.trim());
    if (!normalized) {
      return null;
    }

    const decimal = normalized.match(DECIMAL_PRICE_PATTERN);
    if (decimal) {
      return parseFloat(decimal[1]);
    }

    const loose = normalized.match(LOOSE_PRICE_PATTERN);
    if (loose) {
      const units = loose[1];
      const cents = loose[2] ?? "00";
      return parseFloat(`${units}.${cents}`);
    }

    return null;
  }

  /**
   * "1,234.56" → "1234.56"
   */
  static stripThousandsSeparators(text: string): string {
    return text.replace(THOUSANDS_SEPARATOR, "$1");
  }
}
