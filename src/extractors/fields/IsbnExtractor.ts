/**
 * ISBN 추출
 *
 * 우선순위: 상세 텍스트 → JSON-LD isbn → 전체 텍스트
 * 결과는 [0-9X]만 남긴 10자리 또는 13자리 문자열
 */

import type { ItemPageContent } from "@/core/domain/ItemPageContent";
import {
  firstMatch,
  type FallbackStrategy,
} from "@/extractors/common/FallbackChain";

/**
 * "ISBN", "ISBN-10", "ISBN13" 라벨 뒤의 13자리(978/979) 또는 10자리(끝자리 X 허용)
 * 숫자 사이의 하이픈/공백 허용
 */
const ISBN_PATTERN =
  /ISBN(?:-?1[03])?[:\s]*((?:97[89][-\s]?)?(?:\d[-\s]?){9}[\dX])(?!\d)/i;

/**
 * 하이픈/공백 제거, 대문자 X 정규화
 * 10자리/13자리가 아니면 null
 */
export function normalizeIsbn(raw: string | null): string | null {
  if (!raw) {
    return null;
  }
  const cleaned = raw.toUpperCase().replace(/[^0-9X]/g, "");
  return cleaned.length === 10 || cleaned.length === 13 ? cleaned : null;
}

/**
 * 텍스트에서 라벨이 붙은 ISBN 검색
 */
export function findIsbnInText(text: string | null): string | null {
  if (!text) {
    return null;
  }
  const match = text.match(ISBN_PATTERN);
  return match ? normalizeIsbn(match[1]) : null;
}

export const ISBN_CHAIN: ReadonlyArray<FallbackStrategy<ItemPageContent, string>> = [
  { name: "details", extract: (content) => findIsbnInText(content.detailsText) },
  {
    name: "structured_data",
    extract: (content) => normalizeIsbn(content.structuredData.isbn),
  },
  { name: "body", extract: (content) => findIsbnInText(content.bodyText) },
];

export function extractIsbn(content: ItemPageContent): string | null {
  return firstMatch(ISBN_CHAIN, content);
}
