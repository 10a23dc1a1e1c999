/**
 * 출판사 / 출판연도 추출
 *
 * 상세 텍스트 기준, 두 값은 서로 독립적으로 추출
 */

import type { ItemPageContent } from "@/core/domain/ItemPageContent";
import {
  firstMatch,
  type FallbackStrategy,
} from "@/extractors/common/FallbackChain";

const PUBLISHER_PATTERN = /Publisher[:\s]*([^,\n\r.]+)/i;

/**
 * 연도 패턴 (우선순위 순)
 */
const YEAR_PATTERNS: ReadonlyArray<{ name: string; pattern: RegExp }> = [
  { name: "published_in", pattern: /Published[:\s]*in[:\s]*(\d{4})/i },
  { name: "publication_year", pattern: /Publication[:\s]*year[:\s]*(\d{4})/i },
  { name: "year", pattern: /Year[:\s]*(\d{4})/i },
];

const MIN_YEAR = 1000;
const MAX_YEAR = 9999;

/**
 * 범위 밖 연도(예: 0950)는 매칭 실패로 보고 다음 패턴으로 넘어간다
 */
const YEAR_CHAIN: ReadonlyArray<FallbackStrategy<string, number>> =
  YEAR_PATTERNS.map(({ name, pattern }) => ({
    name,
    extract: (text: string) => {
      const match = text.match(pattern);
      if (!match) {
        return null;
      }
      const year = parseInt(match[1], 10);
      return year >= MIN_YEAR && year <= MAX_YEAR ? year : null;
    },
  }));

export interface PublicationDetails {
  publisher: string | null;
  publicationYear: number | null;
}

export function findPublisher(text: string | null): string | null {
  if (!text) {
    return null;
  }
  const match = text.match(PUBLISHER_PATTERN);
  const publisher = match?.[1].trim();
  return publisher || null;
}

export function findPublicationYear(text: string | null): number | null {
  if (!text) {
    return null;
  }
  return firstMatch(YEAR_CHAIN, text);
}

export function extractPublication(content: ItemPageContent): PublicationDetails {
  return {
    publisher: findPublisher(content.detailsText),
    publicationYear: findPublicationYear(content.detailsText),
  };
}
