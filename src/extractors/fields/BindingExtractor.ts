/**
 * 제본 형태 추출
 *
 * 상세 텍스트에서 닫힌 어휘를 순서대로 단어 경계 매칭 (대소문자 무시)
 */

import {
  BINDING_VOCABULARY,
  type BindingLabel,
  type BindingTerm,
} from "@/core/domain/Binding";
import type { ItemPageContent } from "@/core/domain/ItemPageContent";

const escapeRegExp = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * 검색어별 정규식 (모듈 로드 시 1회 생성)
 */
const BINDING_PATTERNS: ReadonlyArray<{ pattern: RegExp; label: BindingLabel }> =
  BINDING_VOCABULARY.map((entry: BindingTerm) => ({
    pattern: new RegExp(`\\b${escapeRegExp(entry.term)}\\b`, "i"),
    label: entry.label,
  }));

/**
 * 텍스트 → 정규화된 제본 표기
 * 어휘 순서상 첫 번째 매칭을 채택
 */
export function findBinding(text: string | null): BindingLabel | null {
  if (!text) {
    return null;
  }
  for (const { pattern, label } of BINDING_PATTERNS) {
    if (pattern.test(text)) {
      return label;
    }
  }
  return null;
}

export function extractBinding(content: ItemPageContent): BindingLabel | null {
  return findBinding(content.detailsText);
}
