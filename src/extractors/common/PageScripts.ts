/**
 * 브라우저 컨텍스트 스크립트 모음
 *
 * NOTE: page.evaluate()로 직렬화되어 실행되므로
 * - 외부 변수/헬퍼 참조 불가 (selector 인자만 사용)
 * - 내부에 이름 있는 함수 선언 금지 (tsx keepNames의 __name 주입 회피)
 * - 반환값은 JSON 직렬화 가능해야 함
 */

import type { PageScript } from "@/core/interfaces/IPageCapability";

/**
 * 목록 페이지 상품 링크 href 수집 (문서 순서 유지)
 */
export const collectLinkHrefs: PageScript = (selector) =>
  Array.from(document.querySelectorAll(selector)).map(
    (el) =>
      (el instanceof HTMLAnchorElement ? el.href : "") ||
      el.getAttribute("href") ||
      "",
  );

/**
 * JSON-LD script 본문 수집 (파싱은 Node 측에서)
 */
export const readStructuredDataBlocks: PageScript = (selector) =>
  Array.from(document.querySelectorAll(selector)).map(
    (el) => el.textContent || "",
  );

/**
 * 명시적 SKU 요소 값
 * data-sku 속성 우선, 없으면 텍스트
 */
export const readSkuElement: PageScript = (selector) => {
  const el = document.querySelector(selector);
  if (!el) {
    return null;
  }
  const attribute = (el.getAttribute("data-sku") || "").trim();
  if (attribute) {
    return attribute;
  }
  return (el.textContent || "").trim() || null;
};

/**
 * 첫 번째 미디어 요소의 이미지 URL
 */
export const readFirstImageSource: PageScript = (selector) => {
  const el = document.querySelector(selector);
  if (!el) {
    return null;
  }
  if (el instanceof HTMLImageElement) {
    return el.currentSrc || el.src || null;
  }
  return el.getAttribute("src") || el.getAttribute("data-src") || null;
};
