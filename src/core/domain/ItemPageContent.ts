/**
 * 상품 페이지 1건에서 읽어 온 원시 값
 *
 * ItemPageReader가 브라우저에서 한 번 읽고,
 * 필드 추출기(fields/*)는 이 값만 보고 동작한다. (브라우저 접근 없음)
 */

/**
 * JSON-LD에서 찾은 식별자
 */
export interface StructuredData {
  /** sku 또는 offers.sku (첫 번째 값) */
  sku: string | null;
  /** isbn (원문 그대로) */
  isbn: string | null;
}

export interface ItemPageContent {
  /** 상품 페이지 URL */
  url: string;
  title: string | null;
  author: string | null;
  priceText: string | null;
  condition: string | null;
  description: string | null;
  /** 상세 정보 컨테이너 텍스트 (ISBN, 제본, 출판 정보) */
  detailsText: string | null;
  /** 페이지 전체 텍스트 */
  bodyText: string | null;
  /** 명시적 SKU 요소 값 (data-sku 속성 또는 텍스트) */
  skuElement: string | null;
  /** 대표 이미지 src (절대 URL) */
  imageUrl: string | null;
  structuredData: StructuredData;
}
