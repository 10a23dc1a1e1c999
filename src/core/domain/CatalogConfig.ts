/**
 * 카탈로그 설정 도메인 모델 (catalogs/*.yaml)
 *
 * 목록 URL, 페이지 파라미터, 셀렉터, SKU 접두어, 카테고리 부여 정보
 */

import { z } from "zod";

const selector = z.string().min(1);

export const CatalogSelectorsSchema = z.object({
  /** 목록 페이지의 상품 링크 */
  itemLink: selector,
  title: selector,
  author: selector,
  price: selector,
  condition: selector,
  description: selector,
  /** 상세 정보 컨테이너 (ISBN, 제본, 출판사 텍스트) */
  details: selector,
  /** 대표 이미지 (첫 번째 매칭 요소) */
  image: selector,
  /** 명시적 SKU 요소 */
  skuElement: selector,
  /** JSON-LD script 태그 */
  structuredData: selector,
  /** 전체 텍스트 fallback 범위 */
  body: selector.default("body"),
});

export const CatalogConfigSchema = z.object({
  catalog: z.string().min(1),
  name: z.string().min(1),
  baseUrl: z.string().url(),
  listingUrl: z.string().url(),
  pageParam: z.string().min(1).default("page"),
  skuPrefix: z
    .string()
    .regex(/^[A-Z0-9]+$/, "skuPrefix must be uppercase alphanumeric"),
  category: z.string().min(1).nullable().default(null),
  subcategory: z.string().min(1).nullable().default(null),
  browser: z
    .object({
      locale: z.string().default("en-IE"),
      timezoneId: z.string().default("Europe/Dublin"),
    })
    .default({}),
  selectors: CatalogSelectorsSchema,
});

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type CatalogSelectors = z.infer<typeof CatalogSelectorsSchema>;
