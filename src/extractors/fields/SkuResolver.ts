/**
 * SKU 결정 (3단계 fallback)
 *
 * 1. URL: pathname의 마지막 세그먼트 (6자 이상)
 * 2. 페이지: SKU 요소 → JSON-LD sku/offers.sku → 본문 "SKU: <token>"
 * 3. 합성: <PREFIX>-<URL의 FNV-1a 32bit 해시 % 10^7, 7자리>
 *
 * 3단계는 같은 URL이면 실행/플랫폼과 무관하게 같은 값 → 재실행 중복 제거 가능
 */

import type { ItemPageContent } from "@/core/domain/ItemPageContent";
import {
  runFallbackChain,
  type FallbackStrategy,
} from "@/extractors/common/FallbackChain";

/**
 * URL 세그먼트를 SKU로 인정하는 최소 길이 (초과)
 */
const MIN_URL_SKU_LENGTH = 5;

const PAGE_TEXT_SKU_PATTERN = /SKU:\s*([A-Z0-9-]+)/i;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const FALLBACK_MODULUS = 10_000_000;
const FALLBACK_DIGITS = 7;

export type SkuSource = "url" | "page" | "fallback";

export interface ResolvedSku {
  sku: string;
  source: SkuSource;
  /** 값을 찾은 전략 이름 */
  strategy: string;
}

/**
 * 1단계: URL에서 SKU 후보 추출 (쿼리스트링/fragment 무시)
 */
export function skuFromUrl(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }

  const segments = pathname.split("/").filter((segment) => segment !== "");
  const last = segments[segments.length - 1];
  if (!last) {
    return null;
  }

  let candidate: string;
  try {
    candidate = decodeURIComponent(last);
  } catch {
    candidate = last;
  }
  return candidate.length > MIN_URL_SKU_LENGTH ? candidate : null;
}

/**
 * FNV-1a 32bit (UTF-8 바이트 기준, unsigned)
 */
export function fnv1a32(text: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(text, "utf8")) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

/**
 * 3단계: URL 해시 기반 합성 SKU
 */
export function fallbackSku(url: string, prefix: string): string {
  const token = (fnv1a32(url) % FALLBACK_MODULUS)
    .toString()
    .padStart(FALLBACK_DIGITS, "0");
  return `${prefix}-${token}`;
}

const nonEmpty = (value: string | null): string | null => {
  const trimmed = value?.trim();
  return trimmed || null;
};

/**
 * 2단계 전략 (페이지 로드 후)
 */
export const PAGE_SKU_CHAIN: ReadonlyArray<
  FallbackStrategy<ItemPageContent, string>
> = [
  { name: "sku_element", extract: (content) => nonEmpty(content.skuElement) },
  {
    name: "structured_data",
    extract: (content) => nonEmpty(content.structuredData.sku),
  },
  {
    name: "page_text",
    extract: (content) => {
      const match = content.bodyText?.match(PAGE_TEXT_SKU_PATTERN);
      return match ? nonEmpty(match[1]) : null;
    },
  },
];

export class SkuResolver {
  constructor(private readonly prefix: string) {}

  /**
   * 방문 전 SKU (1단계만)
   */
  fromUrl(url: string): string | null {
    return skuFromUrl(url);
  }

  /**
   * 방문 후 SKU (1 → 2 → 3단계)
   */
  resolve(content: ItemPageContent): ResolvedSku {
    const urlSku = skuFromUrl(content.url);
    if (urlSku) {
      return { sku: urlSku, source: "url", strategy: "url_segment" };
    }

    const pageSku = runFallbackChain(PAGE_SKU_CHAIN, content);
    if (pageSku) {
      return { sku: pageSku.value, source: "page", strategy: pageSku.strategy };
    }

    return {
      sku: fallbackSku(content.url, this.prefix),
      source: "fallback",
      strategy: "url_hash",
    };
  }
}
