/**
 * JSON-LD Schema.org 식별자 추출기
 *
 * SOLID 원칙:
 * - SRP: JSON-LD 본문에서 sku / isbn 찾기만 담당
 * - OCP: 새로운 필드는 스키마 + 수집 로직에만 추가
 *
 * 브라우저에서는 script 본문 문자열만 가져오고 (PageScripts.readStructuredDataBlocks)
 * 파싱/검증은 Node 측에서 수행한다.
 * 파싱 실패 블록은 무시한다.
 */

import { z } from "zod";
import { logger } from "@/config/logger";
import type { StructuredData } from "@/core/domain/ItemPageContent";

/**
 * 문자열 또는 숫자 식별자 → trim된 문자열
 * 다른 타입이면 undefined (노드 전체를 버리지 않음)
 */
const IdentifierSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional()
  .catch(undefined);

const OfferSchema = z.object({
  sku: IdentifierSchema,
});

/**
 * Schema.org 노드 (Product, Book 등)
 */
const SchemaOrgNodeSchema = z.object({
  sku: IdentifierSchema,
  isbn: IdentifierSchema,
  offers: z
    .union([OfferSchema, z.array(OfferSchema)])
    .optional()
    .catch(undefined),
  "@graph": z.array(z.unknown()).optional().catch(undefined),
});

type SchemaOrgNode = z.infer<typeof SchemaOrgNodeSchema>;

export class StructuredDataExtractor {
  /**
   * JSON-LD 본문 목록 → sku / isbn
   *
   * 문서 순서대로 노드를 훑어 첫 번째 non-empty 값 채택
   * sku: 노드의 sku → offers.sku 순
   */
  static extract(blocks: ReadonlyArray<string>): StructuredData {
    const nodes = blocks.flatMap((block) => this.parseBlock(block));

    let sku: string | null = null;
    let isbn: string | null = null;

    for (const node of nodes) {
      sku = sku ?? this.skuOf(node);
      isbn = isbn ?? (node.isbn || null);
      if (sku && isbn) {
        break;
      }
    }

    return { sku, isbn };
  }

  /**
   * JSON-LD 블록 1개 → 노드 목록 (배열, @graph 평탄화)
   */
  static parseBlock(block: string): SchemaOrgNode[] {
    const trimmed = block.trim();
    if (!trimmed) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      logger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "[StructuredData] JSON-LD 파싱 실패, 블록 무시",
      );
      return [];
    }

    return this.flatten(parsed);
  }

  private static flatten(value: unknown): SchemaOrgNode[] {
    if (Array.isArray(value)) {
      return value.flatMap((item) => this.flatten(item));
    }

    const result = SchemaOrgNodeSchema.safeParse(value);
    if (!result.success) {
      return [];
    }

    const node = result.data;
    const graph = node["@graph"] ?? [];
    return [node, ...graph.flatMap((item) => this.flatten(item))];
  }

  private static skuOf(node: SchemaOrgNode): string | null {
    if (node.sku) {
      return node.sku;
    }

    const offers = Array.isArray(node.offers)
      ? node.offers
      : node.offers
        ? [node.offers]
        : [];

    for (const offer of offers) {
      if (offer.sku) {
        return offer.sku;
      }
    }
    return null;
  }
}
