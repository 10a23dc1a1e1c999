/**
 * Book 도메인 모델
 *
 * - CandidateRecord: 상품 페이지 1건에서 추출한 결과 (저장 직전 형태)
 * - BookRow: books 테이블 레코드 (snake_case, 선택 필드는 null)
 * - BookEntity: 중복 확인 조회 결과
 */

import { z } from "zod";
import { BINDING_LABELS } from "@/core/domain/Binding";

/**
 * 빈 문자열을 null로 변환하는 전처리기
 */
const emptyToNull = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === "" ? null : val), schema);

/**
 * CandidateRecord Zod 스키마
 *
 * Note: title, author, sku, sourceUrl 외 모든 필드는 nullable
 * Note: category / subcategory는 추출하지 않고 오케스트레이터가 부여
 */
export const CandidateRecordSchema = z.object({
  title: z.string().trim().min(1),
  author: z.string().trim().min(1),
  sku: z.string().trim().min(1),
  isbn: emptyToNull(
    z
      .string()
      .regex(/^[0-9X]+$/)
      .nullable(),
  ),
  price: z.number().nonnegative().nullable(),
  condition: emptyToNull(z.string().nullable()),
  binding: z.enum(BINDING_LABELS).nullable(),
  publisher: emptyToNull(z.string().nullable()),
  publicationYear: z.number().int().min(1000).max(9999).nullable(),
  description: emptyToNull(z.string().nullable()),
  imageUrl: emptyToNull(z.string().nullable()),
  sourceUrl: z.string().url(),
  category: z.string().nullable(),
  subcategory: z.string().nullable(),
});

export type CandidateRecord = z.infer<typeof CandidateRecordSchema>;

/**
 * ItemExtractor 출력 (카테고리 부여 전)
 */
export type ExtractedBook = Omit<CandidateRecord, "category" | "subcategory">;

/**
 * books 테이블 INSERT 레코드
 */
export interface BookRow {
  title: string;
  author: string;
  sku: string;
  isbn: string | null;
  price: number | null;
  condition: string | null;
  binding: string | null;
  publisher: string | null;
  publication_year: number | null;
  description: string | null;
  image_url: string | null;
  source_url: string;
  category: string | null;
  subcategory: string | null;
}

/**
 * CandidateRecord → BookRow 변환
 * 누락 필드는 생략하지 않고 null로 채운다
 */
export function toBookRow(record: CandidateRecord): BookRow {
  return {
    title: record.title,
    author: record.author,
    sku: record.sku,
    isbn: record.isbn,
    price: record.price,
    condition: record.condition,
    binding: record.binding,
    publisher: record.publisher,
    publication_year: record.publicationYear,
    description: record.description,
    image_url: record.imageUrl,
    source_url: record.sourceUrl,
    category: record.category,
    subcategory: record.subcategory,
  };
}

/**
 * 중복 확인 조회 결과 스키마
 */
export const BookRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  sku: z.string(),
  title: emptyToNull(z.string().nullable()),
  source_url: emptyToNull(z.string().nullable()),
});

export type BookRecord = z.infer<typeof BookRecordSchema>;

/**
 * Book 도메인 엔티티 (저장된 도서)
 */
export class BookEntity {
  constructor(
    public readonly id: string,
    public readonly sku: string,
    public readonly title: string | null,
    public readonly sourceUrl: string | null,
  ) {
    if (!this.sku) {
      throw new Error("sku is required");
    }
  }

  static fromDbRecord(record: BookRecord): BookEntity {
    return new BookEntity(record.id, record.sku, record.title, record.source_url);
  }
}
