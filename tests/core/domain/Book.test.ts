/**
 * Book 도메인 모델 Test
 */

import { describe, it, expect } from "@jest/globals";
import {
  BookEntity,
  BookRecordSchema,
  CandidateRecordSchema,
  toBookRow,
} from "@/core/domain/Book";
import { candidateRecord } from "../../helpers/fixtures";

describe("CandidateRecordSchema", () => {
  it("빈 문자열 선택 필드는 null로 정규화", () => {
    const parsed = CandidateRecordSchema.parse({
      ...candidateRecord(),
      isbn: "",
      publisher: "",
      description: "",
    });

    expect(parsed.isbn).toBeNull();
    expect(parsed.publisher).toBeNull();
    expect(parsed.description).toBeNull();
  });

  it("필수 필드 누락/형식 오류는 거부", () => {
    expect(CandidateRecordSchema.safeParse(candidateRecord({ title: "  " })).success).toBe(false);
    expect(CandidateRecordSchema.safeParse(candidateRecord({ sourceUrl: "not a url" })).success).toBe(false);
    expect(CandidateRecordSchema.safeParse(candidateRecord({ isbn: "978-0" })).success).toBe(false);
    expect(CandidateRecordSchema.safeParse(candidateRecord({ price: -1 })).success).toBe(false);
    expect(CandidateRecordSchema.safeParse(candidateRecord({ publicationYear: 19 })).success).toBe(false);
  });

  it("어휘 밖의 제본 형태는 거부", () => {
    expect(CandidateRecordSchema.safeParse(candidateRecord({ binding: "Paperback" })).success).toBe(true);
    expect(
      CandidateRecordSchema.safeParse({ ...candidateRecord(), binding: "Spiral" }).success,
    ).toBe(false);
  });
});

describe("toBookRow", () => {
  it("snake_case 컬럼으로 변환하고 누락 필드는 null 유지", () => {
    const row = toBookRow(
      candidateRecord({
        isbn: "9780140449136",
        price: 12.5,
        binding: "Hardback",
        publicationYear: 2003,
        category: "Rare Non-Fiction",
      }),
    );

    expect(row).toEqual({
      title: "Seed Book",
      author: "Seed Author",
      sku: "seed-book-001",
      isbn: "9780140449136",
      price: 12.5,
      condition: null,
      binding: "Hardback",
      publisher: null,
      publication_year: 2003,
      description: null,
      image_url: null,
      source_url: "https://books.example.test/products/seed-book-001",
      category: "Rare Non-Fiction",
      subcategory: null,
    });
  });
});

describe("BookEntity", () => {
  it("DB 레코드 숫자 ID는 문자열로 변환", () => {
    const entity = BookEntity.fromDbRecord(
      BookRecordSchema.parse({ id: 7, sku: "entity-01", title: "", source_url: null }),
    );

    expect(entity.id).toBe("7");
    expect(entity.title).toBeNull();
  });

  it("sku가 비면 에러", () => {
    expect(() => new BookEntity("1", "", null, null)).toThrow("sku is required");
  });
});
