/**
 * Book Repository 인터페이스 (영속성 협력자)
 *
 * SOLID 원칙:
 * - ISP: 크롤러가 필요로 하는 조회/삽입만 노출
 * - DIP: Supabase 구체 구현에 의존하지 않음
 */

import type { BookEntity, CandidateRecord } from "@/core/domain/Book";

export interface IBookRepository {
  /**
   * SKU로 기존 도서 조회 (중복 확인)
   * @returns 저장된 도서 또는 null
   */
  findBySku(sku: string): Promise<BookEntity | null>;

  /**
   * 도서 삽입
   * @returns 생성된 ID
   * @throws DuplicateKeyError SKU unique 충돌
   */
  insert(record: CandidateRecord): Promise<string>;

  /**
   * 연결 상태 확인
   */
  healthCheck(): Promise<boolean>;
}
