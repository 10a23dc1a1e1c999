/**
 * In-Memory Book Repository
 *
 * --dry-run 실행과 테스트용 (SKU unique 제약 동일)
 */

import { v4 as uuidv4 } from "uuid";
import { BookEntity, CandidateRecord } from "@/core/domain/Book";
import { DuplicateKeyError } from "@/core/interfaces/CrawlErrorType";
import { IBookRepository } from "@/core/interfaces/IBookRepository";

export class InMemoryBookRepository implements IBookRepository {
  private readonly books = new Map<string, { id: string; record: CandidateRecord }>();

  constructor(seed: ReadonlyArray<CandidateRecord> = []) {
    for (const record of seed) {
      this.books.set(record.sku, { id: uuidv4(), record });
    }
  }

  async findBySku(sku: string): Promise<BookEntity | null> {
    const stored = this.books.get(sku);
    if (!stored) {
      return null;
    }
    return new BookEntity(
      stored.id,
      stored.record.sku,
      stored.record.title,
      stored.record.sourceUrl,
    );
  }

  async insert(record: CandidateRecord): Promise<string> {
    if (this.books.has(record.sku)) {
      throw new DuplicateKeyError(record.sku);
    }
    const id = uuidv4();
    this.books.set(record.sku, { id, record });
    return id;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /**
   * 저장된 레코드 (삽입 순서)
   */
  all(): CandidateRecord[] {
    return Array.from(this.books.values(), (entry) => entry.record);
  }

  get size(): number {
    return this.books.size;
  }
}
