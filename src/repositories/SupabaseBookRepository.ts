/**
 * Supabase Book Repository 구현
 *
 * SOLID 원칙:
 * - SRP: Supabase와의 데이터 통신만 담당
 * - DIP: IBookRepository 인터페이스 구현
 *
 * Design Pattern:
 * - Repository Pattern: 데이터 접근 로직 캡슐화
 * - Singleton Pattern: Supabase 클라이언트 재사용
 */

import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { IBookRepository } from "@/core/interfaces/IBookRepository";
import {
  BookEntity,
  BookRecordSchema,
  CandidateRecord,
  toBookRow,
} from "@/core/domain/Book";
import {
  CrawlError,
  CrawlErrorType,
  DuplicateKeyError,
  errorMessage,
} from "@/core/interfaces/CrawlErrorType";
import { DATABASE_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";

const InsertedRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
});

/**
 * Supabase Book Repository
 */
export class SupabaseBookRepository implements IBookRepository {
  private static instance: SupabaseClient | null = null;
  private client: SupabaseClient;
  private readonly tableName = DATABASE_CONFIG.BOOK_TABLE_NAME;

  constructor() {
    this.client = this.getSupabaseClient();
  }

  /**
   * Supabase 클라이언트 가져오기 (Singleton)
   */
  private getSupabaseClient(): SupabaseClient {
    if (SupabaseBookRepository.instance) {
      return SupabaseBookRepository.instance;
    }

    const supabaseUrl = process.env.SUPABASE_URL;
    const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

    if (!supabaseUrl || !supabaseKey) {
      throw new CrawlError(
        CrawlErrorType.CONFIG_ERROR,
        "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in environment variables",
      );
    }

    SupabaseBookRepository.instance = createClient(supabaseUrl, supabaseKey);
    logger.info("[Repository] Supabase client 초기화 완료");

    return SupabaseBookRepository.instance;
  }

  /**
   * SKU로 도서 조회
   */
  async findBySku(sku: string): Promise<BookEntity | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select(DATABASE_CONFIG.DEDUP_SELECT)
      .eq("sku", sku)
      .maybeSingle();

    if (error) {
      logger.error(
        { sku, error: error.message, code: error.code },
        "[Repository] SKU 조회 실패",
      );
      throw new CrawlError(
        CrawlErrorType.PERSISTENCE_ERROR,
        `Supabase query failed: ${error.message}`,
      );
    }

    if (!data) {
      return null;
    }

    const parsed = BookRecordSchema.safeParse(data);
    if (!parsed.success) {
      throw new CrawlError(
        CrawlErrorType.PERSISTENCE_ERROR,
        `Unexpected book row for sku ${sku}: ${parsed.error.message}`,
      );
    }
    return BookEntity.fromDbRecord(parsed.data);
  }

  /**
   * 도서 삽입
   * @throws DuplicateKeyError unique 충돌 (23505)
   */
  async insert(record: CandidateRecord): Promise<string> {
    const { data, error } = await this.client
      .from(this.tableName)
      .insert(toBookRow(record))
      .select("id")
      .single();

    if (error) {
      if (error.code === DATABASE_CONFIG.UNIQUE_VIOLATION_CODE) {
        throw new DuplicateKeyError(record.sku);
      }
      logger.error(
        { sku: record.sku, error: error.message, code: error.code },
        "[Repository] 도서 저장 실패",
      );
      throw new CrawlError(
        CrawlErrorType.PERSISTENCE_ERROR,
        `Supabase insert failed: ${error.message}`,
      );
    }

    const parsed = InsertedRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new CrawlError(
        CrawlErrorType.PERSISTENCE_ERROR,
        `Insert returned no id for sku ${record.sku}`,
      );
    }

    logger.debug({ sku: record.sku, id: parsed.data.id }, "[Repository] 도서 저장");
    return parsed.data.id;
  }

  /**
   * 연결 상태 확인
   */
  async healthCheck(): Promise<boolean> {
    try {
      const { error } = await this.client
        .from(this.tableName)
        .select("id", { count: "exact", head: true })
        .limit(1);

      if (error) {
        logger.error({ error: error.message }, "[Repository] Health check 실패");
        return false;
      }
      return true;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "[Repository] Health check 에러");
      return false;
    }
  }
}
