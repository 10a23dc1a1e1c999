/**
 * SupabaseBookRepository Test
 *
 * Supabase 클라이언트는 메모리 query builder로 대체
 */

import { describe, it, expect, beforeEach, jest } from "@jest/globals";

interface MockError {
  message: string;
  code?: string;
}

interface MockResult {
  data: unknown;
  error: MockError | null;
}

interface MockQuery {
  from(...args: unknown[]): MockQuery;
  select(...args: unknown[]): MockQuery;
  eq(...args: unknown[]): MockQuery;
  insert(...args: unknown[]): MockQuery;
  maybeSingle(): Promise<MockResult>;
  single(): Promise<MockResult>;
  limit(...args: unknown[]): Promise<MockResult>;
}

const mockCalls: Array<{ method: string; args: unknown[] }> = [];
const mockState: { result: MockResult } = { result: { data: null, error: null } };

const mockClient: MockQuery = {
  from: (...args) => mockChain("from", args),
  select: (...args) => mockChain("select", args),
  eq: (...args) => mockChain("eq", args),
  insert: (...args) => mockChain("insert", args),
  maybeSingle: async () => mockFinish("maybeSingle", []),
  single: async () => mockFinish("single", []),
  limit: async (...args) => mockFinish("limit", args),
};

function mockChain(method: string, args: unknown[]): MockQuery {
  mockCalls.push({ method, args });
  return mockClient;
}

function mockFinish(method: string, args: unknown[]): MockResult {
  mockCalls.push({ method, args });
  return mockState.result;
}

jest.mock("@supabase/supabase-js", () => ({
  createClient: () => mockClient,
}));

import { CrawlError, CrawlErrorType, DuplicateKeyError } from "@/core/interfaces/CrawlErrorType";
import { SupabaseBookRepository } from "@/repositories/SupabaseBookRepository";
import { candidateRecord } from "../helpers/fixtures";

describe("SupabaseBookRepository", () => {
  beforeEach(() => {
    mockCalls.length = 0;
    mockState.result = { data: null, error: null };
  });

  it("환경변수가 없으면 CONFIG_ERROR", () => {
    delete process.env.SUPABASE_URL;
    delete process.env.SUPABASE_SERVICE_ROLE_KEY;

    let caught: unknown = null;
    try {
      new SupabaseBookRepository();
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof CrawlError && caught.type).toBe(CrawlErrorType.CONFIG_ERROR);
  });

  describe("환경변수 설정 후", () => {
    let repository: SupabaseBookRepository;

    beforeEach(() => {
      process.env.SUPABASE_URL = "http://localhost:54321";
      process.env.SUPABASE_SERVICE_ROLE_KEY = "test-secret";
      repository = new SupabaseBookRepository();
    });

    it("findBySku: 행이 있으면 BookEntity", async () => {
      mockState.result = {
        data: { id: 42, sku: "sb-book-01", title: "Stored", source_url: "" },
        error: null,
      };

      const found = await repository.findBySku("sb-book-01");

      expect(found?.id).toBe("42");
      expect(found?.sku).toBe("sb-book-01");
      expect(found?.sourceUrl).toBeNull();
      expect(mockCalls.map((call) => call.method)).toEqual([
        "from",
        "select",
        "eq",
        "maybeSingle",
      ]);
      expect(mockCalls[0].args).toEqual(["books"]);
      expect(mockCalls[1].args).toEqual(["id, sku, title, source_url"]);
      expect(mockCalls[2].args).toEqual(["sku", "sb-book-01"]);
    });

    it("findBySku: 행이 없으면 null", async () => {
      expect(await repository.findBySku("sb-none-01")).toBeNull();
    });

    it("findBySku: 쿼리 에러는 PERSISTENCE_ERROR", async () => {
      mockState.result = { data: null, error: { message: "timeout", code: "57014" } };

      await expect(repository.findBySku("sb-book-01")).rejects.toThrow(
        "Supabase query failed: timeout",
      );
    });

    it("insert: snake_case 행으로 저장하고 ID 반환", async () => {
      mockState.result = { data: { id: "uuid-1" }, error: null };
      const record = candidateRecord({
        sku: "sb-book-02",
        publicationYear: 1999,
        imageUrl: "https://books.example.test/i.jpg",
      });

      expect(await repository.insert(record)).toBe("uuid-1");

      const insertCall = mockCalls.find((call) => call.method === "insert");
      expect(insertCall?.args[0]).toEqual({
        title: "Seed Book",
        author: "Seed Author",
        sku: "sb-book-02",
        isbn: null,
        price: null,
        condition: null,
        binding: null,
        publisher: null,
        publication_year: 1999,
        description: null,
        image_url: "https://books.example.test/i.jpg",
        source_url: "https://books.example.test/products/seed-book-001",
        category: null,
        subcategory: null,
      });
    });

    it("insert: unique 충돌(23505)은 DuplicateKeyError", async () => {
      mockState.result = {
        data: null,
        error: { message: "duplicate key value violates unique constraint", code: "23505" },
      };

      await expect(
        repository.insert(candidateRecord({ sku: "sb-book-03" })),
      ).rejects.toBeInstanceOf(DuplicateKeyError);
    });

    it("insert: 그 외 에러는 PERSISTENCE_ERROR", async () => {
      mockState.result = { data: null, error: { message: "permission denied", code: "42501" } };

      await expect(
        repository.insert(candidateRecord({ sku: "sb-book-04" })),
      ).rejects.toThrow("Supabase insert failed: permission denied");
    });

    it("healthCheck: 에러 여부로 판단", async () => {
      expect(await repository.healthCheck()).toBe(true);

      mockState.result = { data: null, error: { message: "unreachable" } };
      expect(await repository.healthCheck()).toBe(false);
    });
  });
});
