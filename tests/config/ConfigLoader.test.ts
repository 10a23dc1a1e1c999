/**
 * ConfigLoader Test
 */

import { describe, it, expect } from "@jest/globals";
import * as path from "path";
import { ConfigLoader } from "@/config/ConfigLoader";
import { PATH_CONFIG } from "@/config/constants";
import { CrawlError, CrawlErrorType } from "@/core/interfaces/CrawlErrorType";

const FIXTURE_DIR = path.join(__dirname, "../fixtures/catalogs");

function configErrorOf(fn: () => unknown): CrawlError | null {
  try {
    fn();
    return null;
  } catch (error) {
    return error instanceof CrawlError && error.type === CrawlErrorType.CONFIG_ERROR
      ? error
      : null;
  }
}

describe("ConfigLoader", () => {
  it("YAML을 로드하고 기본값을 채워야 함", () => {
    const config = new ConfigLoader(FIXTURE_DIR).loadCatalog("testbooks");

    expect(config.listingUrl).toBe("https://books.example.test/collections/rare");
    expect(config.pageParam).toBe("page");
    expect(config.subcategory).toBeNull();
    expect(config.browser).toEqual({ locale: "en-GB", timezoneId: "Europe/London" });
    expect(config.selectors.body).toBe("body");
  });

  it("같은 카탈로그는 캐시된 객체를 반환해야 함", () => {
    const loader = new ConfigLoader(FIXTURE_DIR);
    const first = loader.loadCatalog("testbooks");

    expect(loader.loadCatalog("testbooks")).toBe(first);
    loader.clearCache();
    expect(loader.loadCatalog("testbooks")).not.toBe(first);
  });

  it("파일이 없으면 CONFIG_ERROR", () => {
    const error = configErrorOf(() => new ConfigLoader(FIXTURE_DIR).loadCatalog("nope"));

    expect(error?.message).toBe(
      `Catalog config not found: ${path.join(FIXTURE_DIR, "nope.yaml")}`,
    );
  });

  it("YAML 문법 오류면 CONFIG_ERROR", () => {
    const error = configErrorOf(() => new ConfigLoader(FIXTURE_DIR).loadCatalog("broken-yaml"));

    expect(error?.message).toBe(
      `Catalog config is not valid YAML: ${path.join(FIXTURE_DIR, "broken-yaml.yaml")}`,
    );
  });

  it("스키마 검증 실패면 문제 필드를 알려야 함", () => {
    const error = configErrorOf(() =>
      new ConfigLoader(FIXTURE_DIR).loadCatalog("broken-schema"),
    );

    expect(error?.message).toContain("Invalid catalog config (broken-schema)");
    expect(error?.message).toContain("baseUrl");
    expect(error?.message).toContain("skuPrefix: skuPrefix must be uppercase alphanumeric");
    expect(error?.message).toContain("selectors.title");
  });

  it("catalog 필드가 파일명과 다르면 CONFIG_ERROR", () => {
    const error = configErrorOf(() => new ConfigLoader(FIXTURE_DIR).loadCatalog("renamed"));

    expect(error?.type).toBe(CrawlErrorType.CONFIG_ERROR);
    expect(error?.message).toBe('Catalog id mismatch: file renamed.yaml declares "other-name"');
  });

  it("사용 가능한 카탈로그 목록 (정렬)", () => {
    expect(new ConfigLoader(FIXTURE_DIR).getAvailableCatalogs()).toEqual([
      "broken-schema",
      "broken-yaml",
      "renamed",
      "testbooks",
    ]);
  });

  it("기본 디렉터리의 worldofbooks 카탈로그가 유효해야 함", () => {
    const config = new ConfigLoader(PATH_CONFIG.CATALOGS_DIR).loadCatalog("worldofbooks");

    expect(config.skuPrefix).toBe("WOB");
    expect(config.category).toBe("Rare Non-Fiction");
  });
});
