/**
 * YAML 카탈로그 설정 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: YAML 파일 로드/검증만 담당
 * - OCP: 새로운 카탈로그 추가 시 YAML만 추가
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import {
  CatalogConfig,
  CatalogConfigSchema,
} from "@/core/domain/CatalogConfig";
import { CrawlError, CrawlErrorType } from "@/core/interfaces/CrawlErrorType";
import { PATH_CONFIG } from "./constants";
import { logger } from "./logger";

export class ConfigLoader {
  private static instance: ConfigLoader | null = null;
  private readonly configCache = new Map<string, CatalogConfig>();

  constructor(private readonly catalogsDir: string = PATH_CONFIG.CATALOGS_DIR) {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 카탈로그 YAML 로드 (캐시)
   */
  loadCatalog(catalogId: string): CatalogConfig {
    const cached = this.configCache.get(catalogId);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.catalogsDir, `${catalogId}.yaml`);

    if (!fs.existsSync(configPath)) {
      throw new CrawlError(
        CrawlErrorType.CONFIG_ERROR,
        `Catalog config not found: ${configPath}`,
      );
    }

    let raw: unknown;
    try {
      raw = yaml.load(fs.readFileSync(configPath, "utf8"));
    } catch (error) {
      throw new CrawlError(
        CrawlErrorType.CONFIG_ERROR,
        `Catalog config is not valid YAML: ${configPath}`,
        { cause: error },
      );
    }

    const parsed = CatalogConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new CrawlError(
        CrawlErrorType.CONFIG_ERROR,
        `Invalid catalog config (${catalogId}): ${issues}`,
      );
    }

    if (parsed.data.catalog !== catalogId) {
      throw new CrawlError(
        CrawlErrorType.CONFIG_ERROR,
        `Catalog id mismatch: file ${catalogId}.yaml declares "${parsed.data.catalog}"`,
      );
    }

    this.configCache.set(catalogId, parsed.data);
    logger.debug({ catalog: catalogId }, "[ConfigLoader] 카탈로그 설정 로드");

    return parsed.data;
  }

  /**
   * 사용 가능한 카탈로그 목록
   */
  getAvailableCatalogs(): string[] {
    if (!fs.existsSync(this.catalogsDir)) {
      throw new CrawlError(
        CrawlErrorType.CONFIG_ERROR,
        `Catalogs directory not found: ${this.catalogsDir}`,
      );
    }

    return fs
      .readdirSync(this.catalogsDir)
      .filter((file) => file.endsWith(".yaml"))
      .map((file) => file.replace(/\.yaml$/, ""))
      .sort();
  }

  /**
   * 캐시 초기화
   */
  clearCache(): void {
    this.configCache.clear();
  }
}
