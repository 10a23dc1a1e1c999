/**
 * CLI 인자 파싱
 *
 *   [maxItems] [--catalog <id>] [--dry-run] [--max-pages <n>]
 */

import { CRAWL_CONFIG } from "@/config/constants";
import { CrawlError, CrawlErrorType } from "@/core/interfaces/CrawlErrorType";

export interface CrawlArgs {
  maxItems: number;
  catalogId: string;
  dryRun: boolean;
  maxPages: number;
}

const POSITIVE_INT = /^\d+$/;

function parseCount(flag: string, raw: string | undefined): number {
  if (raw === undefined || !POSITIVE_INT.test(raw)) {
    throw new CrawlError(
      CrawlErrorType.INVALID_INPUT,
      `${flag} expects a non-negative integer (got ${raw ?? "nothing"})`,
    );
  }
  return parseInt(raw, 10);
}

export function parseCrawlArgs(argv: ReadonlyArray<string>): CrawlArgs {
  const args: CrawlArgs = {
    maxItems: CRAWL_CONFIG.MAX_ITEMS_PER_RUN,
    catalogId: CRAWL_CONFIG.DEFAULT_CATALOG,
    dryRun: false,
    maxPages: CRAWL_CONFIG.MAX_PAGES,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--dry-run":
        args.dryRun = true;
        break;
      case "--catalog": {
        const value = argv[++i];
        if (!value || value.startsWith("--")) {
          throw new CrawlError(
            CrawlErrorType.INVALID_INPUT,
            "--catalog expects a catalog id",
          );
        }
        args.catalogId = value;
        break;
      }
      case "--max-pages":
        args.maxPages = parseCount("--max-pages", argv[++i]);
        break;
      default:
        if (arg.startsWith("--")) {
          throw new CrawlError(CrawlErrorType.INVALID_INPUT, `Unknown option: ${arg}`);
        }
        args.maxItems = parseCount("maxItems", arg);
    }
  }

  return args;
}
