/**
 * Catalog Crawler CLI
 *
 * 사용법:
 *   npx tsx src/crawl.ts [maxItems] [--catalog <id>] [--dry-run] [--max-pages <n>]
 *
 * 예시:
 *   npx tsx src/crawl.ts                 # MAX_BOOKS_PER_RUN 만큼 수집
 *   npx tsx src/crawl.ts 10 --dry-run    # 10건, 저장 없이 실행
 *
 * 환경변수:
 *   - SUPABASE_URL
 *   - SUPABASE_SERVICE_ROLE_KEY
 */

import "dotenv/config";
import { logger } from "@/config/logger";
import { CrawlError, errorMessage } from "@/core/interfaces/CrawlErrorType";
import { runCrawl } from "@/services/runCrawl";
import { parseCrawlArgs } from "@/utils/parseCrawlArgs";

async function main(): Promise<void> {
  const args = parseCrawlArgs(process.argv.slice(2));

  console.log(
    `\n📚 ${args.catalogId} 크롤링 시작 (최대 ${args.maxItems}건${args.dryRun ? ", dry-run" : ""})`,
  );

  const summary = await runCrawl(args.maxItems, {
    catalogId: args.catalogId,
    dryRun: args.dryRun,
    maxPages: args.maxPages,
  });

  console.log(`\n${"─".repeat(50)}`);
  console.log(`✅ 완료! (${summary.stopReason})`);
  console.log(`   저장: ${summary.accepted}건`);
  console.log(`   중복: ${summary.skipped}건`);
  console.log(`   실패: ${summary.failed}건`);
  console.log(`   페이지: ${summary.pagesVisited}`);
  console.log(`${"─".repeat(50)}\n`);
}

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof CrawlError) {
      logger.error(error.toLogObject(), "[crawl] 실행 실패");
    }
    console.error("\n❌ 오류:", errorMessage(error));
    process.exit(1);
  });
