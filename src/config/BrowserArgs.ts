/**
 * Browser Launch Arguments
 *
 * 목적:
 * - Chrome 플래그 중복 제거
 * - 카테고리별 플래그 조합
 */

export const BROWSER_ARGS = {
  /**
   * 메모리 최적화 플래그
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage", // /dev/shm 사용 최소화
    "--disable-gpu",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /**
   * 자동화 제어 표시 제거
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Sandbox 플래그 (Docker 환경 필수)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * 기본 조합 (Docker + Memory + Stealth)
   */
  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
};
