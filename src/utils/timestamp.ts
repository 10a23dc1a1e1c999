/**
 * 타임스탬프 유틸리티
 *
 * SOLID 원칙:
 * - SRP: 타임스탬프 생성만 담당
 */

/**
 * 두 자리 0 패딩
 */
function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+01:00)
 *
 * 특징:
 * - 시스템의 로컬 타임존 자동 감지 (TZ 환경 변수 사용)
 * - 밀리초 단위까지 기록
 *
 * @param now 기준 시각 (기본: 현재)
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  const date = getDateDirName(now);
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;

  return `${date}T${time}${offsetSign}${pad(offsetHours)}:${pad(offsetMinutes)}`;
}

/**
 * YYYY-MM-DD 형식의 날짜 문자열 반환 (로컬 타임존 기준)
 * 로그 디렉터리명으로 사용
 */
export function getDateDirName(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}
