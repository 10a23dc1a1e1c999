/**
 * Page Capability 인터페이스
 *
 * 크롤링 코어가 브라우저에 요구하는 최소 기능:
 * - 페이지 이동
 * - 단일 요소 텍스트 조회
 * - 페이지 스크립트 실행 (JSON 직렬화 가능한 값 반환)
 *
 * SOLID 원칙:
 * - ISP: 추출에 필요한 것만 노출
 * - DIP: 추출 로직은 Playwright가 아닌 이 인터페이스에 의존
 */

/**
 * JSON 직렬화 가능한 값
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * 네비게이션 응답
 */
export interface NavigationResponse {
  /** 2xx 응답 여부 */
  ok: boolean;
  /** HTTP 상태 코드 (응답 없음: null) */
  status: number | null;
}

/**
 * 페이지(브라우저 컨텍스트)에서 실행되는 스크립트
 *
 * NOTE: 직렬화되어 브라우저로 전송되므로 클로저 변수 접근 불가
 * → 필요한 값은 selector 인자로만 전달
 */
export type PageScript = (selector: string) => JsonValue;

export interface IPageCapability {
  /**
   * 페이지 이동
   * @param url 대상 URL
   */
  goto(url: string): Promise<NavigationResponse>;

  /**
   * 첫 번째 매칭 요소의 텍스트 (trim, 없으면 null)
   * @param selector CSS Selector
   */
  queryOne(selector: string): Promise<string | null>;

  /**
   * 페이지 스크립트 실행
   * @param script 브라우저 컨텍스트 함수
   * @param selector 스크립트 인자
   */
  evaluate(script: PageScript, selector: string): Promise<JsonValue>;

  /**
   * 페이지 닫기
   */
  close(): Promise<void>;
}
