/**
 * FallbackChain Utility
 *
 * 목적: 우선순위 순으로 추출 전략을 시도하고 첫 번째 결과를 채택
 * 패턴: Chain of Responsibility (순수 함수 배열)
 *
 * 예: ISBN = 상세 텍스트 → JSON-LD → 전체 텍스트
 */

/**
 * 단일 추출 전략
 * 매칭 실패 시 null 반환 (예외 아님)
 */
export interface FallbackStrategy<TInput, TOutput> {
  /** 로그/디버깅용 전략 이름 */
  name: string;
  extract(input: TInput): TOutput | null;
}

/**
 * 체인 실행 결과
 */
export interface FallbackResult<TOutput> {
  value: TOutput;
  /** 값을 찾은 전략 이름 */
  strategy: string;
}

/**
 * 전략을 순서대로 실행, 첫 non-null 결과 반환
 *
 * @returns 결과와 채택된 전략 이름, 모두 실패 시 null
 */
export function runFallbackChain<TInput, TOutput>(
  chain: ReadonlyArray<FallbackStrategy<TInput, TOutput>>,
  input: TInput,
): FallbackResult<TOutput> | null {
  for (const strategy of chain) {
    const value = strategy.extract(input);
    if (value !== null) {
      return { value, strategy: strategy.name };
    }
  }
  return null;
}

/**
 * runFallbackChain의 값만 반환하는 축약형
 */
export function firstMatch<TInput, TOutput>(
  chain: ReadonlyArray<FallbackStrategy<TInput, TOutput>>,
  input: TInput,
): TOutput | null {
  return runFallbackChain(chain, input)?.value ?? null;
}
