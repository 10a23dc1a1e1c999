/**
 * 중복 확인 게이트
 *
 * SKU가 이미 저장되어 있는지 확인한다.
 * - 조회 실패는 그대로 전파 (오케스트레이터가 실행 중단 처리)
 * - 이번 실행에서 확인/저장된 SKU는 메모리에 기억해 재조회하지 않음
 */

import type { IBookRepository } from "@/core/interfaces/IBookRepository";

export class DedupGate {
  private readonly known = new Set<string>();

  constructor(private readonly repository: IBookRepository) {}

  /**
   * 저장된 SKU 여부 (null SKU는 항상 false)
   */
  async isKnown(sku: string | null): Promise<boolean> {
    if (!sku) {
      return false;
    }
    if (this.known.has(sku)) {
      return true;
    }

    const existing = await this.repository.findBySku(sku);
    if (existing) {
      this.known.add(sku);
      return true;
    }
    return false;
  }

  /**
   * 저장 완료된 SKU 기록
   */
  remember(sku: string): void {
    this.known.add(sku);
  }
}
