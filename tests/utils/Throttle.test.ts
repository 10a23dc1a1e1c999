/**
 * Throttle Test
 */

import { describe, it, expect, jest } from "@jest/globals";
import { CrawlError } from "@/core/interfaces/CrawlErrorType";
import { Throttle } from "@/utils/Throttle";

const OPTIONS = { itemDelayMinMs: 2000, itemDelayMaxMs: 5000, pageDelayExtraMs: 3000 };

function throttleWith(random: number) {
  const sleep = jest.fn(async (_ms: number) => undefined);
  return { throttle: new Throttle(OPTIONS, { random: () => random, sleep }), sleep };
}

describe("Throttle", () => {
  it("상품 대기는 [min, max) 범위", async () => {
    const low = throttleWith(0);
    const mid = throttleWith(0.5);
    const high = throttleWith(0.9999);

    expect(await low.throttle.itemDelay()).toBe(2000);
    expect(await mid.throttle.itemDelay()).toBe(3500);
    expect(await high.throttle.itemDelay()).toBe(4999);
    expect(mid.sleep).toHaveBeenCalledWith(3500);
  });

  it("페이지 대기는 [max, max + extra) 범위로 상품 대기보다 길어야 함", async () => {
    const low = throttleWith(0);
    const mid = throttleWith(0.5);

    expect(await low.throttle.pageDelay()).toBe(5000);
    expect(await mid.throttle.pageDelay()).toBe(6500);
  });

  it("min === max면 고정 대기", async () => {
    const sleep = jest.fn(async (_ms: number) => undefined);
    const throttle = new Throttle(
      { itemDelayMinMs: 0, itemDelayMaxMs: 0, pageDelayExtraMs: 0 },
      { random: () => 0.7, sleep },
    );

    expect(await throttle.itemDelay()).toBe(0);
    expect(await throttle.pageDelay()).toBe(0);
  });

  it("잘못된 범위는 설정 에러", () => {
    expect(
      () => new Throttle({ itemDelayMinMs: 5000, itemDelayMaxMs: 2000, pageDelayExtraMs: 0 }),
    ).toThrow(CrawlError);
    expect(
      () => new Throttle({ itemDelayMinMs: 0, itemDelayMaxMs: 10, pageDelayExtraMs: -1 }),
    ).toThrow(CrawlError);
  });
});
