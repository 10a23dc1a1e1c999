/**
 * IsbnExtractor Test
 */

import { describe, it, expect } from "@jest/globals";
import {
  extractIsbn,
  findIsbnInText,
  normalizeIsbn,
} from "@/extractors/fields/IsbnExtractor";
import { pageContent } from "../../helpers/fixtures";

describe("IsbnExtractor", () => {
  describe("findIsbnInText", () => {
    it("하이픈이 있는 ISBN-13을 숫자만 남겨야 함", () => {
      expect(findIsbnInText("ISBN-13: 978-1-84022-345-6")).toBe("9781840223456");
    });

    it("ISBN-10을 추출해야 함", () => {
      expect(findIsbnInText("ISBN: 0-306-40615-2")).toBe("0306406152");
    });

    it("끝자리 x는 대문자 X로 정규화해야 함", () => {
      expect(findIsbnInText("isbn10 030640615x")).toBe("030640615X");
    });

    it("뒤따르는 단어와 분리해야 함", () => {
      expect(findIsbnInText("ISBN 9780306406157 Paperback")).toBe("9780306406157");
    });

    it("ISBN 라벨이 없거나 자릿수가 부족하면 null", () => {
      expect(findIsbnInText("Ref 9780306406157")).toBeNull();
      expect(findIsbnInText("ISBN: 12345")).toBeNull();
      expect(findIsbnInText(null)).toBeNull();
    });
  });

  describe("normalizeIsbn", () => {
    it("10자리/13자리만 허용해야 함", () => {
      expect(normalizeIsbn("978 0 306 40615 7")).toBe("9780306406157");
      expect(normalizeIsbn("12-34")).toBeNull();
      expect(normalizeIsbn(null)).toBeNull();
    });
  });

  describe("extractIsbn - 우선순위", () => {
    it("상세 텍스트를 가장 먼저 사용해야 함", () => {
      const content = pageContent({
        detailsText: "Binding: Hardback ISBN: 0306406152",
        structuredData: { sku: null, isbn: "9781840223456" },
        bodyText: "ISBN 9780306406157",
      });

      expect(extractIsbn(content)).toBe("0306406152");
    });

    it("상세 텍스트에 없으면 JSON-LD isbn 사용", () => {
      const content = pageContent({
        detailsText: "Binding: Hardback",
        structuredData: { sku: null, isbn: "978-1-84022-345-6" },
        bodyText: "ISBN 9780306406157",
      });

      expect(extractIsbn(content)).toBe("9781840223456");
    });

    it("마지막으로 전체 텍스트 사용", () => {
      const content = pageContent({ bodyText: "Some text ISBN 9780306406157 more" });

      expect(extractIsbn(content)).toBe("9780306406157");
    });

    it("어디에도 없으면 null", () => {
      expect(extractIsbn(pageContent())).toBeNull();
    });
  });
});
