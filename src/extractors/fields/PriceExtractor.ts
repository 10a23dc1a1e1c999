/**
 * 가격 추출 (PriceParser 위임)
 */

import type { ItemPageContent } from "@/core/domain/ItemPageContent";
import { PriceParser } from "@/extractors/common/PriceParser";

export function extractPrice(content: ItemPageContent): number | null {
  return PriceParser.parse(content.priceText);
}
