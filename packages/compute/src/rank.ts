import type { Decimal } from "../../money/src/decimal.js";

export const DEFAULT_TOP_N = 5;

export type RankedProduct = {
  rank: number; // 1-based
  product: string;
  revenue: Decimal;
};

/**
 * Top products by revenue, descending.
 * Ties are broken by product identity ascending (UTF-16 code unit order), so the
 * result does not depend on insertion order or locale.
 */
export function rankProducts(
  productRevenue: ReadonlyMap<string, Decimal>,
  topN: number = DEFAULT_TOP_N
): RankedProduct[] {
  const limit = Math.max(0, Math.trunc(topN));

  return [...productRevenue.entries()]
    .sort(([pa, ra], [pb, rb]) => rb.compareTo(ra) || compareIdentity(pa, pb))
    .slice(0, limit)
    .map(([product, revenue], i) => ({ rank: i + 1, product, revenue }));
}

function compareIdentity(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
