import { Decimal } from "../../money/src/decimal.js";
import type { ValidRecord } from "./validate.js";

export type RunningTotals = {
  total_revenue: Decimal;
  valid_order_count: number;
  product_revenue: ReadonlyMap<string, Decimal>;
};

export const AVERAGE_FRACTION_DIGITS = 10;

export function createTotals(): RunningTotals {
  return { total_revenue: Decimal.ZERO, valid_order_count: 0, product_revenue: new Map() };
}

type FoldableRecord = Pick<ValidRecord, "product_identity" | "revenue">;

/**
 * Folds records into a copy of `totals`. The input totals are left untouched.
 * Invariant: total_revenue == sum(product_revenue), valid_order_count == records folded.
 */
export function foldRecords(records: Iterable<FoldableRecord>, totals: RunningTotals = createTotals()): RunningTotals {
  const product_revenue = new Map(totals.product_revenue);
  let total_revenue = totals.total_revenue;
  let valid_order_count = totals.valid_order_count;

  for (const r of records) {
    total_revenue = total_revenue.plus(r.revenue);
    valid_order_count += 1;

    const prev = product_revenue.get(r.product_identity);
    product_revenue.set(r.product_identity, prev ? prev.plus(r.revenue) : r.revenue);
  }

  return { total_revenue, valid_order_count, product_revenue };
}

export function foldRecord(totals: RunningTotals, record: FoldableRecord): RunningTotals {
  return foldRecords([record], totals);
}

/** Combines two partial totals; together with foldRecords this makes folding order-free. */
export function mergeTotals(a: RunningTotals, b: RunningTotals): RunningTotals {
  const merged = foldRecords(
    [...b.product_revenue.entries()].map(([product_identity, revenue]) => ({ product_identity, revenue })),
    a
  );
  return { ...merged, valid_order_count: a.valid_order_count + b.valid_order_count };
}

/** total / count, half-even to AVERAGE_FRACTION_DIGITS; zero when nothing was folded. */
export function averageOrderValue(totals: RunningTotals): Decimal {
  if (totals.valid_order_count === 0) return Decimal.ZERO;
  return totals.total_revenue.dividedBy(BigInt(totals.valid_order_count), AVERAGE_FRACTION_DIGITS);
}
