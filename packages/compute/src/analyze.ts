import type { Decimal } from "../../money/src/decimal.js";
import type { SalesRow } from "../../ingest/src/profiles.js";
import { averageOrderValue, createTotals, foldRecords, type RunningTotals } from "./aggregate.js";
import { DEFAULT_TOP_N, rankProducts, type RankedProduct } from "./rank.js";
import { validateRecord, type Rejection, type ValidateOptions, type ValidRecord } from "./validate.js";

export type AnalyzeOptions = ValidateOptions & {
  top_n?: number;
  onRejection?: (rejection: Rejection) => void;
};

export type AnalysisResult = {
  total_revenue: Decimal;
  average_order_value: Decimal;
  valid_order_count: number;
  rows_read: number;
  top_products: RankedProduct[];
  rejections: Rejection[];
  no_valid_data: boolean;
};

export function analyzeRecords(rows: readonly SalesRow[], opts: AnalyzeOptions): AnalysisResult {
  const valid: ValidRecord[] = [];
  const rejections: Rejection[] = [];

  rows.forEach((row, i) => {
    const res = validateRecord(row, i + 1, opts);
    if (res.ok) {
      valid.push(res.record);
      return;
    }
    rejections.push(res.rejection);
    opts.onRejection?.(res.rejection);
  });

  const totals: RunningTotals = foldRecords(valid, createTotals());

  return {
    total_revenue: totals.total_revenue,
    average_order_value: averageOrderValue(totals),
    valid_order_count: totals.valid_order_count,
    rows_read: rows.length,
    top_products: rankProducts(totals.product_revenue, opts.top_n ?? DEFAULT_TOP_N),
    rejections,
    no_valid_data: totals.valid_order_count === 0,
  };
}
