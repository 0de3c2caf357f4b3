import type { AnalysisResult } from "../../compute/src/analyze.js";
import type { CoercionPolicy } from "../../compute/src/coerce.js";
import type { ZeroPricePolicy } from "../../compute/src/validate.js";
import type { ProfileId } from "../../ingest/src/profiles.js";
import { canonicalJson, computeReportDigest } from "./hash.js";

export type JsonReportOptions = {
  profile: ProfileId;
  policy: CoercionPolicy;
  zero_price: ZeroPricePolicy;
  top_n: number;
};

export type SalesReportBody = {
  kind: "SALES_REPORT_V1";
  settings: JsonReportOptions;
  totals: {
    total_revenue: string;
    average_order_value: string;
    valid_order_count: number;
    rows_read: number;
    rejected_count: number;
  };
  top_products: Array<{ rank: number; product: string; revenue: string }>;
  rejections: Array<{ row: number; reason: string; field: string | null; raw: string | null }>;
  no_valid_data: boolean;
};

export type SalesReportDocument = SalesReportBody & { digest: string };

export function buildReportDocument(result: AnalysisResult, opts: JsonReportOptions): SalesReportDocument {
  const body: SalesReportBody = {
    kind: "SALES_REPORT_V1",
    settings: {
      profile: opts.profile,
      policy: opts.policy,
      zero_price: opts.zero_price,
      top_n: opts.top_n,
    },
    totals: {
      total_revenue: result.total_revenue.toString(),
      average_order_value: result.average_order_value.toString(),
      valid_order_count: result.valid_order_count,
      rows_read: result.rows_read,
      rejected_count: result.rejections.length,
    },
    top_products: result.top_products.map((p) => ({
      rank: p.rank,
      product: p.product,
      revenue: p.revenue.toString(),
    })),
    rejections: result.rejections.map((r) => ({
      row: r.row,
      reason: r.reason,
      field: r.field ?? null,
      raw: r.raw ?? null,
    })),
    no_valid_data: result.no_valid_data,
  };

  return { ...body, digest: computeReportDigest(body) };
}

/** Canonical, pretty-printed JSON; identical input gives byte-identical output. */
export function renderJsonReport(result: AnalysisResult, opts: JsonReportOptions): string {
  return canonicalJson(buildReportDocument(result, opts), 2) + "\n";
}
