import type { AnalysisResult } from "../../compute/src/analyze.js";
import type { ProfileId } from "../../ingest/src/profiles.js";
import { formatCurrency } from "./format.js";

export type TextReportOptions = {
  profile: ProfileId;
  top_n: number;
};

const RULE_WIDTH = 60;
const PRODUCT_WIDTH = 40;
const AMOUNT_WIDTH = 15;

export function renderTextReport(result: AnalysisResult, opts: TextReportOptions): string {
  const lines = opts.profile === "A" ? renderListStyle(result, opts.top_n) : renderBannerStyle(result);
  return lines.join("\n") + "\n";
}

// Profile B: boxed report with numbered, aligned rows.
function renderBannerStyle(result: AnalysisResult): string[] {
  const heavy = "=".repeat(RULE_WIDTH);
  const light = "-".repeat(RULE_WIDTH);

  const lines = [
    "",
    heavy,
    "SALES ANALYSIS REPORT",
    heavy,
    "",
    `Total Revenue: ${formatCurrency(result.total_revenue)}`,
    `Average Order Value: ${formatCurrency(result.average_order_value)}`,
    "",
    `Top ${result.top_products.length} Products by Revenue:`,
    light,
  ];

  if (result.top_products.length === 0) {
    lines.push("No valid product data found.");
  } else {
    for (const p of result.top_products) {
      lines.push(`${p.rank}. ${p.product.padEnd(PRODUCT_WIDTH)} ${formatCurrency(p.revenue).padStart(AMOUNT_WIDTH)}`);
    }
  }

  lines.push(heavy, "");
  return lines;
}

// Profile A: plain bullet list.
function renderListStyle(result: AnalysisResult, topN: number): string[] {
  return [
    `Total Revenue: ${formatCurrency(result.total_revenue)}`,
    `Average Order Value: ${formatCurrency(result.average_order_value)}`,
    "",
    `Top ${topN} Products by Sales:`,
    ...result.top_products.map((p) => `- ${p.product}: ${formatCurrency(p.revenue)}`),
  ];
}
