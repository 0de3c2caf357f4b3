export { formatCurrency } from "./format.js";
export { canonicalJson, canonicalize, sha256Hex, computeReportDigest } from "./hash.js";
export { renderTextReport } from "./render-text.js";
export type { TextReportOptions } from "./render-text.js";
export { renderJsonReport, buildReportDocument } from "./render-json.js";
export type { JsonReportOptions, SalesReportBody, SalesReportDocument } from "./render-json.js";
