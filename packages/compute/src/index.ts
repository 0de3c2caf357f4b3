// ---------- Coercion ----------
export { coerceNumeric, CoercionError, COERCION_POLICIES } from "./coerce.js";
export type { CoercionPolicy } from "./coerce.js";

// ---------- Validation ----------
export { validateRecord, ZERO_PRICE_POLICIES } from "./validate.js";
export type {
  ZeroPricePolicy,
  RejectionReason,
  Rejection,
  ValidRecord,
  ValidationResult,
  ValidateOptions,
} from "./validate.js";

// ---------- Aggregation ----------
export {
  createTotals,
  foldRecord,
  foldRecords,
  mergeTotals,
  averageOrderValue,
  AVERAGE_FRACTION_DIGITS,
} from "./aggregate.js";
export type { RunningTotals } from "./aggregate.js";

// ---------- Ranking ----------
export { rankProducts, DEFAULT_TOP_N } from "./rank.js";
export type { RankedProduct } from "./rank.js";

// ---------- Pipeline core ----------
export { analyzeRecords } from "./analyze.js";
export type { AnalyzeOptions, AnalysisResult } from "./analyze.js";
