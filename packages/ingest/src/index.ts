export { AnalysisError, isAnalysisError } from "./errors.js";
export type { AnalysisErrorCode } from "./errors.js";

export {
  PROFILES,
  PROFILE_IDS,
  toSalesRow,
  missingColumns,
  checkRequiredColumns,
} from "./profiles.js";
export type { ProfileId, ProfileFields, InputProfile, RawRecord, SalesRow } from "./profiles.js";

export { readSalesCsv, parseSalesCsv } from "./read-csv.js";
export type { SalesTable } from "./read-csv.js";
