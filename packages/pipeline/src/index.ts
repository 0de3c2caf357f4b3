// Public surface: the runner plus every package it is built from.
export { runSalesReport } from "./run.js";
export type { RunOptions, SalesReportRun } from "./run.js";

export {
  AnalysisConfigSchema,
  parseAnalysisConfig,
  DEFAULT_INPUT,
  OUTPUT_FORMATS,
} from "./config.js";
export type { AnalysisConfig, AnalysisConfigInput } from "./config.js";

export { createLogger, LOG_PREFIX } from "./logger.js";
export type { Logger, LogSink, LoggerOptions } from "./logger.js";

export * from "../../money/src/index.js";
export * from "../../ingest/src/index.js";
export * from "../../compute/src/index.js";
export * from "../../report/src/index.js";
