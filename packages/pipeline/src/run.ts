import { analyzeRecords, type AnalysisResult } from "../../compute/src/analyze.js";
import { AnalysisError } from "../../ingest/src/errors.js";
import { PROFILES, checkRequiredColumns, toSalesRow } from "../../ingest/src/profiles.js";
import { readSalesCsv } from "../../ingest/src/read-csv.js";
import { renderJsonReport } from "../../report/src/render-json.js";
import { renderTextReport } from "../../report/src/render-text.js";
import { parseAnalysisConfig, type AnalysisConfig, type AnalysisConfigInput } from "./config.js";
import { createLogger, type Logger } from "./logger.js";

export type RunOptions = {
  logger?: Logger;
  cwd?: string;
};

export type SalesReportRun = {
  config: AnalysisConfig;
  result: AnalysisResult;
  // rendered report; the caller prints it only when the run completed
  output: string;
};

/**
 * Reads one sales CSV and builds the report.
 *
 * Run-level failures (missing file, bad CSV, missing columns, no data rows, bad config)
 * throw AnalysisError before anything is rendered. Row-level rejections are logged as
 * warnings and carried in `result.rejections`.
 */
export function runSalesReport(input: AnalysisConfigInput | AnalysisConfig = {}, opts: RunOptions = {}): SalesReportRun {
  const config = parseAnalysisConfig(input);
  const log = opts.logger ?? createLogger();
  const profile = PROFILES[config.profile];

  log.info(`Reading sales data from ${config.input}...`);
  const table = readSalesCsv(config.input, opts.cwd);

  checkRequiredColumns(table.columns, profile);

  if (table.records.length === 0) {
    throw new AnalysisError("EMPTY_INPUT", `No sales records found in CSV file: ${config.input}`, {
      file: table.file,
    });
  }
  log.info(`Successfully loaded ${table.records.length} sales records.`);

  const result = analyzeRecords(
    table.records.map((r) => toSalesRow(r, profile)),
    {
      policy: config.policy,
      zero_price: config.zero_price,
      top_n: config.top_n,
      onRejection: (r) => log.warn(`Skipping row ${r.row} - ${r.message}`),
    }
  );

  if (result.no_valid_data) log.warn("No valid sales data found.");

  const output =
    config.format === "json"
      ? renderJsonReport(result, {
          profile: config.profile,
          policy: config.policy,
          zero_price: config.zero_price,
          top_n: config.top_n,
        })
      : renderTextReport(result, { profile: config.profile, top_n: config.top_n });

  return { config, result, output };
}
