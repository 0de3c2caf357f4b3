import * as fs from "node:fs";
import * as path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import { AnalysisError } from "./errors.js";
import type { RawRecord } from "./profiles.js";

export type SalesTable = {
  file: string;
  columns: string[];
  records: RawRecord[];
};

const RawRecordsSchema = z.array(z.record(z.string(), z.string().optional()));

/**
 * Reads one CSV file into header + records.
 *
 * Throws AnalysisError FILE_NOT_FOUND / PARSE_FAILED. The header is captured even
 * when the file has no data rows, so the required-columns check can still run.
 */
export function readSalesCsv(filePath: string, cwd: string = process.cwd()): SalesTable {
  const abs = path.resolve(cwd, filePath);

  if (!fs.existsSync(abs) || !fs.statSync(abs).isFile()) {
    throw new AnalysisError("FILE_NOT_FOUND", `CSV file not found: ${filePath}`, { file: abs });
  }

  const raw = fs.readFileSync(abs, "utf8");
  return parseSalesCsv(raw, abs);
}

export function parseSalesCsv(raw: string, file = "<memory>"): SalesTable {
  let columns: string[] = [];
  let decoded: unknown;

  try {
    decoded = parse(raw, {
      bom: true,
      columns: (header: string[]) => {
        columns = header;
        return header;
      },
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new AnalysisError("PARSE_FAILED", `Error parsing CSV file: ${message}`, { file });
  }

  const checked = RawRecordsSchema.safeParse(decoded);
  if (!checked.success) {
    throw new AnalysisError("PARSE_FAILED", `Error parsing CSV file: unexpected record shape`, {
      file,
      issues: checked.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`),
    });
  }

  return { file, columns, records: checked.data };
}
