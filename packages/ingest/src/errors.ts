export type AnalysisErrorCode =
  | "FILE_NOT_FOUND"
  | "PARSE_FAILED"
  | "MISSING_COLUMNS"
  | "EMPTY_INPUT"
  | "INVALID_CONFIG";

/**
 * Run-level failure. Anything raised as an AnalysisError aborts the whole run;
 * row-level problems are reported as rejections instead.
 */
export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: AnalysisErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
    this.details = details;
  }
}

export function isAnalysisError(err: unknown): err is AnalysisError {
  return err instanceof AnalysisError;
}
