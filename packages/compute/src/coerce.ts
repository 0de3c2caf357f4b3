import { Decimal } from "../../money/src/decimal.js";

export const COERCION_POLICIES = ["strict", "lenient"] as const;
export type CoercionPolicy = (typeof COERCION_POLICIES)[number];

export class CoercionError extends Error {
  readonly field: string;
  readonly raw: string;

  constructor(field: string, raw: string) {
    super(`Invalid ${field} value: '${raw}'. Must be a number.`);
    this.name = "CoercionError";
    this.field = field;
    this.raw = raw;
  }
}

/**
 * strict: unparseable text throws CoercionError.
 * lenient: unparseable text is zero.
 */
export function coerceNumeric(raw: string, field: string, policy: CoercionPolicy): Decimal {
  const parsed = Decimal.parse(raw.trim());
  if (parsed) return parsed;

  if (policy === "lenient") return Decimal.ZERO;
  throw new CoercionError(field, raw);
}
