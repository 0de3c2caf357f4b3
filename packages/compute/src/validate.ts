import type { Decimal } from "../../money/src/decimal.js";
import type { SalesRow } from "../../ingest/src/profiles.js";
import { CoercionError, coerceNumeric, type CoercionPolicy } from "./coerce.js";

export const ZERO_PRICE_POLICIES = ["accept", "reject"] as const;
export type ZeroPricePolicy = (typeof ZERO_PRICE_POLICIES)[number];

export type RejectionReason =
  | "missing_identity"
  | "invalid_field"
  | "non_positive_quantity"
  | "negative_price"
  | "non_positive_price";

export type Rejection = {
  row: number; // 1-based, header excluded
  reason: RejectionReason;
  field?: "quantity" | "unit_price";
  raw?: string;
  message: string;
};

export type ValidRecord = {
  row: number;
  product_identity: string;
  quantity: Decimal;
  unit_price: Decimal;
  revenue: Decimal;
};

export type ValidationResult =
  | { ok: true; record: ValidRecord }
  | { ok: false; rejection: Rejection };

export type ValidateOptions = {
  policy: CoercionPolicy;
  zero_price: ZeroPricePolicy;
};

export function validateRecord(row: SalesRow, rowNumber: number, opts: ValidateOptions): ValidationResult {
  const product_identity = (row.product ?? "").trim();
  if (!product_identity) {
    return reject(rowNumber, "missing_identity", "missing product name");
  }

  // absent and empty cells count as "0"; whitespace-only text is still parsed
  const rawQuantity = row.quantity || "0";
  const rawPrice = row.unit_price || "0";

  let quantity: Decimal;
  let unit_price: Decimal;
  try {
    quantity = coerceNumeric(rawQuantity, "quantity", opts.policy);
    unit_price = coerceNumeric(rawPrice, "unit_price", opts.policy);
  } catch (err) {
    if (!(err instanceof CoercionError)) throw err;
    return reject(rowNumber, "invalid_field", err.message, {
      field: err.field === "quantity" ? "quantity" : "unit_price",
      raw: err.raw,
    });
  }

  if (!quantity.isPositive()) {
    return reject(rowNumber, "non_positive_quantity", `quantity must be positive (got '${rawQuantity}')`, {
      field: "quantity",
      raw: rawQuantity,
    });
  }

  if (unit_price.isNegative()) {
    return reject(rowNumber, "negative_price", `unit_price must not be negative (got '${rawPrice}')`, {
      field: "unit_price",
      raw: rawPrice,
    });
  }

  if (unit_price.isZero() && opts.zero_price === "reject") {
    return reject(rowNumber, "non_positive_price", `unit_price must be positive (got '${rawPrice}')`, {
      field: "unit_price",
      raw: rawPrice,
    });
  }

  return {
    ok: true,
    record: {
      row: rowNumber,
      product_identity,
      quantity,
      unit_price,
      revenue: quantity.times(unit_price),
    },
  };
}

function reject(
  row: number,
  reason: RejectionReason,
  message: string,
  extra: Pick<Rejection, "field" | "raw"> = {}
): ValidationResult {
  return { ok: false, rejection: { row, reason, ...extra, message } };
}
