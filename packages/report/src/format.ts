import type { Decimal } from "../../money/src/decimal.js";

/** `$1,234.50`, `-$0.75`. Two decimals, half-even, comma grouping. */
export function formatCurrency(amount: Decimal): string {
  const fixed = amount.toFixed(2);
  const negative = fixed.startsWith("-");
  const [intPart = "0", fracPart = "00"] = (negative ? fixed.slice(1) : fixed).split(".");

  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return `${negative ? "-" : ""}$${grouped}.${fracPart}`;
}
