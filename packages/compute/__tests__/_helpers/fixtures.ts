// packages/compute/__tests__/_helpers/fixtures.ts
import { Decimal } from "../../../money/src/decimal.js";
import type { SalesRow } from "../../../ingest/src/profiles.js";

export function d(text: string): Decimal {
  const v = Decimal.parse(text);
  if (!v) throw new Error(`test fixture is not a decimal: ${text}`);
  return v;
}

export function row(product: string | undefined, quantity: string | undefined, unit_price: string | undefined): SalesRow {
  return { product, quantity, unit_price };
}

export const SCENARIO_ROWS: SalesRow[] = [
  row("Widget", "3", "10.00"),
  row("Widget", "2", "10.00"),
  row("Gadget", "1", "50.00"),
];
