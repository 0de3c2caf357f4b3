import { AnalysisError } from "./errors.js";

export const PROFILE_IDS = ["A", "B"] as const;
export type ProfileId = (typeof PROFILE_IDS)[number];

export type ProfileFields = {
  product: string;
  quantity: string;
  unit_price: string;
};

export type InputProfile = {
  id: ProfileId;
  fields: ProfileFields;
  // null = header is not checked before rows are read
  required_columns: readonly string[] | null;
};

export const PROFILES: Readonly<Record<ProfileId, InputProfile>> = {
  A: {
    id: "A",
    fields: { product: "product", quantity: "quantity", unit_price: "price" },
    required_columns: null,
  },
  B: {
    id: "B",
    fields: { product: "product_name", quantity: "quantity", unit_price: "unit_price" },
    required_columns: ["product_name", "quantity", "unit_price"],
  },
};

/** A decoded CSV row: header name -> raw cell text. Short rows leave keys undefined. */
export type RawRecord = Readonly<Record<string, string | undefined>>;

/** The three fields the validator reads, under profile-independent names. */
export type SalesRow = {
  product: string | undefined;
  quantity: string | undefined;
  unit_price: string | undefined;
};

export function toSalesRow(record: RawRecord, profile: InputProfile): SalesRow {
  return {
    product: record[profile.fields.product],
    quantity: record[profile.fields.quantity],
    unit_price: record[profile.fields.unit_price],
  };
}

export function missingColumns(columns: readonly string[], profile: InputProfile): string[] {
  if (!profile.required_columns) return [];
  const present = new Set(columns);
  return profile.required_columns.filter((c) => !present.has(c));
}

export function checkRequiredColumns(columns: readonly string[], profile: InputProfile): void {
  const missing = missingColumns(columns, profile);
  if (missing.length === 0) return;

  throw new AnalysisError(
    "MISSING_COLUMNS",
    `CSV is missing required column(s): ${missing.join(", ")} ` +
      `(profile ${profile.id} expects ${(profile.required_columns ?? []).join(", ")})`,
    { missing, columns: [...columns], profile: profile.id }
  );
}
