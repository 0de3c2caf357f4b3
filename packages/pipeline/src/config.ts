import { z } from "zod";

import { COERCION_POLICIES, type CoercionPolicy } from "../../compute/src/coerce.js";
import { DEFAULT_TOP_N } from "../../compute/src/rank.js";
import { ZERO_PRICE_POLICIES, type ZeroPricePolicy } from "../../compute/src/validate.js";
import { AnalysisError } from "../../ingest/src/errors.js";
import { PROFILE_IDS } from "../../ingest/src/profiles.js";

export const DEFAULT_INPUT = "sales.csv";
export const OUTPUT_FORMATS = ["text", "json"] as const;

/*
 * zero_price defaults follow the coercion policy: under lenient coercion a bad price
 * already reads as 0, so a zero price cannot be trusted and is rejected.
 */
export const AnalysisConfigSchema = z
  .object({
    input: z.string().min(1).default(DEFAULT_INPUT),
    profile: z.enum(PROFILE_IDS).default("B"),
    policy: z.enum(COERCION_POLICIES).default("strict"),
    zero_price: z.enum(ZERO_PRICE_POLICIES).optional(),
    top_n: z.number().int().positive().default(DEFAULT_TOP_N),
    format: z.enum(OUTPUT_FORMATS).default("text"),
  })
  .transform((c) => ({
    ...c,
    zero_price: c.zero_price ?? defaultZeroPrice(c.policy),
  }));

export function defaultZeroPrice(policy: CoercionPolicy): ZeroPricePolicy {
  return policy === "lenient" ? "reject" : "accept";
}

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type AnalysisConfig = z.output<typeof AnalysisConfigSchema>;

export function parseAnalysisConfig(input: unknown = {}): AnalysisConfig {
  const r = AnalysisConfigSchema.safeParse(input);
  if (r.success) return r.data;

  const issues = r.error.issues.map((i) => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`);
  throw new AnalysisError("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`, { issues });
}
