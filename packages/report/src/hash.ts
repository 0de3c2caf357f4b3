// packages/report/src/hash.ts
import { createHash } from "node:crypto";

/**
 * Stable (canonical) JSON stringify:
 * - object keys are sorted
 * - arrays preserve order
 * - undefined is omitted in objects (like JSON.stringify)
 */
export function canonicalJson(value: unknown, indent?: number): string {
  return JSON.stringify(canonicalize(value), null, indent);
}

export function canonicalize(value: unknown): unknown {
  if (value === null) return null;

  const t = typeof value;

  if (t === "string" || t === "number" || t === "boolean") return value;

  if (t === "bigint") return String(value);

  if (Array.isArray(value)) return value.map(canonicalize);

  if (t === "object") {
    const obj = value as Record<string, unknown>;

    // Decimal and friends serialize themselves
    const toJSON = obj.toJSON;
    if (typeof toJSON === "function") return canonicalize(toJSON.call(obj));

    const out: Record<string, unknown> = {};
    for (const k of Object.keys(obj).sort()) {
      const v = obj[k];
      if (typeof v === "undefined") continue;
      out[k] = canonicalize(v);
    }
    return out;
  }

  // functions/symbols/etc are not representable in JSON
  return null;
}

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

export function computeReportDigest(body: unknown): string {
  return sha256Hex(canonicalJson(body));
}
