import { describe, it, expect } from "vitest";
import { parseAnalysisConfig } from "../src/config.js";

describe("pipeline: config", () => {
  it("fills documented defaults", () => {
    expect(parseAnalysisConfig({})).toEqual({
      input: "sales.csv",
      profile: "B",
      policy: "strict",
      zero_price: "accept",
      top_n: 5,
      format: "text",
    });
  });

  it("rejects zero prices by default under lenient coercion", () => {
    expect(parseAnalysisConfig({ policy: "lenient" }).zero_price).toBe("reject");
    expect(parseAnalysisConfig({ policy: "lenient", zero_price: "accept" }).zero_price).toBe("accept");
  });

  it("refuses invalid values", () => {
    for (const bad of [{ top_n: 0 }, { top_n: 2.5 }, { top_n: Number.NaN }, { profile: "C" }, { policy: "loose" }, { input: "" }]) {
      let caught: unknown = null;
      try {
        parseAnalysisConfig(bad);
      } catch (err) {
        caught = err;
      }
      expect(caught).toMatchObject({ code: "INVALID_CONFIG" });
    }
  });
});
