import { describe, it, expect } from "vitest";
import { analyzeRecords } from "../src/analyze.js";
import type { Rejection } from "../src/validate.js";
import { SCENARIO_ROWS, row } from "./_helpers/fixtures.js";

function summary(r: ReturnType<typeof analyzeRecords>) {
  return {
    total_revenue: r.total_revenue.toString(),
    average_order_value: r.average_order_value.toString(),
    valid_order_count: r.valid_order_count,
    top: r.top_products.map((p) => [p.product, p.revenue.toString()]),
    no_valid_data: r.no_valid_data,
  };
}

describe("compute: analyzeRecords", () => {
  it("computes totals, average and ranking for a small order set", () => {
    const r = analyzeRecords(SCENARIO_ROWS, { policy: "strict", zero_price: "accept" });
    expect(summary(r)).toEqual({
      total_revenue: "100.00",
      average_order_value: "33.3333333333",
      valid_order_count: 3,
      top: [
        ["Gadget", "50.00"],
        ["Widget", "50.00"],
      ],
      no_valid_data: false,
    });
    expect(r.rows_read).toBe(3);
    expect(r.rejections).toEqual([]);
  });

  it("skips a negative quantity row and reports it", () => {
    const seen: Rejection[] = [];
    const rows = [
      row("Widget", "3", "10.00"),
      row("Widget", "-1", "10.00"),
      row("Widget", "2", "10.00"),
      row("Gadget", "1", "50.00"),
    ];

    const r = analyzeRecords(rows, {
      policy: "strict",
      zero_price: "accept",
      onRejection: (x) => seen.push(x),
    });

    expect(r.total_revenue.toString()).toBe("100.00");
    expect(r.valid_order_count).toBe(3);
    expect(r.rows_read).toBe(4);
    expect(r.rejections).toEqual([
      {
        row: 2,
        reason: "non_positive_quantity",
        field: "quantity",
        raw: "-1",
        message: "quantity must be positive (got '-1')",
      },
    ]);
    expect(seen).toEqual(r.rejections);
  });

  it("a bad price is skipped under both policies with different reasons", () => {
    const rows = [...SCENARIO_ROWS, row("Gizmo", "1", "abc")];

    const strict = analyzeRecords(rows, { policy: "strict", zero_price: "accept" });
    const lenient = analyzeRecords(rows, { policy: "lenient", zero_price: "reject" });

    expect(strict.rejections.map((x) => x.reason)).toEqual(["invalid_field"]);
    expect(lenient.rejections.map((x) => x.reason)).toEqual(["non_positive_price"]);
    expect(summary(lenient)).toEqual(summary(strict));
    expect(strict.rejections[0]?.row).toBe(4);
  });

  it("returns zeros and flags no valid data for empty input", () => {
    const r = analyzeRecords([], { policy: "strict", zero_price: "accept" });
    expect(summary(r)).toEqual({
      total_revenue: "0",
      average_order_value: "0",
      valid_order_count: 0,
      top: [],
      no_valid_data: true,
    });
    expect(r.rows_read).toBe(0);
  });

  it("keeps rejected rows out of every aggregate and the ranking", () => {
    const r = analyzeRecords([...SCENARIO_ROWS, row("Ghost", "0", "999.00"), row("", "5", "5.00")], {
      policy: "strict",
      zero_price: "accept",
    });
    expect(r.top_products.map((p) => p.product)).not.toContain("Ghost");
    expect(r.total_revenue.toString()).toBe("100.00");
    expect(r.valid_order_count).toBe(3);
    expect(r.rejections.map((x) => [x.row, x.reason])).toEqual([
      [4, "non_positive_quantity"],
      [5, "missing_identity"],
    ]);
  });

  it("flags no valid data when every row is rejected", () => {
    const r = analyzeRecords([row("A", "-1", "1"), row("B", "1", "-1")], { policy: "strict", zero_price: "accept" });
    expect(r.no_valid_data).toBe(true);
    expect(r.rejections).toHaveLength(2);
    expect(r.average_order_value.toString()).toBe("0");
  });

  it("ranking never exceeds top_n or the number of products", () => {
    const rows = ["a", "b", "c", "d", "e", "f", "g"].map((p, i) => row(p, "1", String(i + 1)));
    expect(analyzeRecords(rows, { policy: "strict", zero_price: "accept", top_n: 3 }).top_products).toHaveLength(3);
    expect(analyzeRecords(rows.slice(0, 2), { policy: "strict", zero_price: "accept", top_n: 5 }).top_products).toHaveLength(2);
    expect(analyzeRecords(rows, { policy: "strict", zero_price: "accept" }).top_products).toHaveLength(5);
  });
});
