import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CLI_VERSION, parseArgs, run, type CliIo } from "../src/cli/sales-report.js";
import { SCENARIO_CSV, createWorkspace, type Workspace } from "./_helpers/workspace.js";

type CapturedIo = CliIo & { out: string[]; err: string[] };

function captureIo(cwd: string): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (line) => err.push(line),
  };
}

describe("pipeline: sales-report cli", () => {
  let ws: Workspace;

  beforeEach(() => {
    ws = createWorkspace();
    ws.write("sales.csv", SCENARIO_CSV);
  });

  afterEach(() => {
    ws.dispose();
  });

  it("prints the report for the default file", () => {
    const io = captureIo(ws.dir);
    expect(run(["node", "sales-report"], io)).toBe(0);
    expect(io.out).toHaveLength(1);
    expect(io.out[0]).toContain("SALES ANALYSIS REPORT");
    expect(io.out[0]).toContain(`1. ${"Gadget".padEnd(40)} ${"$50.00".padStart(15)}`);
  });

  it("prints json with --json", () => {
    const io = captureIo(ws.dir);
    expect(run(["node", "sales-report", "sales.csv", "--json", "--top", "1"], io)).toBe(0);
    const doc: { top_products: unknown[]; settings: { top_n: number } } = JSON.parse(io.out.join(""));
    expect(doc.settings.top_n).toBe(1);
    expect(doc.top_products).toEqual([{ product: "Gadget", rank: 1, revenue: "50.00" }]);
  });

  it("--quiet keeps only warnings on stderr", () => {
    ws.write("bad.csv", "product_name,quantity,unit_price\nWidget,1,abc\nGadget,1,5.00\n");
    const io = captureIo(ws.dir);
    expect(run(["node", "sales-report", "bad.csv", "--quiet"], io)).toBe(0);
    expect(io.err).toEqual([
      "[sales-report] warning: Skipping row 1 - Invalid unit_price value: 'abc'. Must be a number.",
    ]);
  });

  it("exits 1 with a message and no report when the file is missing", () => {
    const io = captureIo(ws.dir);
    expect(run(["node", "sales-report", "nope.csv"], io)).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toContain("[sales-report] CSV file not found: nope.csv");
  });

  it("exits 1 on a missing required column", () => {
    ws.write("short.csv", "product_name,quantity\nWidget,1\n");
    const io = captureIo(ws.dir);
    expect(run(["node", "sales-report", "short.csv"], io)).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err.some((l) => l.startsWith("[sales-report] CSV is missing required column(s): unit_price"))).toBe(true);
  });

  it("exits 1 on bad option values", () => {
    const io = captureIo(ws.dir);
    expect(run(["node", "sales-report", "--top", "many"], io)).toBe(1);
    expect(io.err[0]?.startsWith("[sales-report] Invalid configuration: top_n")).toBe(true);
  });

  it("prints usage for unknown options", () => {
    const io = captureIo(ws.dir);
    expect(run(["node", "sales-report", "--bogus"], io)).toBe(1);
    expect(io.err[0]).toBe("Unknown option: --bogus\n");
  });

  it("prints help and version", () => {
    const help = captureIo(ws.dir);
    expect(run(["node", "sales-report", "--help"], help)).toBe(0);
    expect(help.out[0]).toContain("Usage:");

    const version = captureIo(ws.dir);
    expect(run(["node", "sales-report", "version"], version)).toBe(0);
    expect(version.out).toEqual([`${CLI_VERSION}\n`]);
  });
});

describe("pipeline: parseArgs", () => {
  it("collects the file and flags", () => {
    expect(parseArgs(["data.csv", "--profile", "A", "--policy", "lenient", "--zero-price", "accept", "--json"])).toEqual({
      file: "data.csv",
      values: { profile: "A", policy: "lenient", zero_price: "accept" },
      json: true,
      quiet: false,
    });
  });

  it("reports a flag with no value", () => {
    expect(parseArgs(["--top"])).toBe("Missing value for --top");
    expect(parseArgs(["--top", "--json"])).toBe("Missing value for --top");
  });

  it("reports a second positional argument", () => {
    expect(parseArgs(["a.csv", "b.csv"])).toBe("Unexpected argument: b.csv");
  });
});
