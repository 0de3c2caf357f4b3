#!/usr/bin/env node
// packages/pipeline/src/cli/sales-report.ts
/* eslint-disable no-console */

import * as path from "node:path";

import { isAnalysisError } from "../../../ingest/src/errors.js";
import { parseAnalysisConfig, DEFAULT_INPUT } from "../config.js";
import { createLogger, type Logger } from "../logger.js";
import { runSalesReport } from "../run.js";

export const CLI_VERSION = "sales-report cli v1";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (line: string) => void;
  cwd?: string;
};

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (line) => console.error(line),
};

function usage(): string {
  return `sales-report - revenue totals, average order value and top products from a sales CSV

Usage:
  sales-report --help
  sales-report version

  sales-report [file.csv] [--profile A|B] [--policy strict|lenient]
               [--zero-price accept|reject] [--top <n>] [--json] [--quiet]

Defaults:
  file          ${DEFAULT_INPUT}
  --profile     B   (columns product_name, quantity, unit_price; A = product, quantity, price)
  --policy      strict
  --zero-price  accept under strict, reject under lenient
  --top         5

Examples:
  sales-report
  sales-report data/march.csv --top 10
  sales-report legacy.csv --profile A --policy lenient
  sales-report sales.csv --json
`;
}

// -------------------- argv parsing --------------------

const VALUE_FLAGS = {
  "--profile": "profile",
  "--policy": "policy",
  "--zero-price": "zero_price",
  "--top": "top_n",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

const BOOLEAN_FLAGS = ["--json", "--quiet"] as const;

type ParsedArgs = {
  file: string | null;
  values: Partial<Record<(typeof VALUE_FLAGS)[ValueFlag], string>>;
  json: boolean;
  quiet: boolean;
};

function isValueFlag(arg: string): arg is ValueFlag {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, arg);
}

function isBooleanFlag(arg: string): arg is (typeof BOOLEAN_FLAGS)[number] {
  return BOOLEAN_FLAGS.some((f) => f === arg);
}

export function parseArgs(args: string[]): ParsedArgs | string {
  const out: ParsedArgs = { file: null, values: {}, json: false, quiet: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (isValueFlag(arg)) {
      const v = args[i + 1];
      if (v === undefined || v.startsWith("--")) return `Missing value for ${arg}`;
      out.values[VALUE_FLAGS[arg]] = v;
      i++;
      continue;
    }

    if (isBooleanFlag(arg)) {
      if (arg === "--json") out.json = true;
      else out.quiet = true;
      continue;
    }

    if (arg.startsWith("--")) return `Unknown option: ${arg}`;

    if (out.file !== null) return `Unexpected argument: ${arg}`;
    out.file = arg;
  }

  return out;
}

// -------------------- entry --------------------

export function run(argv: string[] = process.argv, io: CliIo = defaultIo): number {
  const args = argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    io.stdout(usage());
    return 0;
  }

  if (args[0] === "version") {
    io.stdout(`${CLI_VERSION}\n`);
    return 0;
  }

  const parsed = parseArgs(args);
  if (typeof parsed === "string") {
    io.stderr(`${parsed}\n`);
    io.stderr(usage());
    return 1;
  }

  const logger: Logger = createLogger({ sink: io.stderr, quiet: parsed.quiet });

  try {
    const config = parseAnalysisConfig({
      input: parsed.file ?? DEFAULT_INPUT,
      profile: parsed.values.profile,
      policy: parsed.values.policy,
      zero_price: parsed.values.zero_price,
      top_n: parsed.values.top_n === undefined ? undefined : Number(parsed.values.top_n),
      format: parsed.json ? "json" : "text",
    });

    const { output } = runSalesReport(config, { logger, cwd: io.cwd });
    io.stdout(output);
    return 0;
  } catch (err) {
    if (isAnalysisError(err)) {
      logger.error(err.message);
      return 1;
    }
    logger.error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

// Entrypoint: run when invoked directly (node, tsx, or the installed bin)
const argv1 = process.argv[1] ?? "";
const invoked = path.basename(argv1);
if (invoked === "sales-report" || invoked === "sales-report.ts" || invoked === "sales-report.js") {
  process.exitCode = run(process.argv);
}
