// packages/money/src/decimal.ts

/**
 * Exact decimal value: `coefficient * 10^-scale`.
 *
 * Currency math (quantity * unit price, summed across rows) stays exact; rounding only
 * happens on explicit division or when rendering with `toFixed`.
 */
export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);

  private constructor(
    readonly coefficient: bigint,
    readonly scale: number
  ) {}

  /**
   * Parses plain decimal text: optional sign, digits, optional fraction, optional exponent.
   * Returns null for anything else (empty, NaN, Infinity, grouping separators, symbols).
   */
  static parse(text: string): Decimal | null {
    const m = DECIMAL_RE.exec(text);
    if (!m) return null;

    const sign = m[1] ?? "";
    const intPart = m[2] ?? "";
    const fracPart = m[3] ?? "";
    const expPart = m[4];

    if (intPart.length === 0 && fracPart.length === 0) return null;

    const exponent = expPart === undefined ? 0 : Number.parseInt(expPart, 10);
    if (!Number.isSafeInteger(exponent) || Math.abs(exponent) > MAX_EXPONENT) return null;

    let coefficient = BigInt(`${intPart}${fracPart}` || "0");
    let scale = fracPart.length - exponent;

    if (scale < 0) {
      coefficient *= pow10(-scale);
      scale = 0;
    }
    if (sign === "-") coefficient = -coefficient;

    return new Decimal(coefficient, scale);
  }

  static fromInteger(n: number | bigint): Decimal {
    if (typeof n === "number" && !Number.isSafeInteger(n)) {
      throw new RangeError(`Decimal.fromInteger expects a safe integer, got ${n}`);
    }
    return new Decimal(BigInt(n), 0);
  }

  plus(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(rescale(this, scale) + rescale(other, scale), scale);
  }

  times(other: Decimal): Decimal {
    return new Decimal(this.coefficient * other.coefficient, this.scale + other.scale);
  }

  /** Divides by an integer, rounding half-even to `fractionDigits`. */
  dividedBy(divisor: bigint, fractionDigits: number): Decimal {
    if (divisor === 0n) throw new RangeError("Decimal division by zero");
    assertDigits(fractionDigits);

    const numerator = this.coefficient * pow10(fractionDigits);
    const denominator = pow10(this.scale) * divisor;
    return new Decimal(divideHalfEven(numerator, denominator), fractionDigits);
  }

  round(fractionDigits: number): Decimal {
    assertDigits(fractionDigits);
    if (fractionDigits >= this.scale) {
      return new Decimal(rescale(this, fractionDigits), fractionDigits);
    }
    return new Decimal(
      divideHalfEven(this.coefficient, pow10(this.scale - fractionDigits)),
      fractionDigits
    );
  }

  compareTo(other: Decimal): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const a = rescale(this, scale);
    const b = rescale(other, scale);
    return a < b ? -1 : a > b ? 1 : 0;
  }

  equals(other: Decimal): boolean {
    return this.compareTo(other) === 0;
  }

  isZero(): boolean {
    return this.coefficient === 0n;
  }

  isNegative(): boolean {
    return this.coefficient < 0n;
  }

  isPositive(): boolean {
    return this.coefficient > 0n;
  }

  toFixed(fractionDigits: number): string {
    return this.round(fractionDigits).toString();
  }

  /** Plain notation, keeping the scale: `80.00`, `-0.5`, `3`. */
  toString(): string {
    const negative = this.coefficient < 0n;
    const digits = (negative ? -this.coefficient : this.coefficient).toString();

    if (this.scale === 0) return `${negative ? "-" : ""}${digits}`;

    const padded = digits.padStart(this.scale + 1, "0");
    const intPart = padded.slice(0, padded.length - this.scale);
    const fracPart = padded.slice(padded.length - this.scale);
    return `${negative ? "-" : ""}${intPart}.${fracPart}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

const DECIMAL_RE = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

// Keeps exponent-notation input from allocating absurd coefficients.
const MAX_EXPONENT = 1000;

function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

function rescale(d: Decimal, scale: number): bigint {
  return d.coefficient * pow10(scale - d.scale);
}

function assertDigits(fractionDigits: number): void {
  if (!Number.isInteger(fractionDigits) || fractionDigits < 0) {
    throw new RangeError(`fractionDigits must be a non-negative integer, got ${fractionDigits}`);
  }
}

function divideHalfEven(numerator: bigint, denominator: bigint): bigint {
  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;

  let q = n / d;
  const twice = (n % d) * 2n;
  if (twice > d || (twice === d && q % 2n === 1n)) q += 1n;

  return negative ? -q : q;
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = Decimal.ZERO;
  for (const v of values) total = total.plus(v);
  return total;
}
