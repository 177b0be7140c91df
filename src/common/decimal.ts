const decimalPattern = /^([+-]?)(\d+)(?:\.(\d+))?$/;

/**
 * Fixed-point decimal backed by a BigInt count of `10^-scale` units.
 * Addition and subtraction are exact; division and rounding are half-even.
 */
export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);

  private constructor(
    readonly units: bigint,
    readonly scale: number,
  ) {}

  static of(units: bigint, scale = 0): Decimal {
    if (!Number.isInteger(scale) || scale < 0) {
      throw new RangeError(`Invalid decimal scale: ${scale}`);
    }
    return new Decimal(units, scale);
  }

  plus(other: Decimal): Decimal {
    const [a, b, scale] = align(this, other);
    return new Decimal(a + b, scale);
  }

  minus(other: Decimal): Decimal {
    const [a, b, scale] = align(this, other);
    return new Decimal(a - b, scale);
  }

  compare(other: Decimal): -1 | 0 | 1 {
    const [a, b] = align(this, other);
    if (a === b) {
      return 0;
    }
    return a < b ? -1 : 1;
  }

  /** Quotient of an exact division by a positive integer, rounded to `scale` digits. */
  dividedBy(divisor: bigint, scale: number): Decimal {
    if (divisor <= 0n) {
      throw new RangeError(`Decimal divisor must be positive, got ${divisor}`);
    }
    const numerator = rescale(this.units, this.scale, scale + this.scale);
    return new Decimal(divideHalfEven(numerator, divisor * pow10(this.scale)), scale);
  }

  round(scale: number): Decimal {
    if (scale >= this.scale) {
      return new Decimal(rescale(this.units, this.scale, scale), scale);
    }
    return new Decimal(divideHalfEven(this.units, pow10(this.scale - scale)), scale);
  }

  toFixed(scale: number): string {
    const rounded = this.round(scale);
    const negative = rounded.units < 0n;
    const digits = (negative ? -rounded.units : rounded.units).toString().padStart(scale + 1, "0");
    const whole = digits.slice(0, digits.length - scale);
    const fraction = digits.slice(digits.length - scale);
    const body = scale > 0 ? `${whole}.${fraction}` : whole;
    return negative ? `-${body}` : body;
  }

  toString(): string {
    return this.toFixed(this.scale);
  }

}

export function parseDecimal(rawInput: string): Decimal | undefined {
  const match = rawInput.trim().match(decimalPattern);
  if (!match) {
    return undefined;
  }
  const fraction = match[3] ?? "";
  const magnitude = BigInt(`${match[2]}${fraction}`);
  return Decimal.of(match[1] === "-" ? -magnitude : magnitude, fraction.length);
}

function align(a: Decimal, b: Decimal): [bigint, bigint, number] {
  const scale = Math.max(a.scale, b.scale);
  return [rescale(a.units, a.scale, scale), rescale(b.units, b.scale, scale), scale];
}

function rescale(units: bigint, from: number, to: number): bigint {
  return to >= from ? units * pow10(to - from) : units / pow10(from - to);
}

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function divideHalfEven(numerator: bigint, divisor: bigint): bigint {
  const quotient = numerator / divisor;
  const remainder = numerator % divisor;
  if (remainder === 0n) {
    return quotient;
  }
  const twice = (remainder < 0n ? -remainder : remainder) * 2n;
  const roundAway = twice > divisor || (twice === divisor && quotient % 2n !== 0n);
  if (!roundAway) {
    return quotient;
  }
  return numerator < 0n ? quotient - 1n : quotient + 1n;
}
