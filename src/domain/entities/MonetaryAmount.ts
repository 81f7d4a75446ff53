import { FormatError } from '../errors.js';

const PLAIN_DECIMAL = /^(-?)(\d+)(?:\.(\d+))?$/;

const pow10 = (exponent: number): bigint => 10n ** BigInt(exponent);

/**
 * Exact decimal amount stored as integer units at a given scale
 * (`units / 10^scale`). Two amounts compare equal when their values match,
 * regardless of scale, but `toString()` keeps the scale they were written with.
 */
export class MonetaryAmount {
  static readonly ZERO = new MonetaryAmount(0n, 0);

  private constructor(
    readonly units: bigint,
    readonly scale: number,
  ) {}

  /** Accepts only plain notation: `-?\d+(\.\d+)?`. */
  static fromPlain(text: string): MonetaryAmount {
    const match = PLAIN_DECIMAL.exec(text);
    if (!match) {
      throw new FormatError(`"${text}" is not a plain decimal number`, text);
    }

    const [, sign, integer, fraction = ''] = match;
    const magnitude = BigInt(`${integer}${fraction}`);
    return new MonetaryAmount(sign === '-' ? -magnitude : magnitude, fraction.length);
  }

  /** Converts a number as the oracle wrote it, using its shortest decimal representation. */
  static fromNumber(value: number): MonetaryAmount {
    if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
      throw new FormatError(`${value} cannot be represented as an amount`, String(value));
    }

    let text = String(value);
    if (/e/i.test(text)) {
      text = value.toFixed(20).replace(/0+$/, '').replace(/\.$/, '');
    }

    return MonetaryAmount.fromPlain(text);
  }

  static sum(amounts: Iterable<MonetaryAmount>): MonetaryAmount {
    let total = MonetaryAmount.ZERO;
    for (const amount of amounts) {
      total = total.add(amount);
    }
    return total;
  }

  add(other: MonetaryAmount): MonetaryAmount {
    const scale = Math.max(this.scale, other.scale);
    return new MonetaryAmount(this.unitsAt(scale) + other.unitsAt(scale), scale);
  }

  subtract(other: MonetaryAmount): MonetaryAmount {
    return this.add(other.negate());
  }

  negate(): MonetaryAmount {
    return new MonetaryAmount(-this.units, this.scale);
  }

  abs(): MonetaryAmount {
    return this.units < 0n ? this.negate() : this;
  }

  compare(other: MonetaryAmount): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const left = this.unitsAt(scale);
    const right = other.unitsAt(scale);
    return left === right ? 0 : left < right ? -1 : 1;
  }

  equals(other: MonetaryAmount): boolean {
    return this.compare(other) === 0;
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  isZero(): boolean {
    return this.units === 0n;
  }

  /** `|this - other| <= tolerance` */
  isWithin(other: MonetaryAmount, tolerance: MonetaryAmount): boolean {
    return this.subtract(other).abs().compare(tolerance) <= 0;
  }

  /** Rescales to `digits` fraction digits, rounding half away from zero. */
  round(digits: number): MonetaryAmount {
    if (digits >= this.scale) {
      return new MonetaryAmount(this.unitsAt(digits), digits);
    }

    const divisor = pow10(this.scale - digits);
    let quotient = this.units / divisor;
    const remainder = this.units % divisor;
    const doubled = (remainder < 0n ? -remainder : remainder) * 2n;
    if (doubled >= divisor) {
      quotient += this.units < 0n ? -1n : 1n;
    }

    return new MonetaryAmount(quotient, digits);
  }

  toFixed(digits: number): string {
    return this.round(digits).toString();
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toString(): string {
    const negative = this.units < 0n;
    const digits = (negative ? -this.units : this.units).toString().padStart(this.scale + 1, '0');
    const integer = digits.slice(0, digits.length - this.scale);
    const fraction = this.scale > 0 ? `.${digits.slice(digits.length - this.scale)}` : '';
    return `${negative ? '-' : ''}${integer}${fraction}`;
  }

  toJSON(): string {
    return this.toString();
  }

  private unitsAt(scale: number): bigint {
    return this.units * pow10(scale - this.scale);
  }
}
