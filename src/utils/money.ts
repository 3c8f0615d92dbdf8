/**
 * Exact decimal arithmetic for amounts, quantities and rates.
 *
 * Values travel as decimal strings ("45.00") and are computed as bigint
 * scaled by a fixed number of fractional digits. No floating point.
 *
 * Rounding is half away from zero, the behaviour of the store's two-place
 * numeric columns.
 */

import { ConstraintViolation } from "./errors.js";

/** Fractional digits kept for money and quantities. */
export const MONEY_SCALE = 2;

/** Fractional digits kept for rates (0.13 -> 1300n). */
export const RATE_SCALE = 4;

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * Parse a decimal string into a bigint scaled by `scale`.
 *
 * "100.5" with scale 2 -> 10050n
 * "-0.25" with scale 2 -> -25n
 */
export function toScaled(value: string, scale: number = MONEY_SCALE): bigint {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new ConstraintViolation(`Invalid decimal value: "${value}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > scale) {
    throw new ConstraintViolation(
      `Value "${trimmed}" has ${fracPart.length} decimal places, at most ${scale} allowed`,
    );
  }

  const scaled = BigInt(intPart + fracPart.padEnd(scale, "0"));
  return negative ? -scaled : scaled;
}

/**
 * Format a scaled bigint back to a decimal string with exactly `scale` digits.
 *
 * 10050n with scale 2 -> "100.50"
 */
export function fromScaled(scaled: bigint, scale: number = MONEY_SCALE): string {
  if (scale === 0) return scaled.toString();

  const negative = scaled < 0n;
  const digits = (negative ? -scaled : scaled).toString().padStart(scale + 1, "0");
  const intPart = digits.slice(0, digits.length - scale);
  const fracPart = digits.slice(digits.length - scale);
  return `${negative ? "-" : ""}${intPart}.${fracPart}`;
}

/** Integer division rounding half away from zero. */
export function divideRounded(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) throw new RangeError("Division by zero");

  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  let quotient = n / d;
  if ((n % d) * 2n >= d) quotient += 1n;
  return negative ? -quotient : quotient;
}

/** Multiply two scaled values and round the product to `outScale`. */
export function multiplyScaled(
  a: bigint,
  aScale: number,
  b: bigint,
  bScale: number,
  outScale: number = MONEY_SCALE,
): bigint {
  const product = a * b;
  const productScale = aScale + bScale;
  if (productScale <= outScale) return product * pow10(outScale - productScale);
  return divideRounded(product, pow10(productScale - outScale));
}

/** `percentage` percent of `amount`, both at MONEY_SCALE. */
export function percentOf(amount: bigint, percentage: bigint): bigint {
  return divideRounded(amount * percentage, 100n * pow10(MONEY_SCALE));
}

/** Canonical two-place string for a decimal input ("45" -> "45.00"). */
export function normalizeAmount(value: string): string {
  return fromScaled(toScaled(value));
}

export function sumAmounts(values: Iterable<string>): string {
  let total = 0n;
  for (const value of values) total += toScaled(value);
  return fromScaled(total);
}

export function compareAmounts(a: string, b: string): -1 | 0 | 1 {
  const left = toScaled(a);
  const right = toScaled(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export const ZERO_AMOUNT = fromScaled(0n);
