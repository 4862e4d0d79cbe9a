/**
 * Fixed-point helpers shared by every price and amount conversion.
 *
 * Canonical representation: 18 fractional digits (PRECISION = 1e18).
 * Collateral assets and oracles carry their own decimal counts; every value
 * is brought to the canonical scale before it is multiplied, and brought back
 * down only at the end.
 *
 * Rounding: all divisions truncate toward zero. Conversions are therefore not
 * perfectly invertible for tiny amounts; the round trip never returns more
 * than it started with.
 */

import { PRECISION_DECIMALS } from "./constants";

/** 10^n as a bigint. */
export function pow10(n: number): bigint {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Invalid decimal count: ${n}`);
  }
  return 10n ** BigInt(n);
}

/**
 * Rescale a value with `decimals` fractional digits to 18 digits.
 * Assets with more than 18 decimals lose their extra digits.
 */
export function toCanonical(value: bigint, decimals: number): bigint {
  if (decimals === PRECISION_DECIMALS) return value;
  if (decimals < PRECISION_DECIMALS) {
    return value * pow10(PRECISION_DECIMALS - decimals);
  }
  return value / pow10(decimals - PRECISION_DECIMALS);
}

/** Inverse of toCanonical: 18 digits down (or up) to `decimals`. */
export function fromCanonical(value: bigint, decimals: number): bigint {
  if (decimals === PRECISION_DECIMALS) return value;
  if (decimals < PRECISION_DECIMALS) {
    return value / pow10(PRECISION_DECIMALS - decimals);
  }
  return value * pow10(decimals - PRECISION_DECIMALS);
}

/** a * b / denominator, multiplying first. */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) throw new RangeError("Division by zero");
  return (a * b) / denominator;
}

/** Percentage of a value, truncated: value * pct / precision. */
export function percentOf(value: bigint, pct: bigint, precision: bigint): bigint {
  return mulDiv(value, pct, precision);
}

/** Parse a decimal string ("1500.25") into a value with `decimals` digits. */
export function parseUnits(amount: string, decimals: number = PRECISION_DECIMALS): bigint {
  const match = /^(-)?(\d+)(?:\.(\d+))?$/.exec(amount.trim());
  if (!match) throw new RangeError(`Invalid decimal amount: "${amount}"`);
  const [, sign, whole, fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new RangeError(`"${amount}" has more than ${decimals} fractional digits`);
  }
  const value = BigInt(whole) * pow10(decimals) + BigInt(fraction.padEnd(decimals, "0") || "0");
  return sign ? -value : value;
}

/** Render a value with `decimals` digits as a decimal string, trailing zeros removed. */
export function formatUnits(value: bigint, decimals: number = PRECISION_DECIMALS): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const base = pow10(decimals);
  const whole = abs / base;
  const fraction = (abs % base).toString().padStart(decimals, "0").replace(/0+$/, "");
  return `${negative ? "-" : ""}${whole}${fraction ? `.${fraction}` : ""}`;
}
