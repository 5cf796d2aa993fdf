/**
 * NVP encoding helpers.
 *
 * Reply bodies use the same encoding as a URL query string, so decoding is
 * delegated to URLSearchParams (`+` becomes a space, percent escapes are
 * decoded, malformed escapes are kept verbatim).
 */
import type { NVPValues } from '../types/nvp';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Beyond this toFixed switches to exponential notation
const FIXED_NOTATION_LIMIT = 1e21;

export function parseNVP(body: string): NVPValues {
  // No prototype: reply keys such as `constructor` or `__proto__` are plain fields
  const values: Record<string, string[]> = Object.create(null);
  new URLSearchParams(body).forEach((value, key) => {
    if (Object.hasOwn(values, key)) {
      values[key].push(value);
    } else {
      values[key] = [value];
    }
  });
  return values;
}

/**
 * All values stored under `key`, or an empty list when absent.
 */
export function getValues(values: NVPValues, key: string): readonly string[] {
  return Object.hasOwn(values, key) ? values[key] : [];
}

/**
 * First value stored under `key`, or an empty string when absent.
 */
export function getValue(values: NVPValues, key: string): string {
  const list = getValues(values, key);
  return list.length > 0 ? list[0] : '';
}

/**
 * Fixed notation with two decimals, including amounts of 1e21 and above
 * (those are integral doubles, so the fraction is always `.00`).
 */
export function formatAmount(amount: number): string {
  if (Number.isFinite(amount) && Math.abs(amount) >= FIXED_NOTATION_LIMIT) {
    return `${BigInt(amount)}.00`;
  }
  return amount.toFixed(2);
}

/**
 * Parse a decimal amount from a reply field.
 *
 * Anything that is not a plain decimal number yields 0 instead of an error;
 * callers reading optional amount fields rely on that.
 */
export function parseAmount(raw: string): number {
  if (!DECIMAL_PATTERN.test(raw)) {
    return 0;
  }
  const amount = Number(raw);
  return Number.isFinite(amount) ? amount : 0;
}
