/**
 * Fixed-point decimal text. Decimal values travel as their canonical plain text
 * (`-12.50` for DECIMAL(4,2)), which keeps full precision without a numeric library.
 */

const DECIMAL_REGEX = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

export interface ParsedDecimal {
  negative: boolean;
  /** Absolute unscaled value */
  unscaled: bigint;
  /** Number of fractional digits; negative for values like `1e3` */
  scale: number;
}

export function parseDecimalText(text: string): ParsedDecimal | null {
  const match = DECIMAL_REGEX.exec(text.trim());
  if (!match) return null;
  const [, sign, intDigits = '', fracDigits = '', exponent] = match;
  if (intDigits.length === 0 && fracDigits.length === 0) return null;
  const digits = (intDigits + fracDigits).replace(/^0+(?=\d)/, '');
  const exp = exponent === undefined ? 0 : Number.parseInt(exponent, 10);
  return {
    negative: sign === '-',
    unscaled: BigInt(digits),
    scale: fracDigits.length - exp,
  };
}

/**
 * Number of significant digits of the unscaled value (1 for zero).
 */
export function digitCount(value: bigint): number {
  return value === 0n ? 1 : value.toString().length;
}

/**
 * Rescales to `scale` (rounding half up) and checks `precision`. Returns the canonical
 * text or null when the value does not fit.
 */
export function toDecimal(text: string, precision: number, scale: number): string | null {
  const parsed = parseDecimalText(text);
  if (!parsed) return null;

  let unscaled = parsed.unscaled;
  const shift = scale - parsed.scale;
  // exponents come from the input; bound them before building powers of ten
  if (shift >= 0) {
    if (unscaled !== 0n) {
      if (digitCount(unscaled) + shift > precision) return null;
      unscaled *= 10n ** BigInt(shift);
    }
  } else if (-shift > digitCount(unscaled)) {
    unscaled = 0n;
  } else {
    const divisor = 10n ** BigInt(-shift);
    const quotient = unscaled / divisor;
    const remainder = unscaled % divisor;
    unscaled = remainder * 2n >= divisor ? quotient + 1n : quotient;
  }

  if (unscaled >= 10n ** BigInt(precision)) return null;
  return formatUnscaled(parsed.negative && unscaled !== 0n, unscaled, scale);
}

function formatUnscaled(negative: boolean, unscaled: bigint, scale: number): string {
  const digits = unscaled.toString().padStart(scale + 1, '0');
  const sign = negative ? '-' : '';
  if (scale === 0) return `${sign}${digits}`;
  return `${sign}${digits.slice(0, digits.length - scale)}.${digits.slice(digits.length - scale)}`;
}
