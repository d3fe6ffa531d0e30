const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Renders an amount as a plain decimal string with exactly two fraction digits,
 * rounding half-up on the third digit. Returns null for anything that is not a
 * non-negative decimal (signs, exponents, blanks).
 */
export function normalizeAmount(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number' && !Number.isFinite(value)) {
    return null;
  }

  const text = typeof value === 'number' ? String(value) : value.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }

  const [whole, fraction = ''] = text.split('.');
  const digits = (fraction + '000').slice(0, 3);

  let cents = BigInt(whole) * 100n + BigInt(digits.slice(0, 2));
  if (Number(digits[2]) >= 5) {
    cents += 1n;
  }

  return `${cents / 100n}.${(cents % 100n).toString().padStart(2, '0')}`;
}

export function isPositiveAmount(amount: string): boolean {
  return amount !== '0.00';
}
