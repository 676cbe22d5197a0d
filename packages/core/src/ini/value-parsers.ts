/**
 * Text-to-value conversions behind the reader's typed accessors.
 * Each returns null when the text is not a valid literal of its kind.
 */

const HEX_INTEGER = /^0[xX]([+-]?)([0-9a-fA-F]+)$/;
const DECIMAL_INTEGER = /^([+-]?)(\d+)$/;
const UNSIGNED_INTEGER = /^\+?(\d+)$/;
const DECIMAL_REAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_REAL = /^([+-]?)(inf|infinity|nan)$/i;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;
export const UINT64_MAX = 2n ** 64n - 1n;

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

/**
 * Signed integer, hex when prefixed with `0x`/`0X` (the sign, if any, comes
 * after the prefix), decimal otherwise. Hex is tried first.
 */
export function parseIntegerText(text: string): bigint | null {
  const hex = HEX_INTEGER.exec(text);
  if (hex) {
    const magnitude = BigInt(`0x${hex[2] ?? ''}`);
    return hex[1] === '-' ? -magnitude : magnitude;
  }
  const decimal = DECIMAL_INTEGER.exec(text);
  if (decimal) {
    const magnitude = BigInt(decimal[2] ?? '');
    return decimal[1] === '-' ? -magnitude : magnitude;
  }
  return null;
}

/** Non-negative decimal integer; no sign other than `+`, no hex. */
export function parseUnsignedText(text: string): bigint | null {
  const match = UNSIGNED_INTEGER.exec(text);
  return match ? BigInt(match[1] ?? '') : null;
}

/** Decimal or scientific notation, plus `inf`, `infinity` and `nan`. */
export function parseRealText(text: string): number | null {
  if (DECIMAL_REAL.test(text)) {
    return Number(text);
  }
  const special = SPECIAL_REAL.exec(text);
  if (!special) return null;
  if ((special[2] ?? '').toLowerCase() === 'nan') return NaN;
  return special[1] === '-' ? -Infinity : Infinity;
}

export function parseBooleanText(text: string): boolean | null {
  const lower = text.toLowerCase();
  if (TRUE_WORDS.has(lower)) return true;
  if (FALSE_WORDS.has(lower)) return false;
  return null;
}
