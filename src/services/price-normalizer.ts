const CURRENCY_SYMBOLS = /[₹]/g;
const THOUSANDS_SEPARATORS = /,/g;
const DECIMAL = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts listing price text such as `₹1,234.00` or `1,29,900` into a number.
 *
 * When markup artifacts leave more than one `.` in the text, everything before
 * the last point is treated as the integer part. Returns `null` for anything
 * that is not a non-negative decimal once cleaned.
 */
export function normalizePrice(text: string | null | undefined): number | null {
  if (!text) return null;

  let cleaned = text.replace(CURRENCY_SYMBOLS, '').replace(THOUSANDS_SEPARATORS, '').trim();

  const parts = cleaned.split('.');
  if (parts.length > 2) {
    const fraction = parts.pop() ?? '';
    cleaned = `${parts.join('')}.${fraction}`;
  }

  return parseDecimal(cleaned);
}

export function parseDecimal(text: string): number | null {
  if (!DECIMAL.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
