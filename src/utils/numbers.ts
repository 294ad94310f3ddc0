/**
 * Reads a box-score count. Absent, null, negative and non-numeric values
 * come back as null; numeric strings are accepted and fractions truncated.
 */
export function toOptionalCount(value: unknown): number | null {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    n = Number(value.trim());
  } else {
    return null;
  }
  if (!Number.isFinite(n) || n < 0) return null;
  return Math.trunc(n);
}

/** Same as {@link toOptionalCount} with missing values coerced to 0. */
export function toCount(value: unknown): number {
  return toOptionalCount(value) ?? 0;
}

export function safeDiv(numerator: number, denominator: number): number {
  return denominator ? numerator / denominator : 0;
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
