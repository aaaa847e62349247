/**
 * Converts numeric-like column values into a number.
 *
 * - number => itself
 * - string => parseFloat (NaN => 0)
 * - null/undefined => 0
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isNaN(num) ? 0 : num;
}

/** Like toNumber, but keeps SQL NULL as null for nullable columns. */
export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  return toNumber(value);
}

export function roundTo(value: number, places: number): number {
  return parseFloat(value.toFixed(places));
}
