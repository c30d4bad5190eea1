/**
 * Converts numeric-like database values (pg returns `numeric` as string) into a number.
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

export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  return roundQuantity(toNumber(value));
}

/**
 * Rounds to 6 decimal places (ledger quantity precision).
 */
export function roundQuantity(value: number): number {
  const rounded = parseFloat(value.toFixed(6));
  // toFixed keeps the sign of -0
  return rounded === 0 ? 0 : rounded;
}

export function formatSignedQuantity(value: number): string {
  const fixed = value.toFixed(2);
  return value > 0 ? `+${fixed}` : fixed;
}

/**
 * Largest quantity or price the store accepts; columns are numeric(18,6).
 */
export const QUANTITY_MAX = 999_999_999_999;

export function isWithinQuantityRange(value: number): boolean {
  return Number.isFinite(value) && value <= QUANTITY_MAX;
}
