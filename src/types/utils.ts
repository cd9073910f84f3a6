/**
 * Core type utilities shared across services and routes.
 */

/**
 * A row returned by a raw SQL query.
 */
export type QueryRow = Record<string, unknown>;

/**
 * Percentage of `part` in `whole`, rounded to two decimals.
 * Returns 0 when `whole` is 0.
 */
export function percentage(part: number, whole: number): number {
  if (whole <= 0) {
    return 0;
  }
  return Math.round((part / whole) * 100 * 100) / 100;
}

/**
 * Validates an integer id coming from an untyped source.
 */
export function isIntegerString(value: string): boolean {
  return /^-?\d+$/.test(value.trim());
}
