/**
 * Arithmetic helpers for budget and goal calculations.
 */

/**
 * Sums a list of amounts.
 *
 * @example
 * ```ts
 * sum([20000, 8000, 5000, 2000]) // returns 35000
 * ```
 */
export function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Returns `part / whole`, or 0 when `whole` is 0.
 */
export function safeRatio(part: number, whole: number): number {
  return whole === 0 ? 0 : part / whole;
}

/**
 * Percentage of `part` in `whole`, rounded to 2 decimals; 0 when `whole` is 0.
 *
 * @example
 * ```ts
 * percentOf(20000, 50000) // returns 40
 * ```
 */
export function percentOf(part: number, whole: number): number {
  return roundTo(safeRatio(part, whole) * 100, 2);
}

/**
 * Rounds to a fixed number of decimal places.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * True when the value is a finite number that is not negative.
 */
export function isNonNegativeFinite(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}
