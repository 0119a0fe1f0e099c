/**
 * Shared math utilities for consistent calculations across the codebase.
 *
 * @module shared/utils/mathUtils
 */

/**
 * Restricts a value to the inclusive range [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Restricts a value to [0, 1].
 */
export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Rounds a currency amount to two decimals.
 */
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Average of a list, 0 for an empty list.
 */
export function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}
