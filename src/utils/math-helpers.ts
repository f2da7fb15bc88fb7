/**
 * Math Helper Utilities
 *
 * Safe mathematical operations that guard against division by zero,
 * NaN propagation, and other edge cases.
 */

/**
 * Bytes per gigabyte (binary). Used for every byte → GB conversion.
 */
export const BYTES_PER_GB = 1024 ** 3;

/**
 * Calculate safe average of an array of numbers
 *
 * @param values - Array of numbers to average
 * @param defaultValue - Value to return if array is empty (default: 0)
 * @returns Average of values, or defaultValue if array is empty
 *
 * @example
 * ```typescript
 * safeAverage([2, 3, 4])        // => 3
 * safeAverage([])               // => 0
 * safeAverage([], 100)          // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  const sum = values.reduce((acc, val) => acc + val, 0);
  return sum / values.length;
}

/**
 * Calculate safe division that guards against division by zero
 *
 * Non-positive or non-finite denominators yield the default as well, so a
 * zero-length interval never turns into an infinite rate.
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, -1, 7)    // => 7
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (!Number.isFinite(denominator) || denominator <= 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Round to a fixed number of decimal places
 *
 * @example
 * ```typescript
 * roundTo(1.23456, 4)   // => 1.2346
 * roundTo(2.5, 0)       // => 3
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

/**
 * Convert a byte count to gigabytes rounded to 2 decimals
 */
export function bytesToGb(bytes: number): number {
  return roundTo(bytes / BYTES_PER_GB, 2);
}
