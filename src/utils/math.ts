/**
 * @fileoverview Math utilities
 */

/**
 * Clamp a value to [0, 1].
 */
export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Round to a fixed number of decimals so heuristic scores stay stable in logs
 * and assertions.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
