/**
 * @fileoverview Math utilities shared by scoring and confidence code.
 */

/**
 * Clamp a value to [0, 1].
 * Useful for confidence scores and probabilities.
 */
export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Round half away from zero to a fixed number of decimal places.
 * 0.4 + 0.6 * 0.5 must come out as 0.7, not 0.7000000000000001.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.sign(value) * Math.round(Math.abs(value) * factor + Number.EPSILON) / factor;
}
