/**
 * Score normalization utilities
 * Sub-scores and composites are reported on a 0-100 scale
 */

export const NEUTRAL_SCORE = 50;

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Credit for reaching `target`, on a 0-1 scale. Twice the target earns full
 * credit and reaching exactly the target earns half.
 */
export function targetRatio(value: number, target: number): number {
  return clamp(value / target, 0, 2) / 2;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

/**
 * Percentile rank mapped to 1-99 (ties share the lower rank).
 */
export function percentileRating(value: number, allValues: readonly number[]): number {
  if (allValues.length <= 1) return 50;
  const below = allValues.filter((v) => v < value).length;
  return Math.round(clamp(1 + (below / (allValues.length - 1)) * 98, 1, 99));
}

export function roundScore(score: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}
