/**
 * Descriptive statistics used by the threshold optimizer.
 *
 * Quartiles use linear interpolation between closest ranks (the "type 7"
 * definition); standard deviation is the population form.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

export function stddev(values: readonly number[]): number {
  if (values.length === 0) return 0
  const m = mean(values)
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length)
}

/** stddev / mean; 0 for a constant zero series, Infinity when only the mean is zero */
export function coefficientOfVariation(values: readonly number[]): number {
  const m = mean(values)
  const sd = stddev(values)
  if (m === 0) return sd === 0 ? 0 : Infinity
  return sd / Math.abs(m)
}

export function quantile(values: readonly number[], p: number): number {
  if (values.length === 0) return NaN
  const sorted = [...values].sort((a, b) => a - b)
  const h = (sorted.length - 1) * p
  const lo = Math.floor(h)
  const hi = Math.ceil(h)
  const low = sorted[lo] ?? NaN
  const high = sorted[hi] ?? NaN
  return low + (h - lo) * (high - low)
}

export interface IqrFilterResult {
  kept: number[]
  excluded: number[]
  lowerFence: number
  upperFence: number
}

/** Drop values outside `[Q1 - 1.5·IQR, Q3 + 1.5·IQR]` */
export function removeOutliersIqr(values: readonly number[]): IqrFilterResult {
  if (values.length === 0) return { kept: [], excluded: [], lowerFence: NaN, upperFence: NaN }
  const q1 = quantile(values, 0.25)
  const q3 = quantile(values, 0.75)
  const iqr = q3 - q1
  const lowerFence = q1 - 1.5 * iqr
  const upperFence = q3 + 1.5 * iqr
  const kept: number[] = []
  const excluded: number[] = []
  for (const v of values) {
    if (v < lowerFence || v > upperFence) excluded.push(v)
    else kept.push(v)
  }
  return { kept, excluded, lowerFence, upperFence }
}
