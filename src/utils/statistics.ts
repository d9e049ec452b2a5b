export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('Cannot compute mean of an empty sample')
  }
  const sum = values.reduce((acc, v) => acc + v, 0)
  return sum / values.length
}

/**
 * Population standard deviation.
 */
export function stdDev(values: readonly number[], precomputedMean?: number): number {
  const m = precomputedMean ?? mean(values)
  const sumSquaredDiffs = values.reduce((acc, v) => acc + (v - m) ** 2, 0)
  return Math.sqrt(sumSquaredDiffs / values.length)
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('Cannot compute median of an empty sample')
  }
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid]
}
