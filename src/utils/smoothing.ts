import { mean, stdDev } from './statistics'

/**
 * Rolling (simple moving) average over the last `windowSize` values.
 *
 * Until the window fills, the average is taken over the values seen so far,
 * so the first call returns the raw value.
 */
export class RollingAverage {
  private readonly windowSize: number
  private values: number[] = []
  private sum: number = 0

  constructor(windowSize: number) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`)
    }
    this.windowSize = windowSize
  }

  update(newValue: number): number {
    this.values.push(newValue)
    this.sum += newValue

    if (this.values.length > this.windowSize) {
      const dropped = this.values.shift()
      if (dropped !== undefined) {
        this.sum -= dropped
      }
    }

    return this.sum / this.values.length
  }

  reset(): void {
    this.values = []
    this.sum = 0
  }

  getValue(): number {
    return this.values.length === 0 ? 0 : this.sum / this.values.length
  }

  getCount(): number {
    return this.values.length
  }
}

// Fewer values than this give no usable spread estimate.
const OUTLIER_WARMUP = 5
// Floor for the spread so a perfectly flat history does not reject everything.
const MIN_STD_DEV = 0.001

/**
 * Replaces single-frame spikes with the previous value.
 *
 * A value further than `stdDeviations` standard deviations from the mean of
 * the recent history is an outlier. Every value, outlier or not, enters the
 * history, so a sustained change is accepted after a few frames.
 * `stdDeviations` of 0 disables rejection.
 */
export class OutlierFilter {
  private readonly historySize: number
  private readonly stdDeviations: number
  private history: number[] = []

  constructor(historySize: number, stdDeviations: number) {
    if (!Number.isInteger(historySize) || historySize < OUTLIER_WARMUP) {
      throw new RangeError(
        `historySize must be an integer >= ${OUTLIER_WARMUP}, got ${historySize}`,
      )
    }
    if (stdDeviations < 0) {
      throw new RangeError(`stdDeviations must be non-negative, got ${stdDeviations}`)
    }
    this.historySize = historySize
    this.stdDeviations = stdDeviations
  }

  update(newValue: number): number {
    if (this.stdDeviations === 0) {
      return newValue
    }

    if (this.history.length < OUTLIER_WARMUP) {
      this.history.push(newValue)
      return newValue
    }

    const m = mean(this.history)
    const spread = Math.max(stdDev(this.history, m), MIN_STD_DEV)
    const isOutlier = Math.abs(newValue - m) > this.stdDeviations * spread
    const previous = this.history[this.history.length - 1]

    this.history.push(newValue)
    if (this.history.length > this.historySize) {
      this.history.shift()
    }

    return isOutlier ? previous : newValue
  }

  reset(): void {
    this.history = []
  }
}
