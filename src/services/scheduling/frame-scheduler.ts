import type { DetectorOptions } from '@/services/pose-detection/pose-types'
import type { PerformanceConfig } from '@/services/presets/preset-types'
import { median } from '@/utils/statistics'
import type { Logger } from '@/utils/logger'
import { createLogger } from '@/utils/logger'

export interface FrameSchedulerOptions {
  /** Costs considered when deciding to widen the interval */
  readonly costWindow?: number
  /** Headroom applied to the median cost when widening */
  readonly widenFactor?: number
  /** Upper bound for the effective interval, as a multiple of the target */
  readonly maxIntervalFactor?: number
}

export interface FrameSchedulerStats {
  readonly processed: number
  readonly skipped: number
  readonly targetIntervalMs: number
  readonly effectiveIntervalMs: number
}

const DEFAULT_COST_WINDOW = 5
const DEFAULT_WIDEN_FACTOR = 1.2
const DEFAULT_MAX_INTERVAL_FACTOR = 4

/**
 * Decides which captured frames are processed. Frames arriving before the
 * effective interval has passed are dropped, never queued.
 *
 * When the median processing cost over the last few processed frames is
 * above the target interval, the effective interval widens to that median
 * plus headroom, capped at a multiple of the target.
 */
export class FrameScheduler {
  private performance: PerformanceConfig
  private pending: PerformanceConfig | null = null
  private readonly costWindow: number
  private readonly widenFactor: number
  private readonly maxIntervalFactor: number
  private readonly logger: Logger
  private lastProcessedAt: number | null = null
  private awaitingCost = false
  private costs: readonly number[] = []
  private effectiveIntervalMs: number
  private processed = 0
  private skipped = 0

  constructor(
    performance: PerformanceConfig,
    options: FrameSchedulerOptions = {},
    logger: Logger = createLogger('FrameScheduler'),
  ) {
    this.performance = performance
    this.costWindow = options.costWindow ?? DEFAULT_COST_WINDOW
    this.widenFactor = options.widenFactor ?? DEFAULT_WIDEN_FACTOR
    this.maxIntervalFactor = options.maxIntervalFactor ?? DEFAULT_MAX_INTERVAL_FACTOR
    this.logger = logger
    this.effectiveIntervalMs = this.getTargetIntervalMs()
  }

  /**
   * Called once per captured frame. `measuredLastFrameCost` is the time the
   * previous processed frame took; it is ignored unless the previous call
   * returned true.
   */
  shouldProcess(now: number, measuredLastFrameCost?: number): boolean {
    this.applyPending()

    if (this.awaitingCost) {
      this.awaitingCost = false
      if (
        measuredLastFrameCost !== undefined &&
        Number.isFinite(measuredLastFrameCost) &&
        measuredLastFrameCost >= 0
      ) {
        this.recordCost(measuredLastFrameCost)
      }
    }

    // A clock that moved backwards restarts the spacing.
    const due =
      this.lastProcessedAt === null ||
      now < this.lastProcessedAt ||
      now - this.lastProcessedAt >= this.effectiveIntervalMs

    if (!due) {
      this.skipped += 1
      return false
    }

    this.lastProcessedAt = now
    this.awaitingCost = true
    this.processed += 1
    return true
  }

  /** Takes effect at the next scheduling decision. */
  updatePerformance(performance: PerformanceConfig): void {
    this.pending = performance
  }

  getPerformance(): PerformanceConfig {
    return this.pending ?? this.performance
  }

  getDetectorOptions(): DetectorOptions {
    return {
      modelComplexity: this.performance.modelComplexity,
      faceLandmarkCount: this.performance.faceLandmarkCount,
    }
  }

  getTargetIntervalMs(): number {
    return 1000 / this.performance.targetFps
  }

  getEffectiveIntervalMs(): number {
    return this.effectiveIntervalMs
  }

  getStats(): FrameSchedulerStats {
    return {
      processed: this.processed,
      skipped: this.skipped,
      targetIntervalMs: this.getTargetIntervalMs(),
      effectiveIntervalMs: this.effectiveIntervalMs,
    }
  }

  reset(): void {
    this.lastProcessedAt = null
    this.awaitingCost = false
    this.costs = []
    this.processed = 0
    this.skipped = 0
    this.effectiveIntervalMs = this.getTargetIntervalMs()
  }

  private applyPending(): void {
    if (this.pending === null) return
    this.performance = this.pending
    this.pending = null
    this.recomputeInterval()
  }

  private recordCost(cost: number): void {
    const next = [...this.costs, cost]
    this.costs = next.length > this.costWindow ? next.slice(next.length - this.costWindow) : next
    this.recomputeInterval()
  }

  private recomputeInterval(): void {
    const target = this.getTargetIntervalMs()
    const previous = this.effectiveIntervalMs

    if (this.costs.length < this.costWindow) {
      this.effectiveIntervalMs = target
    } else {
      const typicalCost = median(this.costs)
      this.effectiveIntervalMs = typicalCost > target
        ? Math.min(target * this.maxIntervalFactor, Math.max(target, typicalCost * this.widenFactor))
        : target
    }

    if (this.effectiveIntervalMs !== previous) {
      this.logger.debug(
        `Effective interval ${previous.toFixed(1)}ms -> ${this.effectiveIntervalMs.toFixed(1)}ms`,
      )
    }
  }
}
