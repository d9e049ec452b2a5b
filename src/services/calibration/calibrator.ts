import type { LandmarkFrame } from '@/services/pose-detection/pose-types'
import { CORE_LANDMARKS } from '@/services/pose-detection/pose-types'
import { missingLandmarks } from '@/services/pose-detection/landmark-frame'
import type { MetricId } from '@/services/presets/preset-types'
import { METRIC_IDS } from '@/services/presets/preset-types'
import { METRIC_DEFINITIONS, measureAll } from '@/services/posture-analysis/metric-definitions'
import type { CalibrationConfig } from '@/types/settings'
import { DEFAULT_CALIBRATION_CONFIG } from '@/types/settings'
import { clamp } from '@/utils/math'
import { mean, median, stdDev } from '@/utils/statistics'
import type { Logger } from '@/utils/logger'
import { createLogger } from '@/utils/logger'
import type {
  CalibrationBaseline,
  CalibrationPhase,
  CalibrationProgress,
  CalibrationResult,
} from './calibration-types'
import { CalibrationNotReadyError, CalibrationStateError } from './calibration-types'

export interface CalibratorCallbacks {
  readonly onBaselineCommitted?: (baseline: CalibrationBaseline) => void
}

type Sample = Readonly<Record<MetricId, number | null>>

interface MetricSummary {
  readonly metric: MetricId
  readonly reference: number
  /** Standard deviation divided by the metric's scale */
  readonly spread: number
}

// A metric whose normalized spread exceeds this share of maxDispersion is
// reported as unsteady when a calibration is rejected.
const UNSTEADY_SHARE = 0.5

function isUnitInterval(value: number): boolean {
  return value >= 0 && value <= 1
}

/**
 * Throws RangeError for a configuration under which calibration could never
 * finish or would score NaN.
 */
export function assertCalibrationConfig(config: CalibrationConfig): void {
  const {
    minSamples,
    maxSamples,
    minDurationMs,
    acceptanceThreshold,
    minVisibility,
    maxDispersion,
  } = config
  if (!Number.isInteger(minSamples) || minSamples < 1) {
    throw new RangeError(`minSamples must be a positive integer, got ${minSamples}`)
  }
  if (!Number.isInteger(maxSamples) || maxSamples < minSamples) {
    throw new RangeError(
      `maxSamples must be an integer >= minSamples (${minSamples}), got ${maxSamples}`,
    )
  }
  if (!Number.isFinite(minDurationMs) || minDurationMs < 0) {
    throw new RangeError(`minDurationMs must be a non-negative number, got ${minDurationMs}`)
  }
  if (!isUnitInterval(acceptanceThreshold)) {
    throw new RangeError(`acceptanceThreshold must be within [0, 1], got ${acceptanceThreshold}`)
  }
  if (!isUnitInterval(minVisibility)) {
    throw new RangeError(`minVisibility must be within [0, 1], got ${minVisibility}`)
  }
  if (!Number.isFinite(maxDispersion) || maxDispersion <= 0) {
    throw new RangeError(`maxDispersion must be a positive number, got ${maxDispersion}`)
  }
}

export class Calibrator {
  private config: CalibrationConfig
  private readonly callbacks: CalibratorCallbacks
  private readonly logger: Logger
  private phase: CalibrationPhase = 'idle'
  private samples: readonly Sample[] = []
  private appendedCount = 0
  private ingestedCount = 0
  private startedAt = 0
  private lastFrameAt = 0
  private baseline: CalibrationBaseline | null = null

  constructor(
    config?: Partial<CalibrationConfig>,
    callbacks: CalibratorCallbacks = {},
    logger: Logger = createLogger('Calibrator'),
  ) {
    const merged = { ...DEFAULT_CALIBRATION_CONFIG, ...config }
    assertCalibrationConfig(merged)
    this.config = merged
    this.callbacks = callbacks
    this.logger = logger
  }

  start(now: number): void {
    this.samples = []
    this.appendedCount = 0
    this.ingestedCount = 0
    this.startedAt = now
    this.lastFrameAt = now
    this.phase = 'collecting'
    this.logger.info('Calibration started')
  }

  ingest(frame: LandmarkFrame): CalibrationProgress {
    if (this.phase !== 'collecting') {
      throw new CalibrationStateError('Cannot ingest frames: calibration is not running')
    }

    this.ingestedCount += 1
    this.lastFrameAt = Math.max(this.lastFrameAt, frame.timestamp)

    const missing = missingLandmarks(frame, CORE_LANDMARKS, this.config.minVisibility)
    if (missing.length > 0) {
      this.logger.debug(`Frame ${frame.timestamp} skipped, not visible: ${missing.join(', ')}`)
      return this.getProgress()
    }

    const next = [...this.samples, measureAll(frame, this.config.minVisibility)]
    this.samples = next.length > this.config.maxSamples
      ? next.slice(next.length - this.config.maxSamples)
      : next
    this.appendedCount += 1
    return this.getProgress()
  }

  /**
   * Close the session. Throws CalibrationNotReadyError, leaving the session
   * open, when too few frames were collected or too little time has passed.
   */
  finish(now: number): CalibrationResult {
    if (this.phase !== 'collecting') {
      throw new CalibrationStateError('Cannot finish: calibration is not running')
    }

    const sampleCount = this.samples.length
    const elapsedMs = now - this.startedAt
    if (sampleCount < this.config.minSamples || elapsedMs < this.config.minDurationMs) {
      throw new CalibrationNotReadyError(
        `Calibration needs ${this.config.minSamples} samples over ${this.config.minDurationMs}ms ` +
          `(have ${sampleCount} over ${elapsedMs}ms)`,
        sampleCount,
        elapsedMs,
      )
    }

    const summaries = this.summarize()
    const confidence = this.ingestedCount === 0 ? 0 : this.appendedCount / this.ingestedCount
    const consistency = summaries.length === 0
      ? 0
      : clamp(1 - mean(summaries.map((s) => s.spread)) / this.config.maxDispersion, 0, 1)
    const quality = confidence * consistency

    this.phase = 'idle'
    this.samples = []

    if (summaries.length === 0 || quality < this.config.acceptanceThreshold) {
      const issues = this.describeIssues(summaries, confidence)
      const reason = summaries.length === 0
        ? 'No posture metric could be measured'
        : `Calibration quality ${quality.toFixed(2)} is below ${this.config.acceptanceThreshold}`
      this.logger.warn(`Calibration rejected: ${reason}`)
      return { accepted: false, quality, sampleCount, reason, issues }
    }

    const references: Partial<Record<MetricId, number>> = {}
    for (const summary of summaries) {
      references[summary.metric] = summary.reference
    }
    const baseline: CalibrationBaseline = Object.freeze({
      references: Object.freeze(references),
      quality,
      valid: true,
      sampleCount,
      createdAt: now,
    })

    this.baseline = baseline
    this.logger.info(`Baseline committed (quality ${quality.toFixed(2)}, ${sampleCount} samples)`)
    this.callbacks.onBaselineCommitted?.(baseline)
    return { accepted: true, baseline, quality, sampleCount }
  }

  cancel(): void {
    if (this.phase === 'collecting') {
      this.logger.info('Calibration cancelled')
    }
    this.phase = 'idle'
    this.samples = []
  }

  getProgress(now: number = this.lastFrameAt): CalibrationProgress {
    const sampleCount = this.samples.length
    const elapsedMs = this.phase === 'collecting' ? Math.max(0, now - this.startedAt) : 0
    const { minSamples, minDurationMs } = this.config
    const sampleProgress = sampleCount / minSamples
    const timeProgress = minDurationMs === 0 ? 1 : elapsedMs / minDurationMs

    return {
      phase: this.phase,
      sampleCount,
      ingestedCount: this.ingestedCount,
      minSamples,
      elapsedMs,
      minDurationMs,
      progress: clamp(Math.min(sampleProgress, timeProgress), 0, 1),
      ready:
        this.phase === 'collecting' &&
        sampleCount >= minSamples &&
        elapsedMs >= minDurationMs,
    }
  }

  getPhase(): CalibrationPhase {
    return this.phase
  }

  getBaseline(): CalibrationBaseline | null {
    return this.baseline
  }

  clearBaseline(): void {
    this.baseline = null
  }

  updateConfig(partial: Partial<CalibrationConfig>): void {
    const next = { ...this.config, ...partial }
    assertCalibrationConfig(next)
    this.config = next
  }

  getConfig(): CalibrationConfig {
    return this.config
  }

  private summarize(): readonly MetricSummary[] {
    const required = Math.ceil(this.config.minSamples / 2)
    const summaries: MetricSummary[] = []

    for (const metric of METRIC_IDS) {
      const values = this.samples
        .map((sample) => sample[metric])
        .filter((value): value is number => value !== null)
      if (values.length === 0 || values.length < required) continue

      summaries.push({
        metric,
        reference: median(values),
        spread: stdDev(values) / METRIC_DEFINITIONS[metric].scale,
      })
    }
    return summaries
  }

  private describeIssues(
    summaries: readonly MetricSummary[],
    confidence: number,
  ): readonly string[] {
    const issues: string[] = []

    if (confidence < this.config.acceptanceThreshold) {
      issues.push(
        `Only ${this.appendedCount} of ${this.ingestedCount} frames showed both ears and shoulders`,
      )
    }
    for (const summary of summaries) {
      if (summary.spread > this.config.maxDispersion * UNSTEADY_SHARE) {
        issues.push(`${METRIC_DEFINITIONS[summary.metric].label} was not steady`)
      }
    }
    const measured = new Set(summaries.map((s) => s.metric))
    for (const metric of METRIC_IDS) {
      if (!measured.has(metric)) {
        issues.push(`${METRIC_DEFINITIONS[metric].label} could not be measured`)
      }
    }
    return issues
  }
}
