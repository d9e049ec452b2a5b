import type { MetricId } from '@/services/presets/preset-types'

export type CalibrationPhase = 'idle' | 'collecting'

/**
 * Personal reference posture. A metric that could not be measured often
 * enough during calibration has no reference.
 */
export interface CalibrationBaseline {
  readonly references: Readonly<Partial<Record<MetricId, number>>>
  /** 0-1 */
  readonly quality: number
  readonly valid: boolean
  readonly sampleCount: number
  readonly createdAt: number
}

export type CalibrationResult =
  | {
      readonly accepted: true
      readonly baseline: CalibrationBaseline
      readonly quality: number
      readonly sampleCount: number
    }
  | {
      readonly accepted: false
      readonly quality: number
      readonly sampleCount: number
      readonly reason: string
      readonly issues: readonly string[]
    }

export interface CalibrationProgress {
  readonly phase: CalibrationPhase
  /** Frames currently in the window */
  readonly sampleCount: number
  /** Frames offered, including rejected ones */
  readonly ingestedCount: number
  readonly minSamples: number
  readonly elapsedMs: number
  readonly minDurationMs: number
  /** 0-1, the lesser of sample and time progress */
  readonly progress: number
  readonly ready: boolean
}

export class CalibrationNotReadyError extends Error {
  readonly sampleCount: number
  readonly elapsedMs: number

  constructor(message: string, sampleCount: number, elapsedMs: number) {
    super(message)
    this.name = 'CalibrationNotReadyError'
    this.sampleCount = sampleCount
    this.elapsedMs = elapsedMs
  }
}

export class CalibrationStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CalibrationStateError'
  }
}
