import type { MetricId } from '@/services/presets/preset-types'

export type UnavailableReason = 'landmarks-missing' | 'not-calibrated'

export interface AvailableReading {
  readonly metric: MetricId
  readonly status: 'available'
  /** Raw measurement for this frame */
  readonly value: number
  /** Filtered and smoothed difference from the baseline reference */
  readonly deviation: number
  /** `deviation` divided by the metric's scale */
  readonly severity: number
}

export interface UnavailableReading {
  readonly metric: MetricId
  readonly status: 'unavailable'
  readonly reason: UnavailableReason
}

export type MetricReading = AvailableReading | UnavailableReading

/** Readings for the enabled metrics of one frame */
export type MetricReadings = Readonly<Partial<Record<MetricId, MetricReading>>>

export type EvaluationOutcome = 'violation' | 'ok' | 'unavailable'

export interface MetricEvaluation {
  readonly metric: MetricId
  readonly outcome: EvaluationOutcome
  readonly severity: number | null
  readonly enabled: boolean
}

export type MetricEvaluations = Readonly<Record<MetricId, MetricEvaluation>>
