import type { MetricId } from '@/services/presets/preset-types'

export type AlertKind = 'BAD_POSTURE' | 'BACK_TO_NORMAL'

export interface AlertEvent {
  readonly metric: MetricId
  readonly kind: AlertKind
  readonly timestamp: number
  /** Normalized severity of the reading that triggered the transition */
  readonly severity: number
}

export type AlertListener = (event: AlertEvent) => void
