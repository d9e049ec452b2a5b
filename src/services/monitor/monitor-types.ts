import type { CalibrationProgress } from '@/services/calibration/calibration-types'
import type { MetricEvaluations, MetricReadings } from '@/services/posture-analysis/metric-types'
import type { PresetResolver } from '@/services/presets/preset-resolver'
import type { AlertEvent } from '@/types/events'
import type { MonitorSettings } from '@/types/settings'
import type { Logger } from '@/utils/logger'

export type MonitorPhase = 'stopped' | 'monitoring' | 'calibrating'

export type SkipReason = 'stopped' | 'scheduler' | 'busy'

export type FrameOutcome =
  | { readonly kind: 'skipped'; readonly reason: SkipReason }
  | { readonly kind: 'calibrating'; readonly progress: CalibrationProgress }
  | {
      readonly kind: 'monitored'
      readonly readings: MetricReadings
      readonly evaluations: MetricEvaluations
      readonly events: readonly AlertEvent[]
    }

export interface PostureMonitorOptions {
  readonly settings?: MonitorSettings
  readonly resolver?: PresetResolver
  /** Shared by every component; defaults to one scoped console logger each */
  readonly logger?: Logger
  /** Monotonic milliseconds used to measure frame cost */
  readonly clock?: () => number
}
