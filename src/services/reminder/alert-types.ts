import type { AlertTimingConfig } from '@/types/settings'

export type AlertState = 'normal' | 'pending-bad' | 'alerting' | 'cooldown' | 'pending-normal'

export interface AlertTrackerSnapshot {
  readonly state: AlertState
  /** Violation evidence gathered while pending-bad */
  readonly violationMs: number
  /** Good-posture evidence gathered while pending-normal */
  readonly recoveryMs: number
  readonly lastAlertAt: number | null
  readonly lastUpdateAt: number | null
}

export interface AlertStateMachineOptions {
  readonly timing?: Partial<AlertTimingConfig>
  /** Evidence credited to the first update after a reset */
  readonly nominalIntervalMs?: number
}
