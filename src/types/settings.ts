import type { ConfigOverrides, PresetSelection } from '@/services/presets/preset-types'
import {
  DEFAULT_METRIC_PRESET,
  DEFAULT_PERFORMANCE_PRESET,
} from '@/services/presets/builtin-presets'

export interface MonitorSettings {
  readonly presets: PresetSelection
  readonly overrides: ConfigOverrides
  readonly alerts: AlertTimingConfig
  readonly notifications: NotificationSettings
  readonly calibration: CalibrationConfig
  readonly analysis: AnalysisSettings
  readonly debugMode: boolean
}

export interface AlertTimingConfig {
  /** Violation must persist this long before a bad-posture alert */
  readonly minDurationMs: number
  /** Minimum spacing between two alerts for the same metric */
  readonly cooldownMs: number
  /** Good posture must persist this long before back-to-normal */
  readonly recoveryMs: number
}

export interface NotificationSettings {
  readonly enabled: boolean
  readonly backToNormalEnabled: boolean
  readonly title: string
  /** `{issue}` is replaced with the metric label */
  readonly messageTemplate: string
  readonly backToNormalMessage: string
}

export interface CalibrationConfig {
  readonly minSamples: number
  /** Oldest samples are dropped beyond this */
  readonly maxSamples: number
  readonly minDurationMs: number
  /** Quality (0-1) required to commit a baseline */
  readonly acceptanceThreshold: number
  readonly minVisibility: number
  /** Mean normalized spread at which consistency drops to zero */
  readonly maxDispersion: number
}

export interface AnalysisSettings {
  /** Frames in the per-metric rolling average */
  readonly smoothingWindow: number
  readonly minVisibility: number
}

export const DEFAULT_ALERT_TIMING: AlertTimingConfig = {
  minDurationMs: 5000,
  cooldownMs: 30000,
  recoveryMs: 2000,
}

export const DEFAULT_NOTIFICATION_SETTINGS: NotificationSettings = {
  enabled: true,
  backToNormalEnabled: true,
  title: 'Posture Alert',
  messageTemplate: 'Posture Alert: {issue}',
  backToNormalMessage: 'Posture is back to normal!',
}

export const DEFAULT_CALIBRATION_CONFIG: CalibrationConfig = {
  minSamples: 30,
  maxSamples: 150,
  minDurationMs: 3000,
  acceptanceThreshold: 0.7,
  minVisibility: 0.5,
  maxDispersion: 0.5,
}

export const DEFAULT_ANALYSIS_SETTINGS: AnalysisSettings = {
  smoothingWindow: 5,
  minVisibility: 0.5,
}

export const DEFAULT_SETTINGS: MonitorSettings = {
  presets: {
    metrics: DEFAULT_METRIC_PRESET,
    performance: DEFAULT_PERFORMANCE_PRESET,
  },
  overrides: {},
  alerts: DEFAULT_ALERT_TIMING,
  notifications: DEFAULT_NOTIFICATION_SETTINGS,
  calibration: DEFAULT_CALIBRATION_CONFIG,
  analysis: DEFAULT_ANALYSIS_SETTINGS,
  debugMode: false,
}
