export type {
  Landmark,
  LandmarkDetector,
  LandmarkFrame,
  LandmarkName,
  DetectorOptions,
  ModelComplexity,
} from './services/pose-detection/pose-types'
export { CORE_LANDMARKS, LANDMARK_NAMES } from './services/pose-detection/pose-types'
export { fromIndexedLandmarks, requireLandmarks } from './services/pose-detection/landmark-frame'

export type {
  ConfigOverrides,
  EffectiveConfig,
  MetricConfig,
  MetricConfigs,
  MetricId,
  PerformanceConfig,
  PresetSelection,
  ViolationDirection,
} from './services/presets/preset-types'
export { InvalidPresetError, METRIC_IDS } from './services/presets/preset-types'
export {
  BUILTIN_METRIC_PRESETS,
  BUILTIN_PERFORMANCE_PRESETS,
  DEFAULT_METRIC_PRESET,
  DEFAULT_PERFORMANCE_PRESET,
} from './services/presets/builtin-presets'
export type { CustomPresets } from './services/presets/preset-catalog'
export { PresetCatalog } from './services/presets/preset-catalog'
export { PresetResolver } from './services/presets/preset-resolver'

export type {
  CalibrationBaseline,
  CalibrationProgress,
  CalibrationResult,
} from './services/calibration/calibration-types'
export {
  CalibrationNotReadyError,
  CalibrationStateError,
} from './services/calibration/calibration-types'
export { Calibrator } from './services/calibration/calibrator'

export type {
  MetricEvaluation,
  MetricEvaluations,
  MetricReading,
  MetricReadings,
} from './services/posture-analysis/metric-types'
export { METRIC_DEFINITIONS, measureMetric } from './services/posture-analysis/metric-definitions'
export { MetricEngine } from './services/posture-analysis/metric-engine'
export { evaluateThresholds, isViolation } from './services/posture-analysis/threshold-evaluator'

export type { AlertState } from './services/reminder/alert-types'
export { AlertStateMachine } from './services/reminder/alert-state-machine'
export type { NotificationContent } from './services/reminder/notification-formatter'
export { formatNotification } from './services/reminder/notification-formatter'

export { FrameScheduler } from './services/scheduling/frame-scheduler'

export type { FrameOutcome, MonitorPhase } from './services/monitor/monitor-types'
export { PostureMonitor } from './services/monitor/posture-monitor'

export { ConfigStore } from './store/config-store'

export type { AlertEvent, AlertKind, AlertListener } from './types/events'
export type { MonitorSettings } from './types/settings'
export { DEFAULT_SETTINGS } from './types/settings'
export type { Logger } from './utils/logger'
export { createLogger } from './utils/logger'
