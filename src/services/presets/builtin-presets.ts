import type { MetricConfigs, MetricId, PerformanceConfig, ViolationDirection } from './preset-types'
import { mapMetrics } from './preset-types'

export const BUILTIN_METRIC_PRESET_NAMES = ['Default', 'Sensitive', 'Relaxed'] as const
export const BUILTIN_PERFORMANCE_PRESET_NAMES = ['Low', 'Medium', 'High'] as const

export const DEFAULT_METRIC_PRESET = 'Default'
export const DEFAULT_PERFORMANCE_PRESET = 'Medium'

const DIRECTIONS: Readonly<Record<MetricId, ViolationDirection>> = {
  slouching: 'exceeds',
  unevenShoulders: 'exceeds',
  headTilt: 'either',
  neckForward: 'exceeds',
  shouldersForward: 'exceeds',
  tooClose: 'exceeds',
}

function thresholdPreset(thresholds: Readonly<Record<MetricId, number>>): MetricConfigs {
  return mapMetrics((id) => ({
    enabled: true,
    threshold: thresholds[id],
    direction: DIRECTIONS[id],
  }))
}

// Thresholds in severity units: Sensitive trips earlier than Default, Relaxed later.
export const BUILTIN_METRIC_PRESETS: Readonly<Record<string, MetricConfigs>> = {
  Default: thresholdPreset({
    slouching: 0.4,
    unevenShoulders: 0.3,
    headTilt: 0.5,
    neckForward: 0.3,
    shouldersForward: 0.4,
    tooClose: 0.3,
  }),
  Sensitive: thresholdPreset({
    slouching: 0.3,
    unevenShoulders: 0.2,
    headTilt: 0.25,
    neckForward: 0.2,
    shouldersForward: 0.3,
    tooClose: 0.2,
  }),
  Relaxed: thresholdPreset({
    slouching: 0.5,
    unevenShoulders: 0.4,
    headTilt: 0.75,
    neckForward: 0.4,
    shouldersForward: 0.5,
    tooClose: 0.4,
  }),
}

export const BUILTIN_PERFORMANCE_PRESETS: Readonly<Record<string, PerformanceConfig>> = {
  Low: {
    targetFps: 5,
    modelComplexity: 0,
    faceLandmarkCount: 5,
    historySize: 10,
    outlierStdDeviations: 2.5,
  },
  Medium: {
    targetFps: 15,
    modelComplexity: 1,
    faceLandmarkCount: 20,
    historySize: 20,
    outlierStdDeviations: 3.0,
  },
  High: {
    targetFps: 30,
    modelComplexity: 2,
    faceLandmarkCount: 40,
    historySize: 30,
    outlierStdDeviations: 3.0,
  },
}
