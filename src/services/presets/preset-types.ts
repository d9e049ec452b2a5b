import type { ModelComplexity } from '@/services/pose-detection/pose-types'

export const METRIC_IDS = [
  'slouching',
  'unevenShoulders',
  'headTilt',
  'neckForward',
  'shouldersForward',
  'tooClose',
] as const

export type MetricId = typeof METRIC_IDS[number]

/**
 * Build a record with one entry per metric.
 */
export function mapMetrics<T>(fn: (id: MetricId) => T): Readonly<Record<MetricId, T>> {
  return {
    slouching: fn('slouching'),
    unevenShoulders: fn('unevenShoulders'),
    headTilt: fn('headTilt'),
    neckForward: fn('neckForward'),
    shouldersForward: fn('shouldersForward'),
    tooClose: fn('tooClose'),
  }
}

/**
 * When a normalized severity counts as a violation:
 * - `exceeds`: severity > threshold
 * - `falls-below`: severity < -threshold
 * - `either`: |severity| > threshold
 */
export type ViolationDirection = 'exceeds' | 'falls-below' | 'either'

export const VIOLATION_DIRECTIONS: readonly ViolationDirection[] = [
  'exceeds',
  'falls-below',
  'either',
]

// Type aliases, so plain records read back from storage stay assignable.
export type MetricConfig = {
  readonly enabled: boolean
  /** Non-negative, in normalized severity units */
  readonly threshold: number
  readonly direction: ViolationDirection
}

export type MetricConfigs = Readonly<Record<MetricId, MetricConfig>>

export type PerformanceConfig = {
  readonly targetFps: number
  readonly modelComplexity: ModelComplexity
  /** Face landmarks the detector tracks; fewer is cheaper. */
  readonly faceLandmarkCount: number
  /** Recent values kept per metric for outlier rejection */
  readonly historySize: number
  /** Outlier cut-off in standard deviations; 0 disables rejection */
  readonly outlierStdDeviations: number
}

export interface PresetSelection {
  readonly metrics: string
  readonly performance: string
}

/**
 * Field-level overrides as they arrive from the settings layer. Keys and
 * values are checked at resolution time.
 */
export interface ConfigOverrides {
  readonly metrics?: Readonly<Record<string, Readonly<Record<string, unknown>>>>
  readonly performance?: Readonly<Record<string, unknown>>
}

export interface EffectiveConfig {
  readonly presets: PresetSelection
  readonly metrics: MetricConfigs
  readonly performance: PerformanceConfig
}

export class InvalidPresetError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidPresetError'
  }
}
