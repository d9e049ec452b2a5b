import type { ModelComplexity } from '@/services/pose-detection/pose-types'
import type {
  MetricConfig,
  MetricConfigs,
  MetricId,
  PerformanceConfig,
  ViolationDirection,
} from './preset-types'
import { InvalidPresetError, METRIC_IDS, VIOLATION_DIRECTIONS, mapMetrics } from './preset-types'

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

// Below this the outlier filter has no history to work with.
const MIN_HISTORY_SIZE = 5
const MAX_TARGET_FPS = 120

export function isMetricId(value: string): value is MetricId {
  return METRIC_IDS.some((id) => id === value)
}

function isDirection(value: unknown): value is ViolationDirection {
  return VIOLATION_DIRECTIONS.some((d) => d === value)
}

function isModelComplexity(value: unknown): value is ModelComplexity {
  return value === 0 || value === 1 || value === 2
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function invalidValue(path: string, value: unknown, expected: string): InvalidPresetError {
  return new InvalidPresetError(
    `Invalid value for ${path}: ${JSON.stringify(value)} (expected ${expected})`,
  )
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Throws InvalidPresetError unless `value` is a plain object. */
export function assertRecord(
  path: string,
  value: unknown,
): asserts value is Readonly<Record<string, unknown>> {
  if (!isRecord(value)) {
    throw invalidValue(path, value, 'an object')
  }
}

/**
 * Check a partial metric override. Every key must name a MetricConfig field
 * and every value must be valid for it.
 */
export function parseMetricOverride(metric: string, fields: unknown): Partial<MetricConfig> {
  if (!isMetricId(metric)) {
    throw new InvalidPresetError(`Unknown metric: "${metric}"`)
  }
  assertRecord(`metrics.${metric}`, fields)

  const result: Partial<Mutable<MetricConfig>> = {}
  for (const [field, value] of Object.entries(fields)) {
    const path = `metrics.${metric}.${field}`
    switch (field) {
      case 'enabled':
        if (typeof value !== 'boolean') throw invalidValue(path, value, 'a boolean')
        result.enabled = value
        break
      case 'threshold':
        if (!isFiniteNumber(value) || value < 0) {
          throw invalidValue(path, value, 'a finite number >= 0')
        }
        result.threshold = value
        break
      case 'direction':
        if (!isDirection(value)) {
          throw invalidValue(path, value, VIOLATION_DIRECTIONS.join(' | '))
        }
        result.direction = value
        break
      default:
        throw new InvalidPresetError(`Unknown metric field: "${path}"`)
    }
  }
  return result
}

export function parsePerformanceOverride(fields: unknown): Partial<PerformanceConfig> {
  assertRecord('performance', fields)
  const result: Partial<Mutable<PerformanceConfig>> = {}
  for (const [field, value] of Object.entries(fields)) {
    const path = `performance.${field}`
    switch (field) {
      case 'targetFps':
        if (!isFiniteNumber(value) || value <= 0 || value > MAX_TARGET_FPS) {
          throw invalidValue(path, value, `a number in (0, ${MAX_TARGET_FPS}]`)
        }
        result.targetFps = value
        break
      case 'modelComplexity':
        if (!isModelComplexity(value)) throw invalidValue(path, value, '0 | 1 | 2')
        result.modelComplexity = value
        break
      case 'faceLandmarkCount':
        if (!Number.isInteger(value) || !isFiniteNumber(value) || value < 1) {
          throw invalidValue(path, value, 'a positive integer')
        }
        result.faceLandmarkCount = value
        break
      case 'historySize':
        if (!Number.isInteger(value) || !isFiniteNumber(value) || value < MIN_HISTORY_SIZE) {
          throw invalidValue(path, value, `an integer >= ${MIN_HISTORY_SIZE}`)
        }
        result.historySize = value
        break
      case 'outlierStdDeviations':
        if (!isFiniteNumber(value) || value < 0) {
          throw invalidValue(path, value, 'a finite number >= 0')
        }
        result.outlierStdDeviations = value
        break
      default:
        throw new InvalidPresetError(`Unknown performance field: "${path}"`)
    }
  }
  return result
}

/**
 * Validate a complete metric preset (used for custom presets).
 */
export function parseMetricPreset(name: string, preset: unknown): MetricConfigs {
  assertRecord(`preset "${name}"`, preset)
  for (const metric of Object.keys(preset)) {
    if (!isMetricId(metric)) {
      throw new InvalidPresetError(`Preset "${name}" references unknown metric "${metric}"`)
    }
  }

  const complete = (metric: MetricId): MetricConfig => {
    const fields = preset[metric]
    if (fields === undefined) {
      throw new InvalidPresetError(`Preset "${name}" is missing metric "${metric}"`)
    }
    const parsed = parseMetricOverride(metric, fields)
    if (
      parsed.enabled === undefined ||
      parsed.threshold === undefined ||
      parsed.direction === undefined
    ) {
      throw new InvalidPresetError(`Preset "${name}" has an incomplete entry for "${metric}"`)
    }
    return { enabled: parsed.enabled, threshold: parsed.threshold, direction: parsed.direction }
  }

  return mapMetrics(complete)
}

export function parsePerformancePreset(name: string, preset: unknown): PerformanceConfig {
  const parsed = parsePerformanceOverride(preset)
  const {
    targetFps,
    modelComplexity,
    faceLandmarkCount,
    historySize,
    outlierStdDeviations,
  } = parsed
  if (
    targetFps === undefined ||
    modelComplexity === undefined ||
    faceLandmarkCount === undefined ||
    historySize === undefined ||
    outlierStdDeviations === undefined
  ) {
    throw new InvalidPresetError(`Performance preset "${name}" is incomplete`)
  }
  return { targetFps, modelComplexity, faceLandmarkCount, historySize, outlierStdDeviations }
}
