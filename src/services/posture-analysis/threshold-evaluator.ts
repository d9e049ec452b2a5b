import type { MetricConfig, MetricConfigs, ViolationDirection } from '@/services/presets/preset-types'
import { mapMetrics } from '@/services/presets/preset-types'
import type { MetricEvaluation, MetricEvaluations, MetricReading, MetricReadings } from './metric-types'

/**
 * Strict comparison: a severity equal to the threshold is not a violation.
 */
export function isViolation(
  severity: number,
  threshold: number,
  direction: ViolationDirection,
): boolean {
  switch (direction) {
    case 'exceeds':
      return severity > threshold
    case 'falls-below':
      return severity < -threshold
    case 'either':
      return Math.abs(severity) > threshold
  }
}

export function evaluateReading(
  reading: MetricReading | undefined,
  config: MetricConfig,
): Omit<MetricEvaluation, 'metric'> {
  if (!config.enabled) {
    return { outcome: 'ok', severity: null, enabled: false }
  }
  if (reading === undefined || reading.status === 'unavailable') {
    return { outcome: 'unavailable', severity: null, enabled: true }
  }
  return {
    outcome: isViolation(reading.severity, config.threshold, config.direction)
      ? 'violation'
      : 'ok',
    severity: reading.severity,
    enabled: true,
  }
}

export function evaluateThresholds(
  readings: MetricReadings,
  metrics: MetricConfigs,
): MetricEvaluations {
  return mapMetrics((metric) => ({
    metric,
    ...evaluateReading(readings[metric], metrics[metric]),
  }))
}
