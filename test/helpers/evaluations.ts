import type {
  EvaluationOutcome,
  MetricEvaluation,
  MetricEvaluations,
} from '@/services/posture-analysis/metric-types'
import type { MetricId } from '@/services/presets/preset-types'
import { mapMetrics } from '@/services/presets/preset-types'

export function evaluation(
  metric: MetricId,
  outcome: EvaluationOutcome,
  severity: number | null = outcome === 'unavailable' ? null : 0,
  enabled = true,
): MetricEvaluation {
  return { metric, outcome, severity, enabled }
}

/** Every metric ok, except the ones given. */
export function evaluations(
  overrides: Partial<Record<MetricId, MetricEvaluation>> = {},
): MetricEvaluations {
  return mapMetrics((metric) => overrides[metric] ?? evaluation(metric, 'ok'))
}

export function slouching(outcome: EvaluationOutcome, severity?: number): MetricEvaluations {
  return evaluations({ slouching: evaluation('slouching', outcome, severity) })
}
