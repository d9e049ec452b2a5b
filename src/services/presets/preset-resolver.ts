import type {
  ConfigOverrides,
  EffectiveConfig,
  MetricConfig,
  MetricConfigs,
  MetricId,
  PerformanceConfig,
  PresetSelection,
} from './preset-types'
import { InvalidPresetError, mapMetrics } from './preset-types'
import { PresetCatalog } from './preset-catalog'
import {
  assertRecord,
  isMetricId,
  parseMetricOverride,
  parsePerformanceOverride,
} from './preset-validation'

/**
 * Merges a named preset with field-level overrides into one fully populated
 * configuration. Resolution is pure: the catalog is never modified and the
 * same inputs always produce an equal, frozen result.
 */
export class PresetResolver {
  private readonly catalog: PresetCatalog

  constructor(catalog: PresetCatalog = PresetCatalog.builtin()) {
    this.catalog = catalog
  }

  getCatalog(): PresetCatalog {
    return this.catalog
  }

  resolve(selection: PresetSelection, overrides: ConfigOverrides = {}): EffectiveConfig {
    const metrics = this.resolveMetrics(selection.metrics, overrides.metrics)
    const performance = this.resolvePerformance(selection.performance, overrides.performance)

    return Object.freeze({
      presets: Object.freeze({ metrics: selection.metrics, performance: selection.performance }),
      metrics,
      performance,
    })
  }

  resolveMetrics(
    presetName: string,
    overrides: ConfigOverrides['metrics'] = {},
  ): MetricConfigs {
    const base = this.catalog.getMetricPreset(presetName)
    if (base === undefined) {
      throw new InvalidPresetError(`Unknown metric preset: "${presetName}"`)
    }

    // All overrides are validated before any merging happens.
    assertRecord('metrics', overrides)
    const parsed = new Map<MetricId, Partial<MetricConfig>>()
    for (const [metric, fields] of Object.entries(overrides)) {
      const override = parseMetricOverride(metric, fields)
      if (isMetricId(metric)) {
        parsed.set(metric, override)
      }
    }

    const merge = (id: MetricId): MetricConfig =>
      Object.freeze({ ...base[id], ...parsed.get(id) })

    return Object.freeze(mapMetrics(merge))
  }

  resolvePerformance(
    presetName: string,
    overrides: ConfigOverrides['performance'] = {},
  ): PerformanceConfig {
    const base = this.catalog.getPerformancePreset(presetName)
    if (base === undefined) {
      throw new InvalidPresetError(`Unknown performance preset: "${presetName}"`)
    }

    return Object.freeze({ ...base, ...parsePerformanceOverride(overrides) })
  }
}
