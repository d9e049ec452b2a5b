import type { MetricConfigs, PerformanceConfig } from './preset-types'
import { InvalidPresetError } from './preset-types'
import {
  BUILTIN_METRIC_PRESETS,
  BUILTIN_METRIC_PRESET_NAMES,
  BUILTIN_PERFORMANCE_PRESETS,
  BUILTIN_PERFORMANCE_PRESET_NAMES,
} from './builtin-presets'
import { assertRecord, parseMetricPreset, parsePerformancePreset } from './preset-validation'

export interface CustomPresets {
  readonly metrics: Readonly<Record<string, MetricConfigs>>
  readonly performance: Readonly<Record<string, PerformanceConfig>>
}

export const EMPTY_CUSTOM_PRESETS: CustomPresets = {
  metrics: {},
  performance: {},
}

function isBuiltin(names: readonly string[], name: string): boolean {
  return names.includes(name)
}

function omit<T>(record: Readonly<Record<string, T>>, key: string): Readonly<Record<string, T>> {
  return Object.fromEntries(Object.entries(record).filter(([k]) => k !== key))
}

function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined
}

function assertPresetName(name: string): void {
  if (name.trim().length === 0) {
    throw new InvalidPresetError('Preset name must not be empty')
  }
}

/**
 * Built-in presets plus user-defined ones. Every mutation returns a new
 * catalog; built-ins can be neither replaced nor deleted.
 */
export class PresetCatalog {
  private readonly custom: CustomPresets

  private constructor(custom: CustomPresets) {
    this.custom = custom
  }

  static builtin(): PresetCatalog {
    return new PresetCatalog(EMPTY_CUSTOM_PRESETS)
  }

  /**
   * Rebuild a catalog from stored custom presets, validating each one.
   */
  static fromCustom(custom: CustomPresets): PresetCatalog {
    assertRecord('custom metric presets', custom.metrics)
    assertRecord('custom performance presets', custom.performance)
    let catalog = PresetCatalog.builtin()
    for (const [name, preset] of Object.entries(custom.metrics)) {
      catalog = catalog.withMetricPreset(name, preset)
    }
    for (const [name, preset] of Object.entries(custom.performance)) {
      catalog = catalog.withPerformancePreset(name, preset)
    }
    return catalog
  }

  getMetricPreset(name: string): MetricConfigs | undefined {
    if (isBuiltin(BUILTIN_METRIC_PRESET_NAMES, name)) {
      return BUILTIN_METRIC_PRESETS[name]
    }
    return ownValue(this.custom.metrics, name)
  }

  getPerformancePreset(name: string): PerformanceConfig | undefined {
    if (isBuiltin(BUILTIN_PERFORMANCE_PRESET_NAMES, name)) {
      return BUILTIN_PERFORMANCE_PRESETS[name]
    }
    return ownValue(this.custom.performance, name)
  }

  listMetricPresets(): readonly string[] {
    return [...BUILTIN_METRIC_PRESET_NAMES, ...Object.keys(this.custom.metrics)]
  }

  listPerformancePresets(): readonly string[] {
    return [...BUILTIN_PERFORMANCE_PRESET_NAMES, ...Object.keys(this.custom.performance)]
  }

  getCustomPresets(): CustomPresets {
    return this.custom
  }

  withMetricPreset(
    name: string,
    preset: Readonly<Record<string, Readonly<Record<string, unknown>>>>,
  ): PresetCatalog {
    assertPresetName(name)
    if (isBuiltin(BUILTIN_METRIC_PRESET_NAMES, name)) {
      throw new InvalidPresetError(`Cannot overwrite built-in metric preset "${name}"`)
    }
    const parsed = parseMetricPreset(name, preset)
    return new PresetCatalog({
      ...this.custom,
      metrics: { ...this.custom.metrics, [name]: parsed },
    })
  }

  withPerformancePreset(
    name: string,
    preset: Readonly<Record<string, unknown>>,
  ): PresetCatalog {
    assertPresetName(name)
    if (isBuiltin(BUILTIN_PERFORMANCE_PRESET_NAMES, name)) {
      throw new InvalidPresetError(`Cannot overwrite built-in performance preset "${name}"`)
    }
    const parsed = parsePerformancePreset(name, preset)
    return new PresetCatalog({
      ...this.custom,
      performance: { ...this.custom.performance, [name]: parsed },
    })
  }

  withoutMetricPreset(name: string): PresetCatalog {
    if (isBuiltin(BUILTIN_METRIC_PRESET_NAMES, name)) {
      throw new InvalidPresetError(`Cannot delete built-in metric preset "${name}"`)
    }
    if (ownValue(this.custom.metrics, name) === undefined) {
      throw new InvalidPresetError(`Unknown metric preset: "${name}"`)
    }
    return new PresetCatalog({ ...this.custom, metrics: omit(this.custom.metrics, name) })
  }

  withoutPerformancePreset(name: string): PresetCatalog {
    if (isBuiltin(BUILTIN_PERFORMANCE_PRESET_NAMES, name)) {
      throw new InvalidPresetError(`Cannot delete built-in performance preset "${name}"`)
    }
    if (ownValue(this.custom.performance, name) === undefined) {
      throw new InvalidPresetError(`Unknown performance preset: "${name}"`)
    }
    return new PresetCatalog({
      ...this.custom,
      performance: omit(this.custom.performance, name),
    })
  }
}
