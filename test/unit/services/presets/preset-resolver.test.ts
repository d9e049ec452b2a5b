import { describe, it, expect } from 'vitest'
import {
  BUILTIN_METRIC_PRESETS,
  BUILTIN_PERFORMANCE_PRESETS,
} from '@/services/presets/builtin-presets'
import { PresetCatalog } from '@/services/presets/preset-catalog'
import { PresetResolver } from '@/services/presets/preset-resolver'
import type { ConfigOverrides, MetricConfigs } from '@/services/presets/preset-types'
import { InvalidPresetError, mapMetrics } from '@/services/presets/preset-types'

const DEFAULT_SELECTION = { metrics: 'Default', performance: 'Medium' }

function customMetricPreset(threshold: number): MetricConfigs {
  return mapMetrics(() => ({ enabled: true, threshold, direction: 'either' as const }))
}

describe('PresetResolver', () => {
  describe('resolve', () => {
    it('returns the named presets when there are no overrides', () => {
      const config = new PresetResolver().resolve(DEFAULT_SELECTION)
      expect(config.presets).toEqual(DEFAULT_SELECTION)
      expect(config.metrics).toEqual(BUILTIN_METRIC_PRESETS.Default)
      expect(config.performance).toEqual(BUILTIN_PERFORMANCE_PRESETS.Medium)
    })

    it('freezes the result', () => {
      const config = new PresetResolver().resolve(DEFAULT_SELECTION, {
        metrics: { slouching: { threshold: 0.2 } },
      })
      expect(Object.isFrozen(config)).toBe(true)
      expect(Object.isFrozen(config.metrics)).toBe(true)
      expect(Object.isFrozen(config.metrics.slouching)).toBe(true)
      expect(Object.isFrozen(config.performance)).toBe(true)
    })

    it('yields equal configs for equal input', () => {
      const resolver = new PresetResolver()
      expect(resolver.resolve(DEFAULT_SELECTION)).toEqual(resolver.resolve(DEFAULT_SELECTION))
    })

    it('throws InvalidPresetError for an unknown metric preset', () => {
      expect(() =>
        new PresetResolver().resolve({ metrics: 'Nope', performance: 'Medium' }),
      ).toThrow('Unknown metric preset: "Nope"')
    })

    it('throws InvalidPresetError for an unknown performance preset', () => {
      expect(() =>
        new PresetResolver().resolve({ metrics: 'Default', performance: 'Turbo' }),
      ).toThrow(InvalidPresetError)
    })

    it('treats preset names as case-sensitive', () => {
      expect(() =>
        new PresetResolver().resolve({ metrics: 'default', performance: 'Medium' }),
      ).toThrow(InvalidPresetError)
    })
  })

  describe('metric overrides', () => {
    it('replaces only the overridden field', () => {
      const metrics = new PresetResolver().resolveMetrics('Default', {
        slouching: { threshold: 0.15 },
      })
      expect(metrics.slouching).toEqual({ enabled: true, threshold: 0.15, direction: 'exceeds' })
      expect(metrics.headTilt).toEqual(BUILTIN_METRIC_PRESETS.Default.headTilt)
    })

    it('can disable a metric', () => {
      const metrics = new PresetResolver().resolveMetrics('Sensitive', {
        tooClose: { enabled: false },
      })
      expect(metrics.tooClose.enabled).toBe(false)
      expect(metrics.tooClose.threshold).toBe(0.2)
    })

    it('rejects an unknown metric', () => {
      expect(() =>
        new PresetResolver().resolveMetrics('Default', { posture: { threshold: 1 } }),
      ).toThrow('Unknown metric: "posture"')
    })

    it('rejects an unknown field', () => {
      expect(() =>
        new PresetResolver().resolveMetrics('Default', { slouching: { limit: 1 } }),
      ).toThrow('Unknown metric field: "metrics.slouching.limit"')
    })

    it('rejects a negative threshold', () => {
      expect(() =>
        new PresetResolver().resolveMetrics('Default', { slouching: { threshold: -0.1 } }),
      ).toThrow(InvalidPresetError)
    })

    it('rejects an unknown direction', () => {
      expect(() =>
        new PresetResolver().resolveMetrics('Default', { headTilt: { direction: 'sideways' } }),
      ).toThrow(InvalidPresetError)
    })

    it('does not apply valid overrides when a later one is invalid', () => {
      const resolver = new PresetResolver()
      expect(() =>
        resolver.resolveMetrics('Default', {
          slouching: { threshold: 0.1 },
          headTilt: { threshold: 'high' },
        }),
      ).toThrow(InvalidPresetError)
      expect(resolver.resolveMetrics('Default').slouching.threshold).toBe(0.4)
    })

    it('rejects stored overrides whose entries are not objects', () => {
      const stored: ConfigOverrides = JSON.parse('{"metrics":{"slouching":null}}')
      expect(() => new PresetResolver().resolve(DEFAULT_SELECTION, stored)).toThrow(
        InvalidPresetError,
      )
    })

    it('rejects a stored metrics section that is not an object', () => {
      const stored: ConfigOverrides = JSON.parse('{"metrics":[]}')
      expect(() => new PresetResolver().resolve(DEFAULT_SELECTION, stored)).toThrow(
        'Invalid value for metrics: [] (expected an object)',
      )
    })
  })

  describe('performance overrides', () => {
    it('replaces only the overridden field', () => {
      const performance = new PresetResolver().resolvePerformance('Low', { targetFps: 10 })
      expect(performance).toEqual({ ...BUILTIN_PERFORMANCE_PRESETS.Low, targetFps: 10 })
    })

    it.each([
      ['targetFps', 0],
      ['targetFps', 121],
      ['modelComplexity', 3],
      ['faceLandmarkCount', 2.5],
      ['historySize', 4],
      ['outlierStdDeviations', -1],
    ])('rejects %s = %s', (field, value) => {
      expect(() =>
        new PresetResolver().resolvePerformance('Medium', { [field]: value }),
      ).toThrow(InvalidPresetError)
    })

    it('rejects an unknown field', () => {
      expect(() =>
        new PresetResolver().resolvePerformance('Medium', { gpu: true }),
      ).toThrow('Unknown performance field: "performance.gpu"')
    })

    it('rejects a stored performance section that is not an object', () => {
      const stored: ConfigOverrides = JSON.parse('{"performance":null}')
      expect(() => new PresetResolver().resolve(DEFAULT_SELECTION, stored)).toThrow(
        'Invalid value for performance: null (expected an object)',
      )
    })
  })

  it('resolves custom presets from its catalog', () => {
    const catalog = PresetCatalog.builtin().withMetricPreset('Strict', customMetricPreset(0.1))
    const resolver = new PresetResolver(catalog)
    const config = resolver.resolve({ metrics: 'Strict', performance: 'High' })
    expect(config.metrics.neckForward).toEqual({ enabled: true, threshold: 0.1, direction: 'either' })
    expect(resolver.getCatalog()).toBe(catalog)
  })
})
