import { describe, it, expect } from 'vitest'
import { BUILTIN_PERFORMANCE_PRESETS } from '@/services/presets/builtin-presets'
import { PresetCatalog } from '@/services/presets/preset-catalog'
import type { MetricConfigs } from '@/services/presets/preset-types'
import { InvalidPresetError, mapMetrics } from '@/services/presets/preset-types'

function uniformPreset(threshold: number): MetricConfigs {
  return mapMetrics(() => ({ enabled: true, threshold, direction: 'exceeds' as const }))
}

const focusPerformance = { ...BUILTIN_PERFORMANCE_PRESETS.Low, targetFps: 2 }

describe('PresetCatalog', () => {
  describe('builtin', () => {
    it('lists built-in presets in order', () => {
      const catalog = PresetCatalog.builtin()
      expect(catalog.listMetricPresets()).toEqual(['Default', 'Sensitive', 'Relaxed'])
      expect(catalog.listPerformancePresets()).toEqual(['Low', 'Medium', 'High'])
    })

    it('does not resolve names from the object prototype', () => {
      expect(PresetCatalog.builtin().getMetricPreset('toString')).toBeUndefined()
      expect(PresetCatalog.builtin().getPerformancePreset('constructor')).toBeUndefined()
    })
  })

  describe('withMetricPreset', () => {
    it('adds a custom preset after the built-ins', () => {
      const catalog = PresetCatalog.builtin().withMetricPreset('Desk', uniformPreset(0.35))
      expect(catalog.listMetricPresets()).toEqual(['Default', 'Sensitive', 'Relaxed', 'Desk'])
      expect(catalog.getMetricPreset('Desk')?.slouching.threshold).toBe(0.35)
    })

    it('leaves the original catalog untouched', () => {
      const original = PresetCatalog.builtin()
      original.withMetricPreset('Desk', uniformPreset(0.35))
      expect(original.getMetricPreset('Desk')).toBeUndefined()
    })

    it('replaces a custom preset with the same name', () => {
      const catalog = PresetCatalog.builtin()
        .withMetricPreset('Desk', uniformPreset(0.35))
        .withMetricPreset('Desk', uniformPreset(0.6))
      expect(catalog.getMetricPreset('Desk')?.headTilt.threshold).toBe(0.6)
      expect(catalog.listMetricPresets()).toHaveLength(4)
    })

    it('refuses to overwrite a built-in preset', () => {
      expect(() =>
        PresetCatalog.builtin().withMetricPreset('Default', uniformPreset(0.1)),
      ).toThrow('Cannot overwrite built-in metric preset "Default"')
    })

    it('refuses an empty name', () => {
      expect(() => PresetCatalog.builtin().withMetricPreset('  ', uniformPreset(0.1))).toThrow(
        InvalidPresetError,
      )
    })

    it('refuses an incomplete preset', () => {
      const partial = Object.fromEntries(
        Object.entries(uniformPreset(0.2)).filter(([metric]) => metric !== 'tooClose'),
      )
      expect(() => PresetCatalog.builtin().withMetricPreset('Partial', partial)).toThrow(
        'Preset "Partial" is missing metric "tooClose"',
      )
    })

    it('refuses an entry without a threshold', () => {
      const preset = { ...uniformPreset(0.2), headTilt: { enabled: true, direction: 'either' } }
      expect(() => PresetCatalog.builtin().withMetricPreset('Loose', preset)).toThrow(
        'Preset "Loose" has an incomplete entry for "headTilt"',
      )
    })
  })

  describe('withPerformancePreset', () => {
    it('adds a validated custom preset', () => {
      const catalog = PresetCatalog.builtin().withPerformancePreset('Focus', focusPerformance)
      expect(catalog.getPerformancePreset('Focus')).toEqual(focusPerformance)
    })

    it('refuses an incomplete preset', () => {
      expect(() =>
        PresetCatalog.builtin().withPerformancePreset('Half', { targetFps: 10 }),
      ).toThrow('Performance preset "Half" is incomplete')
    })

    it('refuses to overwrite a built-in preset', () => {
      expect(() =>
        PresetCatalog.builtin().withPerformancePreset('High', focusPerformance),
      ).toThrow(InvalidPresetError)
    })
  })

  describe('deleting presets', () => {
    it('removes a custom metric preset', () => {
      const catalog = PresetCatalog.builtin()
        .withMetricPreset('Desk', uniformPreset(0.35))
        .withoutMetricPreset('Desk')
      expect(catalog.getMetricPreset('Desk')).toBeUndefined()
      expect(catalog.listMetricPresets()).toEqual(['Default', 'Sensitive', 'Relaxed'])
    })

    it('removes a custom performance preset', () => {
      const catalog = PresetCatalog.builtin()
        .withPerformancePreset('Focus', focusPerformance)
        .withoutPerformancePreset('Focus')
      expect(catalog.getPerformancePreset('Focus')).toBeUndefined()
    })

    it('refuses to delete a built-in preset', () => {
      expect(() => PresetCatalog.builtin().withoutMetricPreset('Relaxed')).toThrow(
        'Cannot delete built-in metric preset "Relaxed"',
      )
      expect(() => PresetCatalog.builtin().withoutPerformancePreset('Low')).toThrow(
        InvalidPresetError,
      )
    })

    it('refuses to delete an unknown preset', () => {
      expect(() => PresetCatalog.builtin().withoutMetricPreset('Ghost')).toThrow(
        'Unknown metric preset: "Ghost"',
      )
    })
  })

  describe('fromCustom', () => {
    it('round-trips the custom presets', () => {
      const catalog = PresetCatalog.builtin()
        .withMetricPreset('Desk', uniformPreset(0.35))
        .withPerformancePreset('Focus', focusPerformance)
      const restored = PresetCatalog.fromCustom(catalog.getCustomPresets())
      expect(restored.getCustomPresets()).toEqual(catalog.getCustomPresets())
    })

    it('validates stored presets', () => {
      expect(() =>
        PresetCatalog.fromCustom({
          metrics: {},
          performance: { Broken: { ...focusPerformance, targetFps: -1 } },
        }),
      ).toThrow(InvalidPresetError)
    })
  })
})
