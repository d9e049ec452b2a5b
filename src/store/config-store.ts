import Conf from 'conf'
import type { CustomPresets } from '@/services/presets/preset-catalog'
import { EMPTY_CUSTOM_PRESETS, PresetCatalog } from '@/services/presets/preset-catalog'
import { InvalidPresetError } from '@/services/presets/preset-types'
import type { MonitorSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'
import type { Logger } from '@/utils/logger'
import { createLogger } from '@/utils/logger'

type StoreSchema = {
  settings: MonitorSettings
  customPresets: CustomPresets
}

export interface ConfigStoreOptions {
  /** Directory for the config file; defaults to the platform config dir */
  readonly cwd?: string
  readonly logger?: Logger
}

// Sections missing from an older config file fall back to their defaults.
function withDefaults(stored: MonitorSettings): MonitorSettings {
  return {
    ...DEFAULT_SETTINGS,
    ...stored,
    alerts: { ...DEFAULT_SETTINGS.alerts, ...stored.alerts },
    notifications: { ...DEFAULT_SETTINGS.notifications, ...stored.notifications },
    calibration: { ...DEFAULT_SETTINGS.calibration, ...stored.calibration },
    analysis: { ...DEFAULT_SETTINGS.analysis, ...stored.analysis },
  }
}

export class ConfigStore {
  private readonly store: Conf<StoreSchema>
  private readonly logger: Logger

  constructor(options: ConfigStoreOptions = {}) {
    this.logger = options.logger ?? createLogger('ConfigStore')
    this.store = new Conf<StoreSchema>({
      projectName: 'posture-sentinel',
      defaults: {
        settings: DEFAULT_SETTINGS,
        customPresets: EMPTY_CUSTOM_PRESETS,
      },
      clearInvalidConfig: true,
      cwd: options.cwd,
    })
  }

  getSettings(): MonitorSettings {
    return withDefaults(this.store.get('settings'))
  }

  setSettings(settings: MonitorSettings): void {
    this.store.set('settings', settings)
  }

  /**
   * Catalog with the stored custom presets. A stored preset that no longer
   * validates is dropped with a warning and built-ins are returned.
   */
  getCatalog(): PresetCatalog {
    try {
      return PresetCatalog.fromCustom(this.store.get('customPresets'))
    } catch (error) {
      if (!(error instanceof InvalidPresetError)) throw error
      this.logger.warn(`Ignoring stored custom presets: ${error.message}`)
      return PresetCatalog.builtin()
    }
  }

  saveCatalog(catalog: PresetCatalog): void {
    this.store.set('customPresets', catalog.getCustomPresets())
  }

  getPath(): string {
    return this.store.path
  }

  clear(): void {
    this.store.clear()
  }
}
