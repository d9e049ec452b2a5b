import type { LandmarkFrame } from '@/services/pose-detection/pose-types'
import type { CalibrationBaseline } from '@/services/calibration/calibration-types'
import type { MetricConfigs, MetricId } from '@/services/presets/preset-types'
import { METRIC_IDS } from '@/services/presets/preset-types'
import { OutlierFilter, RollingAverage } from '@/utils/smoothing'
import type { Logger } from '@/utils/logger'
import { createLogger } from '@/utils/logger'
import { METRIC_DEFINITIONS, measureMetric } from './metric-definitions'
import type { MetricReading, MetricReadings } from './metric-types'

export interface MetricEngineOptions {
  readonly smoothingWindow: number
  readonly minVisibility: number
  readonly historySize: number
  /** 0 disables outlier rejection */
  readonly outlierStdDeviations: number
  /**
   * Per-metric deviation below which the value is read as zero, before
   * outlier rejection. Replaces DEFAULT_DEAD_ZONES when given.
   */
  readonly deadZones?: Readonly<Partial<Record<MetricId, number>>>
}

// Depth from a single camera jitters by a few ten-thousandths.
export const DEFAULT_DEAD_ZONES: Readonly<Partial<Record<MetricId, number>>> = {
  neckForward: 0.0006,
  shouldersForward: 0.0006,
}

interface MetricFilters {
  readonly outlier: OutlierFilter
  readonly average: RollingAverage
}

/**
 * Turns landmark frames into per-metric readings relative to a baseline.
 * Filter state is kept per metric and only advances on available readings.
 */
export class MetricEngine {
  private options: MetricEngineOptions
  private readonly filters = new Map<MetricId, MetricFilters>()
  private readonly logger: Logger

  constructor(options: MetricEngineOptions, logger: Logger = createLogger('MetricEngine')) {
    assertEngineOptions(options)
    this.options = options
    this.logger = logger
  }

  compute(
    frame: LandmarkFrame,
    baseline: CalibrationBaseline | null,
    metrics: MetricConfigs,
  ): MetricReadings {
    const readings: Partial<Record<MetricId, MetricReading>> = {}

    for (const metric of METRIC_IDS) {
      if (!metrics[metric].enabled) continue
      readings[metric] = this.computeMetric(metric, frame, baseline)
    }

    this.logger.debug(`frame ${frame.timestamp}: ${describe(readings)}`)
    return readings
  }

  updateOptions(options: Partial<MetricEngineOptions>): void {
    const next = { ...this.options, ...options }
    assertEngineOptions(next)
    const filtersChanged =
      next.smoothingWindow !== this.options.smoothingWindow ||
      next.historySize !== this.options.historySize ||
      next.outlierStdDeviations !== this.options.outlierStdDeviations

    if (filtersChanged) {
      this.filters.clear()
    }
    this.options = next
  }

  getOptions(): MetricEngineOptions {
    return this.options
  }

  reset(metric?: MetricId): void {
    if (metric === undefined) {
      this.filters.clear()
    } else {
      this.filters.delete(metric)
    }
  }

  private computeMetric(
    metric: MetricId,
    frame: LandmarkFrame,
    baseline: CalibrationBaseline | null,
  ): MetricReading {
    const reference = baseline?.references[metric]
    if (reference === undefined) {
      return { metric, status: 'unavailable', reason: 'not-calibrated' }
    }

    const value = measureMetric(metric, frame, this.options.minVisibility)
    if (value === null) {
      return { metric, status: 'unavailable', reason: 'landmarks-missing' }
    }

    const filters = this.getFilters(metric)
    const raw = value - reference
    const deadZone = (this.options.deadZones ?? DEFAULT_DEAD_ZONES)[metric] ?? 0
    const filtered = filters.outlier.update(Math.abs(raw) < deadZone ? 0 : raw)
    const deviation = filters.average.update(filtered)

    return {
      metric,
      status: 'available',
      value,
      deviation,
      severity: deviation / METRIC_DEFINITIONS[metric].scale,
    }
  }

  private getFilters(metric: MetricId): MetricFilters {
    const existing = this.filters.get(metric)
    if (existing !== undefined) return existing
    const created = createFilters(this.options)
    this.filters.set(metric, created)
    return created
  }
}

/**
 * Throws RangeError for options the engine cannot run with. The filter
 * constructors own the window and history checks, so one set is built and
 * discarded here.
 */
export function assertEngineOptions(options: MetricEngineOptions): void {
  createFilters(options)
  if (!(options.minVisibility >= 0 && options.minVisibility <= 1)) {
    throw new RangeError(`minVisibility must be within [0, 1], got ${options.minVisibility}`)
  }
  for (const metric of METRIC_IDS) {
    const zone = options.deadZones?.[metric]
    if (zone !== undefined && !(Number.isFinite(zone) && zone >= 0)) {
      throw new RangeError(`dead zone for ${metric} must be a non-negative number, got ${zone}`)
    }
  }
}

function createFilters(options: MetricEngineOptions): MetricFilters {
  return {
    outlier: new OutlierFilter(options.historySize, options.outlierStdDeviations),
    average: new RollingAverage(options.smoothingWindow),
  }
}

function describe(readings: Partial<Record<MetricId, MetricReading>>): string {
  return Object.values(readings)
    .filter((r): r is MetricReading => r !== undefined)
    .map((r) =>
      r.status === 'available'
        ? `${r.metric}=${r.severity.toFixed(2)}`
        : `${r.metric}:${r.reason}`,
    )
    .join(' ')
}
