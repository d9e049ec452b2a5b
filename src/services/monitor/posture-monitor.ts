import type { CalibrationBaseline, CalibrationProgress, CalibrationResult } from '@/services/calibration/calibration-types'
import { Calibrator, assertCalibrationConfig } from '@/services/calibration/calibrator'
import type { DetectorOptions, LandmarkDetector, LandmarkFrame } from '@/services/pose-detection/pose-types'
import { MetricEngine, assertEngineOptions } from '@/services/posture-analysis/metric-engine'
import { evaluateThresholds } from '@/services/posture-analysis/threshold-evaluator'
import { PresetResolver } from '@/services/presets/preset-resolver'
import type { ConfigOverrides, EffectiveConfig, MetricId, PresetSelection } from '@/services/presets/preset-types'
import { METRIC_IDS } from '@/services/presets/preset-types'
import { AlertStateMachine, assertTiming } from '@/services/reminder/alert-state-machine'
import type { AlertState } from '@/services/reminder/alert-types'
import type { NotificationContent } from '@/services/reminder/notification-formatter'
import { formatNotification } from '@/services/reminder/notification-formatter'
import { FrameScheduler } from '@/services/scheduling/frame-scheduler'
import type { FrameSchedulerStats } from '@/services/scheduling/frame-scheduler'
import type { AlertEvent, AlertListener } from '@/types/events'
import type { MonitorSettings } from '@/types/settings'
import {
  DEFAULT_ALERT_TIMING,
  DEFAULT_CALIBRATION_CONFIG,
  DEFAULT_SETTINGS,
} from '@/types/settings'
import type { Logger } from '@/utils/logger'
import { createLogger } from '@/utils/logger'
import type { FrameOutcome, MonitorPhase, PostureMonitorOptions } from './monitor-types'

function sameDetectorOptions(a: DetectorOptions | null, b: DetectorOptions): boolean {
  return a !== null &&
    a.modelComplexity === b.modelComplexity &&
    a.faceLandmarkCount === b.faceLandmarkCount
}

/**
 * Owns the per-frame pipeline: scheduler, detector, metric engine,
 * threshold evaluation and alert state. Calibration and monitoring are
 * exclusive phases of the same monitor.
 *
 * Configuration and baseline are immutable snapshots replaced by reference,
 * so a frame always sees either the old or the new value in full.
 */
export class PostureMonitor {
  private settings: MonitorSettings
  private config: EffectiveConfig
  private phase: MonitorPhase = 'stopped'
  private phaseAfterCalibration: Exclude<MonitorPhase, 'calibrating'> = 'stopped'
  private readonly resolver: PresetResolver
  private readonly calibrator: Calibrator
  private readonly engine: MetricEngine
  private readonly alerts: AlertStateMachine
  private readonly scheduler: FrameScheduler
  private readonly listeners = new Set<AlertListener>()
  private readonly logger: Logger
  private readonly clock: () => number
  private appliedDetectorOptions: DetectorOptions | null = null
  private lastFrameCost: number | undefined = undefined
  private busy = false

  constructor(options: PostureMonitorOptions = {}) {
    this.settings = options.settings ?? DEFAULT_SETTINGS
    this.resolver = options.resolver ?? new PresetResolver()
    this.clock = options.clock ?? (() => performance.now())

    const debug = this.settings.debugMode
    const loggerFor = (scope: string): Logger => options.logger ?? createLogger(scope, { debug })
    this.logger = loggerFor('PostureMonitor')

    this.config = this.resolver.resolve(this.settings.presets, this.settings.overrides)
    const { performance: perf } = this.config

    this.calibrator = new Calibrator(
      this.settings.calibration,
      { onBaselineCommitted: (baseline) => this.onBaselineCommitted(baseline) },
      loggerFor('Calibrator'),
    )
    this.engine = new MetricEngine(
      {
        smoothingWindow: this.settings.analysis.smoothingWindow,
        minVisibility: this.settings.analysis.minVisibility,
        historySize: perf.historySize,
        outlierStdDeviations: perf.outlierStdDeviations,
      },
      loggerFor('MetricEngine'),
    )
    this.alerts = new AlertStateMachine(
      { timing: this.settings.alerts, nominalIntervalMs: 1000 / perf.targetFps },
      loggerFor('AlertStateMachine'),
    )
    this.scheduler = new FrameScheduler(perf, {}, loggerFor('FrameScheduler'))
  }

  start(): void {
    if (this.phase === 'calibrating') {
      this.phaseAfterCalibration = 'monitoring'
      return
    }
    if (this.phase === 'monitoring') return

    this.phase = 'monitoring'
    this.scheduler.reset()
    this.alerts.resumeClock()
    this.lastFrameCost = undefined
    this.logger.info('Monitoring started')
  }

  /** Halts processing. Baseline and configuration are kept for the next start. */
  stop(): void {
    if (this.phase === 'calibrating') {
      this.calibrator.cancel()
    }
    if (this.phase !== 'stopped') {
      this.logger.info('Monitoring stopped')
    }
    this.phase = 'stopped'
    this.phaseAfterCalibration = 'stopped'
  }

  startCalibration(now: number): void {
    if (this.phase !== 'calibrating') {
      this.phaseAfterCalibration = this.phase
    }
    this.calibrator.start(now)
    this.phase = 'calibrating'
  }

  /**
   * Throws CalibrationNotReadyError, staying in the calibrating phase, when
   * the window is not filled yet.
   */
  finishCalibration(now: number): CalibrationResult {
    const result = this.calibrator.finish(now)
    this.endCalibration()
    return result
  }

  cancelCalibration(): void {
    this.calibrator.cancel()
    if (this.phase === 'calibrating') {
      this.endCalibration()
    }
  }

  /**
   * Resolve and activate a preset selection. On InvalidPresetError the
   * previous configuration stays active.
   */
  applyConfig(selection: PresetSelection, overrides: ConfigOverrides = {}): EffectiveConfig {
    const next = this.resolver.resolve(selection, overrides)
    this.commitConfig(next, selection, overrides)
    return next
  }

  /**
   * Apply a full settings snapshot, such as one loaded from the config store.
   * Every section is checked before any is applied, so a rejected snapshot
   * leaves the monitor unchanged.
   */
  applySettings(settings: MonitorSettings): void {
    const next = this.resolver.resolve(settings.presets, settings.overrides)
    const timing = { ...DEFAULT_ALERT_TIMING, ...settings.alerts }
    assertTiming(timing)
    const engineOptions = {
      ...this.engine.getOptions(),
      ...settings.analysis,
      historySize: next.performance.historySize,
      outlierStdDeviations: next.performance.outlierStdDeviations,
    }
    assertEngineOptions(engineOptions)
    const calibration = { ...DEFAULT_CALIBRATION_CONFIG, ...settings.calibration }
    assertCalibrationConfig(calibration)

    this.commitConfig(next, settings.presets, settings.overrides)
    this.alerts.updateTiming(timing)
    this.engine.updateOptions(engineOptions)
    this.calibrator.updateConfig(calibration)
    this.settings = settings
  }

  processFrame(frame: LandmarkFrame): FrameOutcome {
    switch (this.phase) {
      case 'stopped':
        return { kind: 'skipped', reason: 'stopped' }
      case 'calibrating':
        return { kind: 'calibrating', progress: this.calibrator.ingest(frame) }
      case 'monitoring':
        return this.monitorFrame(frame)
    }
  }

  /**
   * Scheduler, detector and pipeline for one captured image. A frame that
   * arrives while the previous one is still being detected is dropped.
   * When the detector finds no pose, every metric is unavailable for that
   * frame.
   */
  async handleCapturedFrame<TImage>(
    image: TImage,
    now: number,
    detector: LandmarkDetector<TImage>,
  ): Promise<FrameOutcome> {
    if (this.phase === 'stopped') {
      return { kind: 'skipped', reason: 'stopped' }
    }
    if (this.busy) {
      return { kind: 'skipped', reason: 'busy' }
    }
    if (!this.scheduler.shouldProcess(now, this.lastFrameCost)) {
      return { kind: 'skipped', reason: 'scheduler' }
    }

    this.busy = true
    const startedAt = this.clock()
    try {
      const options = this.scheduler.getDetectorOptions()
      if (!sameDetectorOptions(this.appliedDetectorOptions, options)) {
        await detector.configure(options)
        this.appliedDetectorOptions = options
        this.logger.debug(
          `Detector configured: complexity=${options.modelComplexity} landmarks=${options.faceLandmarkCount}`,
        )
      }

      const frame = await detector.detect(image, now)
      return this.processFrame(frame ?? { timestamp: now, landmarks: {} })
    } finally {
      this.lastFrameCost = this.clock() - startedAt
      this.busy = false
    }
  }

  subscribe(listener: AlertListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Subscribe to formatted notifications. Events muted by the current
   * notification settings are not delivered.
   */
  subscribeNotifications(listener: (content: NotificationContent) => void): () => void {
    return this.subscribe((event) => {
      const content = formatNotification(event, this.settings.notifications)
      if (content !== null) {
        listener(content)
      }
    })
  }

  getPhase(): MonitorPhase {
    return this.phase
  }

  getConfig(): EffectiveConfig {
    return this.config
  }

  getSettings(): MonitorSettings {
    return this.settings
  }

  getBaseline(): CalibrationBaseline | null {
    return this.calibrator.getBaseline()
  }

  getCalibrationProgress(now?: number): CalibrationProgress {
    return this.calibrator.getProgress(now)
  }

  getAlertState(metric: MetricId): AlertState {
    return this.alerts.getState(metric)
  }

  getAlertStates(): Readonly<Record<MetricId, AlertState>> {
    return this.alerts.getStates()
  }

  getSchedulerStats(): FrameSchedulerStats {
    return this.scheduler.getStats()
  }

  private commitConfig(
    next: EffectiveConfig,
    selection: PresetSelection,
    overrides: ConfigOverrides,
  ): void {
    const previous = this.config

    this.engine.updateOptions({
      historySize: next.performance.historySize,
      outlierStdDeviations: next.performance.outlierStdDeviations,
    })
    for (const metric of METRIC_IDS) {
      if (previous.metrics[metric].enabled && !next.metrics[metric].enabled) {
        this.alerts.reset(metric)
        this.engine.reset(metric)
      }
    }
    this.scheduler.updatePerformance(next.performance)
    this.alerts.setNominalInterval(1000 / next.performance.targetFps)

    this.config = next
    this.settings = { ...this.settings, presets: selection, overrides }
    this.logger.info(
      `Config applied: metrics=${selection.metrics} performance=${selection.performance}`,
    )
  }

  private monitorFrame(frame: LandmarkFrame): FrameOutcome {
    const readings = this.engine.compute(frame, this.calibrator.getBaseline(), this.config.metrics)
    const evaluations = evaluateThresholds(readings, this.config.metrics)
    const events = this.alerts.process(evaluations, frame.timestamp)
    for (const event of events) {
      this.deliver(event)
    }
    return { kind: 'monitored', readings, evaluations, events }
  }

  private deliver(event: AlertEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (error) {
        this.logger.warn(`Alert listener failed for ${event.kind} ${event.metric}`, error)
      }
    }
  }

  private onBaselineCommitted(baseline: CalibrationBaseline): void {
    this.alerts.resetAll()
    this.engine.reset()
    this.logger.info(`New baseline active (quality ${baseline.quality.toFixed(2)})`)
  }

  private endCalibration(): void {
    this.phase = this.phaseAfterCalibration
    if (this.phase === 'monitoring') {
      this.scheduler.reset()
      this.alerts.resumeClock()
    }
  }
}
