import type { MetricEvaluation, MetricEvaluations } from '@/services/posture-analysis/metric-types'
import type { MetricId } from '@/services/presets/preset-types'
import { METRIC_IDS, mapMetrics } from '@/services/presets/preset-types'
import type { AlertEvent, AlertKind } from '@/types/events'
import type { AlertTimingConfig } from '@/types/settings'
import { DEFAULT_ALERT_TIMING } from '@/types/settings'
import type { Logger } from '@/utils/logger'
import { createLogger } from '@/utils/logger'
import type { AlertState, AlertStateMachineOptions, AlertTrackerSnapshot } from './alert-types'

const DEFAULT_NOMINAL_INTERVAL_MS = 1000 / 15

const TIMING_KEYS = ['minDurationMs', 'cooldownMs', 'recoveryMs'] as const

export function assertTiming(timing: AlertTimingConfig): void {
  for (const key of TIMING_KEYS) {
    const value = timing[key]
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`${key} must be a non-negative number of milliseconds, got ${value}`)
    }
  }
}

/**
 * Debounce state for one metric. Evidence is measured in milliseconds of
 * frame time rather than frame counts, so it is independent of frame rate.
 */
export class MetricAlertTracker {
  private readonly metric: MetricId
  private state: AlertState = 'normal'
  private violationMs = 0
  private recoveryMs = 0
  private lastAlertAt: number | null = null
  private lastUpdateAt: number | null = null

  constructor(metric: MetricId) {
    this.metric = metric
  }

  update(
    evaluation: MetricEvaluation,
    now: number,
    timing: AlertTimingConfig,
    nominalIntervalMs: number,
  ): AlertEvent | null {
    if (!evaluation.enabled) {
      this.reset()
      return null
    }

    const credit = this.lastUpdateAt === null
      ? nominalIntervalMs
      : Math.max(0, now - this.lastUpdateAt)
    this.lastUpdateAt = now

    const severity = evaluation.severity ?? 0
    switch (evaluation.outcome) {
      case 'unavailable':
        return null
      case 'violation':
        return this.onViolation(credit, now, severity, timing)
      case 'ok':
        return this.onOk(credit, now, severity, timing)
    }
  }

  reset(): void {
    this.state = 'normal'
    this.violationMs = 0
    this.recoveryMs = 0
    this.lastAlertAt = null
    this.lastUpdateAt = null
  }

  /** Forget the update clock so a gap in processing is not credited. */
  resumeClock(): void {
    this.lastUpdateAt = null
  }

  getState(): AlertState {
    return this.state
  }

  snapshot(): AlertTrackerSnapshot {
    return {
      state: this.state,
      violationMs: this.violationMs,
      recoveryMs: this.recoveryMs,
      lastAlertAt: this.lastAlertAt,
      lastUpdateAt: this.lastUpdateAt,
    }
  }

  private onViolation(
    credit: number,
    now: number,
    severity: number,
    timing: AlertTimingConfig,
  ): AlertEvent | null {
    switch (this.state) {
      case 'normal':
        this.state = 'pending-bad'
        this.violationMs = credit
        break
      case 'pending-bad':
        this.violationMs += credit
        break
      case 'alerting':
      case 'cooldown':
      case 'pending-normal':
        this.recoveryMs = 0
        if (this.cooldownElapsed(now, timing)) {
          return this.fire('BAD_POSTURE', now, severity)
        }
        this.state = 'cooldown'
        return null
    }

    // A confirmed episode inside the previous alert's cooldown stays pending.
    if (this.violationMs >= timing.minDurationMs && this.cooldownElapsed(now, timing)) {
      return this.fire('BAD_POSTURE', now, severity)
    }
    return null
  }

  private cooldownElapsed(now: number, timing: AlertTimingConfig): boolean {
    return this.lastAlertAt === null || now - this.lastAlertAt >= timing.cooldownMs
  }

  private onOk(
    credit: number,
    now: number,
    severity: number,
    timing: AlertTimingConfig,
  ): AlertEvent | null {
    switch (this.state) {
      case 'normal':
        return null
      case 'pending-bad':
        this.state = 'normal'
        this.violationMs = 0
        return null
      case 'alerting':
      case 'cooldown':
        this.state = 'pending-normal'
        this.recoveryMs = credit
        break
      case 'pending-normal':
        this.recoveryMs += credit
        break
    }

    if (this.recoveryMs >= timing.recoveryMs) {
      return this.fire('BACK_TO_NORMAL', now, severity)
    }
    return null
  }

  private fire(kind: AlertKind, now: number, severity: number): AlertEvent {
    this.violationMs = 0
    this.recoveryMs = 0
    // lastAlertAt survives BACK_TO_NORMAL: the cooldown spans episodes.
    if (kind === 'BAD_POSTURE') {
      this.state = 'alerting'
      this.lastAlertAt = now
    } else {
      this.state = 'normal'
    }
    return { metric: this.metric, kind, timestamp: now, severity }
  }
}

/**
 * One MetricAlertTracker per metric. Returns the events produced by each
 * batch of evaluations in metric order.
 */
export class AlertStateMachine {
  private timing: AlertTimingConfig
  private nominalIntervalMs: number
  private readonly trackers = new Map<MetricId, MetricAlertTracker>()
  private readonly logger: Logger

  constructor(
    options: AlertStateMachineOptions = {},
    logger: Logger = createLogger('AlertStateMachine'),
  ) {
    this.timing = { ...DEFAULT_ALERT_TIMING, ...options.timing }
    assertTiming(this.timing)
    this.nominalIntervalMs = options.nominalIntervalMs ?? DEFAULT_NOMINAL_INTERVAL_MS
    this.logger = logger
    for (const metric of METRIC_IDS) {
      this.trackers.set(metric, new MetricAlertTracker(metric))
    }
  }

  process(evaluations: MetricEvaluations, now: number): readonly AlertEvent[] {
    const events: AlertEvent[] = []
    for (const metric of METRIC_IDS) {
      const previous = this.tracker(metric).getState()
      const event = this.tracker(metric).update(
        evaluations[metric],
        now,
        this.timing,
        this.nominalIntervalMs,
      )
      const current = this.tracker(metric).getState()
      if (previous !== current) {
        this.logger.debug(`${metric}: ${previous} -> ${current}`)
      }
      if (event !== null) {
        this.logger.info(`${event.kind} for ${metric} (severity ${event.severity.toFixed(2)})`)
        events.push(event)
      }
    }
    return events
  }

  reset(metric: MetricId): void {
    this.tracker(metric).reset()
  }

  resetAll(): void {
    for (const tracker of this.trackers.values()) {
      tracker.reset()
    }
  }

  resumeClock(): void {
    for (const tracker of this.trackers.values()) {
      tracker.resumeClock()
    }
  }

  getState(metric: MetricId): AlertState {
    return this.tracker(metric).getState()
  }

  getStates(): Readonly<Record<MetricId, AlertState>> {
    return mapMetrics((metric) => this.getState(metric))
  }

  getSnapshot(metric: MetricId): AlertTrackerSnapshot {
    return this.tracker(metric).snapshot()
  }

  updateTiming(partial: Partial<AlertTimingConfig>): void {
    const next = { ...this.timing, ...partial }
    assertTiming(next)
    this.timing = next
  }

  getTiming(): AlertTimingConfig {
    return this.timing
  }

  setNominalInterval(ms: number): void {
    if (!Number.isFinite(ms) || ms <= 0) {
      throw new RangeError(`nominal interval must be positive, got ${ms}`)
    }
    this.nominalIntervalMs = ms
  }

  private tracker(metric: MetricId): MetricAlertTracker {
    const existing = this.trackers.get(metric)
    if (existing !== undefined) return existing
    const created = new MetricAlertTracker(metric)
    this.trackers.set(metric, created)
    return created
  }
}
