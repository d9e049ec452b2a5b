import { getMetricLabel } from '@/services/posture-analysis/metric-definitions'
import type { AlertEvent, AlertKind } from '@/types/events'
import type { NotificationSettings } from '@/types/settings'

export interface NotificationContent {
  readonly title: string
  readonly body: string
  readonly kind: AlertKind
}

export function formatNotification(
  event: AlertEvent,
  settings: NotificationSettings,
): NotificationContent | null {
  if (!settings.enabled) return null

  if (event.kind === 'BACK_TO_NORMAL') {
    if (!settings.backToNormalEnabled) return null
    return { title: settings.title, body: settings.backToNormalMessage, kind: event.kind }
  }

  return {
    title: settings.title,
    body: settings.messageTemplate.replaceAll('{issue}', getMetricLabel(event.metric)),
    kind: event.kind,
  }
}
