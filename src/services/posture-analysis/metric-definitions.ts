import type { Landmark, LandmarkFrame, LandmarkName } from '@/services/pose-detection/pose-types'
import { requireLandmarks } from '@/services/pose-detection/landmark-frame'
import type { MetricId, ViolationDirection } from '@/services/presets/preset-types'
import { mapMetrics } from '@/services/presets/preset-types'
import { midDepth, midpoint, toDegrees } from '@/utils/math'

export interface MetricDefinition {
  readonly id: MetricId
  readonly label: string
  readonly landmarks: readonly LandmarkName[]
  /** Deviation that counts as severity 1 */
  readonly scale: number
  readonly direction: ViolationDirection
  /**
   * Raw value from the landmarks listed above, in the same order.
   * Null when the value cannot be derived (no depth from a 2D detector).
   */
  readonly measure: (points: readonly Landmark[]) => number | null
}

const SHOULDERS: readonly LandmarkName[] = ['leftShoulder', 'rightShoulder']
const EARS: readonly LandmarkName[] = ['leftEar', 'rightEar']

// Image y grows downward, so a dropping shoulder line is positive.
function shoulderHeight([left, right]: readonly Landmark[]): number {
  return midpoint(left, right).y
}

function shoulderImbalance([left, right]: readonly Landmark[]): number {
  return Math.abs(left.y - right.y)
}

// Positive when the left ear sits lower than the right.
function earLineAngle([left, right]: readonly Landmark[]): number {
  return toDegrees(Math.atan2(left.y - right.y, Math.abs(left.x - right.x)))
}

// Smaller z is closer to the camera, so the ears moving ahead of the
// shoulders increases the value.
function neckDepth([leftEar, rightEar, leftShoulder, rightShoulder]: readonly Landmark[]): number | null {
  const ear = midDepth(leftEar, rightEar)
  const shoulder = midDepth(leftShoulder, rightShoulder)
  if (ear === null || shoulder === null) return null
  return shoulder - ear
}

function shoulderDepth([leftShoulder, rightShoulder, leftHip, rightHip]: readonly Landmark[]): number | null {
  const shoulder = midDepth(leftShoulder, rightShoulder)
  const hip = midDepth(leftHip, rightHip)
  if (shoulder === null || hip === null) return null
  return hip - shoulder
}

function faceWidth([left, right]: readonly Landmark[]): number {
  return Math.abs(left.x - right.x)
}

export const METRIC_DEFINITIONS: Readonly<Record<MetricId, MetricDefinition>> = {
  slouching: {
    id: 'slouching',
    label: 'Slouching',
    landmarks: SHOULDERS,
    scale: 0.1,
    direction: 'exceeds',
    measure: shoulderHeight,
  },
  unevenShoulders: {
    id: 'unevenShoulders',
    label: 'Uneven Shoulders',
    landmarks: SHOULDERS,
    scale: 0.1,
    direction: 'exceeds',
    measure: shoulderImbalance,
  },
  headTilt: {
    id: 'headTilt',
    label: 'Head Tilted',
    landmarks: EARS,
    scale: 20,
    direction: 'either',
    measure: earLineAngle,
  },
  neckForward: {
    id: 'neckForward',
    label: 'Neck Forward',
    landmarks: [...EARS, ...SHOULDERS],
    scale: 0.1,
    direction: 'exceeds',
    measure: neckDepth,
  },
  shouldersForward: {
    id: 'shouldersForward',
    label: 'Shoulders Forward',
    landmarks: [...SHOULDERS, 'leftHip', 'rightHip'],
    scale: 0.1,
    direction: 'exceeds',
    measure: shoulderDepth,
  },
  tooClose: {
    id: 'tooClose',
    label: 'Too Close to Screen',
    landmarks: EARS,
    scale: 0.1,
    direction: 'exceeds',
    measure: faceWidth,
  },
}

export function getMetricLabel(metric: MetricId): string {
  return METRIC_DEFINITIONS[metric].label
}

/**
 * Raw value of one metric, or null when its landmarks are missing, not
 * visible enough, or lack the depth it needs.
 */
export function measureMetric(
  metric: MetricId,
  frame: LandmarkFrame,
  minVisibility: number,
): number | null {
  const definition = METRIC_DEFINITIONS[metric]
  const points = requireLandmarks(frame, definition.landmarks, minVisibility)
  if (points === null) return null
  const value = definition.measure(points)
  return value !== null && Number.isFinite(value) ? value : null
}

export function measureAll(
  frame: LandmarkFrame,
  minVisibility: number,
): Readonly<Record<MetricId, number | null>> {
  return mapMetrics((metric) => measureMetric(metric, frame, minVisibility))
}
