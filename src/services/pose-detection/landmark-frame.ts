import type { Landmark, LandmarkFrame, LandmarkName } from './pose-types'
import { LANDMARK_INDEX_BY_NAME, LANDMARK_NAMES, TOTAL_LANDMARKS } from './pose-types'

/**
 * Build a LandmarkFrame from a MediaPipe-style array of 33 pose landmarks.
 */
export function fromIndexedLandmarks(
  landmarks: readonly Landmark[],
  timestamp: number,
): LandmarkFrame {
  if (landmarks.length < TOTAL_LANDMARKS) {
    throw new RangeError(
      `Expected ${TOTAL_LANDMARKS} pose landmarks, got ${landmarks.length}`,
    )
  }

  const named: Partial<Record<LandmarkName, Landmark>> = {}
  for (const name of LANDMARK_NAMES) {
    named[name] = landmarks[LANDMARK_INDEX_BY_NAME[name]]
  }

  return { timestamp, landmarks: named }
}

export function isVisible(landmark: Landmark | undefined, minVisibility: number): boolean {
  return landmark !== undefined && landmark.visibility >= minVisibility
}

/**
 * Look up landmarks by name, in the order requested. Returns null when any of
 * them is missing or below `minVisibility`.
 */
export function requireLandmarks(
  frame: LandmarkFrame,
  names: readonly LandmarkName[],
  minVisibility: number,
): readonly Landmark[] | null {
  const found: Landmark[] = []
  for (const name of names) {
    const landmark = frame.landmarks[name]
    if (landmark === undefined || landmark.visibility < minVisibility) {
      return null
    }
    found.push(landmark)
  }
  return found
}

/**
 * Names of the requested landmarks that are missing or below `minVisibility`.
 */
export function missingLandmarks(
  frame: LandmarkFrame,
  names: readonly LandmarkName[],
  minVisibility: number,
): readonly LandmarkName[] {
  return names.filter((name) => !isVisible(frame.landmarks[name], minVisibility))
}
