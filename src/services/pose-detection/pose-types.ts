/** Length of a full MediaPipe pose landmark array. */
export const TOTAL_LANDMARKS = 33

/**
 * Keypoints the posture metrics are derived from.
 */
export const LANDMARK_NAMES = [
  'nose',
  'leftEye',
  'rightEye',
  'leftEar',
  'rightEar',
  'leftShoulder',
  'rightShoulder',
  'leftElbow',
  'rightElbow',
  'leftHip',
  'rightHip',
] as const

export type LandmarkName = typeof LANDMARK_NAMES[number]

// Positions in the MediaPipe pose landmark array.
export const LANDMARK_INDEX_BY_NAME: Readonly<Record<LandmarkName, number>> = {
  nose: 0,
  leftEye: 2,
  rightEye: 5,
  leftEar: 7,
  rightEar: 8,
  leftShoulder: 11,
  rightShoulder: 12,
  leftElbow: 13,
  rightElbow: 14,
  leftHip: 23,
  rightHip: 24,
}

/**
 * A keypoint in image-relative coordinates: x and y in [0, 1], z an optional
 * relative depth where smaller values are closer to the camera.
 */
export interface Landmark {
  readonly x: number
  readonly y: number
  readonly z?: number
  readonly visibility: number
}

export interface LandmarkFrame {
  /** Capture time in milliseconds */
  readonly timestamp: number
  readonly landmarks: Readonly<Partial<Record<LandmarkName, Landmark>>>
}

export type ModelComplexity = 0 | 1 | 2

export interface DetectorOptions {
  readonly modelComplexity: ModelComplexity
  readonly faceLandmarkCount: number
}

/**
 * Boundary to the external landmark detector. `TImage` is whatever the capture
 * layer hands over (a decoded frame buffer, a video element, ...).
 */
export interface LandmarkDetector<TImage> {
  /** Apply new model settings; called before the next detect(). */
  configure(options: DetectorOptions): void | Promise<void>

  /** Run detection on one frame; null when no person was found. */
  detect(image: TImage, timestamp: number): Promise<LandmarkFrame | null>
}

// Ears and shoulders: without them no posture metric can be computed.
export const CORE_LANDMARKS: readonly LandmarkName[] = [
  'leftEar',
  'rightEar',
  'leftShoulder',
  'rightShoulder',
]
