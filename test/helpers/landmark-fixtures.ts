import type { Landmark, LandmarkFrame, LandmarkName } from '@/services/pose-detection/pose-types'

export interface PoseOptions {
  readonly leftShoulderY?: number
  readonly rightShoulderY?: number
  readonly leftEarY?: number
  readonly rightEarY?: number
  /** Horizontal distance between the ears, centred on x = 0.5 */
  readonly earSpan?: number
  /** Depth per body part; omitted means a 2D detector */
  readonly depth?: { readonly ears: number; readonly shoulders: number; readonly hips: number }
  readonly visibility?: number
  /** Landmarks to leave out of the frame */
  readonly omit?: readonly LandmarkName[]
}

function point(x: number, y: number, visibility: number, z?: number): Landmark {
  return z === undefined ? { x, y, visibility } : { x, y, z, visibility }
}

/**
 * Upright seated pose. With the defaults: shoulder midpoint y = 0.5, level
 * shoulders and ears, ear span 0.1, no depth.
 */
export function createFrame(timestamp: number, options: PoseOptions = {}): LandmarkFrame {
  const visibility = options.visibility ?? 0.99
  const earSpan = options.earSpan ?? 0.1
  const { depth } = options

  const landmarks: Partial<Record<LandmarkName, Landmark>> = {
    nose: point(0.5, 0.28, visibility),
    leftEar: point(0.5 + earSpan / 2, options.leftEarY ?? 0.3, visibility, depth?.ears),
    rightEar: point(0.5 - earSpan / 2, options.rightEarY ?? 0.3, visibility, depth?.ears),
    leftShoulder: point(0.65, options.leftShoulderY ?? 0.5, visibility, depth?.shoulders),
    rightShoulder: point(0.35, options.rightShoulderY ?? 0.5, visibility, depth?.shoulders),
    leftHip: point(0.6, 0.85, visibility, depth?.hips),
    rightHip: point(0.4, 0.85, visibility, depth?.hips),
  }
  for (const name of options.omit ?? []) {
    delete landmarks[name]
  }
  return { timestamp, landmarks }
}

/** Frame with both shoulders at the same height. */
export function shouldersAt(timestamp: number, y: number, options: PoseOptions = {}): LandmarkFrame {
  return createFrame(timestamp, { ...options, leftShoulderY: y, rightShoulderY: y })
}
