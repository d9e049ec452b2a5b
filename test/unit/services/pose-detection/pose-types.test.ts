import { describe, it, expect } from 'vitest'
import {
  CORE_LANDMARKS,
  LANDMARK_INDEX_BY_NAME,
  LANDMARK_NAMES,
  TOTAL_LANDMARKS,
} from '@/services/pose-detection/pose-types'

describe('pose-types', () => {
  it('gives every landmark its own index', () => {
    const indices = LANDMARK_NAMES.map((name) => LANDMARK_INDEX_BY_NAME[name])
    expect(new Set(indices).size).toBe(LANDMARK_NAMES.length)
  })

  it('maps every landmark name to an index', () => {
    for (const name of LANDMARK_NAMES) {
      expect(LANDMARK_INDEX_BY_NAME[name]).toBeGreaterThanOrEqual(0)
      expect(LANDMARK_INDEX_BY_NAME[name]).toBeLessThan(TOTAL_LANDMARKS)
    }
  })

  it('maps ears and shoulders to the MediaPipe indices', () => {
    expect(LANDMARK_INDEX_BY_NAME.leftEar).toBe(7)
    expect(LANDMARK_INDEX_BY_NAME.rightEar).toBe(8)
    expect(LANDMARK_INDEX_BY_NAME.leftShoulder).toBe(11)
    expect(LANDMARK_INDEX_BY_NAME.rightShoulder).toBe(12)
  })

  it('requires ears and shoulders for calibration', () => {
    expect(CORE_LANDMARKS).toEqual(['leftEar', 'rightEar', 'leftShoulder', 'rightShoulder'])
  })
})
