import { describe, it, expect } from 'vitest'
import { mean, median, stdDev } from '@/utils/statistics'

describe('mean', () => {
  it('should average the values', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5)
  })

  it('should throw on an empty sample', () => {
    expect(() => mean([])).toThrow(RangeError)
  })
})

describe('stdDev', () => {
  it('should compute the population standard deviation', () => {
    // mean 5, squared diffs sum to 32 over 8 values
    expect(stdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2)
  })

  it('should be 0 for a constant sample', () => {
    expect(stdDev([3, 3, 3])).toBe(0)
  })

  it('should accept a precomputed mean', () => {
    expect(stdDev([1, 3], 2)).toBe(1)
  })
})

describe('median', () => {
  it('should take the middle value of an odd sample', () => {
    expect(median([9, 1, 5])).toBe(5)
  })

  it('should average the two middle values of an even sample', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5)
  })

  it('should not reorder the input', () => {
    const values = [3, 1, 2]
    median(values)
    expect(values).toEqual([3, 1, 2])
  })

  it('should throw on an empty sample', () => {
    expect(() => median([])).toThrow(RangeError)
  })
})
