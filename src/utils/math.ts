export interface Point2D {
  readonly x: number
  readonly y: number
}

export function toDegrees(radians: number): number {
  return radians * (180 / Math.PI)
}

export function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180)
}

export function midpoint(p1: Point2D, p2: Point2D): Point2D {
  return {
    x: (p1.x + p2.x) / 2,
    y: (p1.y + p2.y) / 2,
  }
}

/**
 * Mean depth of two points, or null when either lacks a z coordinate
 * (2D detector output).
 */
export function midDepth(
  p1: { readonly z?: number },
  p2: { readonly z?: number },
): number | null {
  if (p1.z === undefined || p2.z === undefined) {
    return null
  }
  return (p1.z + p2.z) / 2
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}
