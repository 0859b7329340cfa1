import type { Point } from '../vocabulary/schemas'
import { InvalidArgumentError } from './errors'

export const DEG_TO_RAD = Math.PI / 180

export const ORIGIN: Point = Object.freeze({ x: 0, y: 0 })

/**
 * Wrap any finite angle into [0, 360)
 */
export const normalizeHeading = (degrees: number): number =>
  ((degrees % 360) + 360) % 360

/**
 * Point reached by walking `distance` along `heading` (degrees, 0 = east)
 */
export const advance = (from: Point, heading: number, distance: number): Point => {
  const radians = heading * DEG_TO_RAD
  return {
    x: from.x + distance * Math.cos(radians),
    y: from.y + distance * Math.sin(radians),
  }
}

export const samePoint = (a: Point, b: Point): boolean =>
  a.x === b.x && a.y === b.y

export const assertFinite = (name: string, value: number): number => {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${name} must be a finite number, got ${value}`)
  }
  return value
}
