/**
 * Shape generators
 *
 * Pure functions returning command lists; applying them is up to the caller.
 * Shapes turn clockwise (negative angles) before each side.
 */

import { turtleKeywords } from '../vocabulary/keywords'
import { NGON_SIDES_MAX, NGON_SIDES_MIN } from '../vocabulary/schemas'
import type { TurtleCommand } from '../vocabulary/schemas'
import { assertFinite } from './geometry'

const { commands } = turtleKeywords

export const clampSides = (sides: number): number =>
  Math.min(NGON_SIDES_MAX, Math.max(NGON_SIDES_MIN, Math.round(sides)))

/**
 * Side length that keeps polygons roughly the same size for a given step
 */
export const defaultSideLength = (step: number, sides: number): number =>
  (step * 36) / clampSides(sides)

/**
 * Regular polygon, 3 to 72 sides (out-of-range counts are clamped)
 */
export const ngonCommands = (
  sides: number,
  length: number,
): Array<TurtleCommand> => {
  assertFinite('sides', sides)
  assertFinite('length', length)

  const count = clampSides(sides)
  const exterior = 360 / count

  return Array.from({ length: count }, () => [
    { type: commands.turn, degrees: -exterior } as const,
    { type: commands.move, distance: length } as const,
  ]).flat()
}

/**
 * Five-pointed star
 */
export const starCommands = (size: number): Array<TurtleCommand> => {
  assertFinite('size', size)

  return Array.from({ length: 5 }, () => [
    { type: commands.move, distance: size } as const,
    { type: commands.turn, degrees: -144 } as const,
  ]).flat()
}
