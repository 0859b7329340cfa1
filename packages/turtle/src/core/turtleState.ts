/**
 * Turtle State
 *
 * Pure geometric state machine: position, heading, pen and trail.
 * No rendering dependency. Every mutation goes through the command API
 * and validates its input before touching state, so a failed call
 * leaves the turtle exactly as it was.
 *
 * Conventions:
 * - Origin at canvas center, x east, y north
 * - Heading in degrees, 0 = east, positive turns counter-clockwise
 * - `move(0)` is a no-op: no segment, nothing to redraw
 * - Any other pen-down move appends exactly one segment, even when the
 *   distance is too small to change the position
 *
 * Poses, points, segments and trails handed out are frozen.
 */

import { createAtom } from '@turtle-trails/system'
import type { Point, Pose, Segment } from '../vocabulary/schemas'
import { PEN_WIDTH_MAX, PEN_WIDTH_MIN } from '../vocabulary/schemas'
import { InvalidArgumentError } from './errors'
import { ORIGIN, advance, assertFinite, normalizeHeading, samePoint } from './geometry'
import { createPalette } from './palette'
import type { Palette } from './palette'

// ============================================================================
// Types
// ============================================================================

export type TurtleStateOptions = {
  /** Pen color of the default pose (default "red") */
  color?: string
  /** Pen width of the default pose (default 1) */
  width?: number
  /** Pen state of the default pose (default true) */
  penDown?: boolean
  /** Palette used to validate colors */
  palette?: Palette
}

export type TurtleSnapshot = Readonly<{
  pose: Pose
  trail: ReadonlyArray<Segment>
}>

export type TurtleState = {
  // State access
  getPose: () => Pose
  getTrail: () => ReadonlyArray<Segment>
  getSnapshot: () => TurtleSnapshot

  // Geometry
  move: (distance: number) => Segment | null
  moveTo: (target: Point) => Segment | null
  turn: (degrees: number) => number
  setHeading: (degrees: number) => number

  // Pen
  setPen: (down: boolean) => void
  togglePen: () => boolean
  setColor: (color: string) => void
  cycleColor: () => string
  setWidth: (width: number) => number

  // Page
  reset: () => void
  clear: () => void

  /** Put back a snapshot taken earlier with getSnapshot */
  restore: (snapshot: TurtleSnapshot) => void

  subscribe: (listener: (snapshot: TurtleSnapshot) => void) => () => void
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_PEN_COLOR = 'red'
export const DEFAULT_PEN_WIDTH = 1

export const clampWidth = (width: number): number =>
  Math.min(PEN_WIDTH_MAX, Math.max(PEN_WIDTH_MIN, Math.round(width)))

const freezePoint = (point: Point): Point => Object.freeze({ x: point.x, y: point.y })

const freezePose = (pose: Pose): Pose =>
  Object.freeze({ ...pose, position: freezePoint(pose.position) })

const freezeSnapshot = (pose: Pose, trail: ReadonlyArray<Segment>): TurtleSnapshot =>
  Object.freeze({ pose: freezePose(pose), trail: Object.freeze([...trail]) })

// ============================================================================
// Factory
// ============================================================================

export function createTurtleState(options: TurtleStateOptions = {}): TurtleState {
  const palette = options.palette ?? createPalette()

  const defaultColor = options.color ?? DEFAULT_PEN_COLOR
  if (!palette.has(defaultColor)) {
    throw new InvalidArgumentError(`Unknown color "${defaultColor}"`)
  }

  const defaultPose = freezePose({
    position: ORIGIN,
    heading: 0,
    penDown: options.penDown ?? true,
    color: defaultColor,
    width: clampWidth(assertFinite('width', options.width ?? DEFAULT_PEN_WIDTH)),
  })

  const state = createAtom<TurtleSnapshot>(freezeSnapshot(defaultPose, []))

  const setPose = (changes: Partial<Pose>) => {
    state.update((current) =>
      freezeSnapshot({ ...current.pose, ...changes }, current.trail),
    )
  }

  /**
   * Walk to `end`, appending a segment when the pen is down
   */
  const travel = (end: Point): Segment | null => {
    const { pose, trail } = state.get()
    const position = freezePoint(end)

    if (!pose.penDown) {
      setPose({ position })
      return null
    }

    const segment: Segment = Object.freeze({
      start: pose.position,
      end: position,
      color: pose.color,
      width: pose.width,
    })

    state.set(freezeSnapshot({ ...pose, position }, [...trail, segment]))

    return segment
  }

  return {
    getPose: () => state.get().pose,
    getTrail: () => state.get().trail,
    getSnapshot: () => state.get(),

    move: (distance) => {
      assertFinite('distance', distance)
      if (distance === 0) return null

      const { pose } = state.get()
      return travel(advance(pose.position, pose.heading, distance))
    },

    moveTo: (target) => {
      assertFinite('x', target.x)
      assertFinite('y', target.y)
      if (samePoint(state.get().pose.position, target)) return null
      return travel(target)
    },

    turn: (degrees) => {
      assertFinite('angle', degrees)
      const heading = normalizeHeading(state.get().pose.heading + degrees)
      setPose({ heading })
      return heading
    },

    setHeading: (degrees) => {
      assertFinite('heading', degrees)
      const heading = normalizeHeading(degrees)
      setPose({ heading })
      return heading
    },

    setPen: (down) => {
      setPose({ penDown: down })
    },

    togglePen: () => {
      const penDown = !state.get().pose.penDown
      setPose({ penDown })
      return penDown
    },

    setColor: (color) => {
      if (!palette.has(color)) {
        throw new InvalidArgumentError(`Unknown color "${color}"`)
      }
      setPose({ color })
    },

    cycleColor: () => {
      const color = palette.next(state.get().pose.color)
      setPose({ color })
      return color
    },

    setWidth: (width) => {
      const clamped = clampWidth(assertFinite('width', width))
      setPose({ width: clamped })
      return clamped
    },

    reset: () => {
      state.set(freezeSnapshot(defaultPose, []))
    },

    clear: () => {
      state.update((current) => freezeSnapshot(current.pose, []))
    },

    restore: (snapshot) => {
      state.set(freezeSnapshot(snapshot.pose, snapshot.trail))
    },

    subscribe: state.subscribe,
  }
}
