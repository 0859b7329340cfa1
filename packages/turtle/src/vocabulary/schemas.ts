/**
 * Turtle Schemas
 *
 * Zod schemas for the messages that enter the system (commands, input
 * events) and the plain geometry types they carry.
 * All type strings reference the keywords module to prevent drift.
 */

import { z } from 'zod'
import { turtleKeywords } from './keywords'

const { commands, inputEvents } = turtleKeywords

// ============================================================================
// Limits
// ============================================================================

export const PEN_WIDTH_MIN = 1
export const PEN_WIDTH_MAX = 20
export const NGON_SIDES_MIN = 3
export const NGON_SIDES_MAX = 72

// ============================================================================
// Geometry
// ============================================================================

/**
 * 2D point in world units
 * Origin at canvas center, x grows east, y grows north
 */
export type Point = Readonly<{
  x: number
  y: number
}>

/**
 * One drawn line of the trail
 */
export type Segment = Readonly<{
  start: Point
  end: Point
  color: string
  width: number
}>

/**
 * Everything about a turtle except its trail
 * Heading is in degrees, 0 = east, counter-clockwise positive
 */
export type Pose = Readonly<{
  position: Point
  heading: number
  penDown: boolean
  color: string
  width: number
}>

// ============================================================================
// Commands
// ============================================================================

export const turtleCommandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal(commands.move), distance: z.number() }),
  z.object({ type: z.literal(commands.turn), degrees: z.number() }),
  z.object({ type: z.literal(commands.setHeading), degrees: z.number() }),
  z.object({ type: z.literal(commands.moveTo), x: z.number(), y: z.number() }),
  z.object({ type: z.literal(commands.setPen), down: z.boolean() }),
  z.object({ type: z.literal(commands.togglePen) }),
  z.object({ type: z.literal(commands.setColor), color: z.string() }),
  z.object({ type: z.literal(commands.cycleColor) }),
  z.object({ type: z.literal(commands.setWidth), width: z.number() }),
  z.object({ type: z.literal(commands.reset) }),
  z.object({ type: z.literal(commands.clear) }),
])

export type TurtleCommand = z.infer<typeof turtleCommandSchema>

// ============================================================================
// Input Events
// ============================================================================

const simpleEvent = <T extends string>(type: T) =>
  z.object({ type: z.literal(type) })

/**
 * Events a key can be bound to (everything except Resize,
 * which only the surface produces)
 */
export const bindableInputEventSchema = z.discriminatedUnion('type', [
  simpleEvent(inputEvents.moveForward),
  simpleEvent(inputEvents.moveBackward),
  simpleEvent(inputEvents.turnLeft),
  simpleEvent(inputEvents.turnRight),
  simpleEvent(inputEvents.quarterTurnLeft),
  simpleEvent(inputEvents.quarterTurnRight),
  simpleEvent(inputEvents.faceEast),
  simpleEvent(inputEvents.togglePen),
  simpleEvent(inputEvents.cycleColor),
  simpleEvent(inputEvents.wider),
  simpleEvent(inputEvents.narrower),
  simpleEvent(inputEvents.cycleBackground),
  simpleEvent(inputEvents.clear),
  simpleEvent(inputEvents.reset),
  simpleEvent(inputEvents.quit),
  z.object({
    type: z.literal(inputEvents.ngon),
    sides: z.number().int().min(NGON_SIDES_MIN).max(NGON_SIDES_MAX),
  }),
])

export type BindableInputEvent = z.infer<typeof bindableInputEventSchema>

export const resizeEventSchema = z.object({
  type: z.literal(inputEvents.resize),
  columns: z.number().int().positive(),
  rows: z.number().int().positive(),
})

export type ResizeEvent = z.infer<typeof resizeEventSchema>

export const inputEventSchema = z.union([
  bindableInputEventSchema,
  resizeEventSchema,
])

export type InputEvent = z.infer<typeof inputEventSchema>
