/**
 * Command Application
 *
 * One entry point for every turtle command, shared by the keyboard loop
 * and the scripting API. The result says what the renderer has to do:
 * draw the new segments, or throw the picture away and replay everything.
 */

import { z } from 'zod'
import { turtleKeywords } from '../vocabulary/keywords'
import { turtleCommandSchema } from '../vocabulary/schemas'
import type { Segment, TurtleCommand } from '../vocabulary/schemas'
import { InvalidArgumentError } from './errors'
import type { TurtleState } from './turtleState'

export type CommandResult = {
  /** Segments appended by this command, in drawing order */
  segments: Array<Segment>
  /**
   * True when existing trail segments disappeared.
   * A full redraw replays the whole trail, `segments` included.
   */
  redraw: boolean
}

const { commands } = turtleKeywords

const nothing = (): CommandResult => ({ segments: [], redraw: false })

const drew = (segment: Segment | null): CommandResult => ({
  segments: segment ? [segment] : [],
  redraw: false,
})

/**
 * Apply a single command to a turtle state
 */
export const applyCommand = (
  state: TurtleState,
  command: TurtleCommand,
): CommandResult => {
  switch (command.type) {
    case commands.move:
      return drew(state.move(command.distance))

    case commands.moveTo:
      return drew(state.moveTo({ x: command.x, y: command.y }))

    case commands.turn:
      state.turn(command.degrees)
      return nothing()

    case commands.setHeading:
      state.setHeading(command.degrees)
      return nothing()

    case commands.setPen:
      state.setPen(command.down)
      return nothing()

    case commands.togglePen:
      state.togglePen()
      return nothing()

    case commands.setColor:
      state.setColor(command.color)
      return nothing()

    case commands.cycleColor:
      state.cycleColor()
      return nothing()

    case commands.setWidth:
      state.setWidth(command.width)
      return nothing()

    case commands.reset:
      state.reset()
      return { segments: [], redraw: true }

    case commands.clear:
      state.clear()
      return { segments: [], redraw: true }

    default: {
      const unknown: never = command
      throw new InvalidArgumentError(`Unknown command ${JSON.stringify(unknown)}`)
    }
  }
}

/**
 * Apply commands in order and merge their results.
 * All or nothing: when a command fails, the state goes back to where it was
 * before the first one and the error is rethrown.
 */
export const applyCommands = (
  state: TurtleState,
  list: ReadonlyArray<TurtleCommand>,
): CommandResult => {
  const before = state.getSnapshot()
  const result: CommandResult = { segments: [], redraw: false }

  try {
    for (const command of list) {
      const step = applyCommand(state, command)
      result.segments.push(...step.segments)
      result.redraw = result.redraw || step.redraw
    }
  } catch (error) {
    state.restore(before)
    throw error
  }

  return result
}

const commandListSchema = z.array(turtleCommandSchema)

/**
 * Validate commands coming from outside (scripts, JSON).
 * Accepts one command or a list; always returns a list.
 */
export const parseCommands = (input: unknown): Array<TurtleCommand> => {
  const result = commandListSchema.safeParse(Array.isArray(input) ? input : [input])

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new InvalidArgumentError(`Invalid command: ${issues}`, {
      cause: result.error,
    })
  }

  return result.data
}
