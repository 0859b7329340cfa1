/**
 * Turtle Controller
 *
 * The scripting face of a turtle: a TurtleState bound to the scene.
 * Every call applies one command (or one shape) and immediately renders
 * what changed, so library users see the same incremental drawing the
 * keyboard loop produces.
 *
 * A call that fails leaves the turtle as it was: the surface is checked
 * before anything moves, and a failing command or draw rolls the state back.
 */

import {
  SurfaceUnavailableError,
  applyCommands,
  defaultSideLength,
  ngonCommands,
  parseCommands,
  starCommands,
  turtleKeywords,
} from '@turtle-trails/turtle'
import type {
  CommandResult,
  Pose,
  Segment,
  TurtleCommand,
  TurtleState,
} from '@turtle-trails/turtle'
import type { Scene } from '@turtle-trails/rendering'

const { commands } = turtleKeywords

export type TurtleControllerOptions = {
  id: string
  state: TurtleState
  scene: Scene
  /** Default distance of forward()/back() */
  step: number
  /** Default angle of left()/right() */
  angleStep: number
  /** False once the owning session has ended */
  isActive: () => boolean
}

export type TurtleController = {
  readonly id: string

  // Movement
  move: (distance: number) => void
  forward: (distance?: number) => void
  back: (distance?: number) => void
  moveTo: (x: number, y: number) => void

  // Heading
  turn: (degrees: number) => void
  left: (degrees?: number) => void
  right: (degrees?: number) => void
  setHeading: (degrees: number) => void

  // Pen
  penUp: () => void
  penDown: () => void
  togglePen: () => boolean
  setColor: (color: string) => void
  cycleColor: () => string
  setWidth: (width: number) => number

  // Page
  reset: () => void
  clear: () => void

  // Shapes
  ngon: (sides?: number, length?: number) => void
  star: (size?: number) => void

  /**
   * Apply one command or a list of commands as one drawing step.
   * Input is validated first; anything that is not a command is an
   * InvalidArgument and nothing is applied.
   */
  execute: (commands: unknown) => CommandResult

  getPose: () => Pose
  getTrail: () => ReadonlyArray<Segment>
}

export function createTurtle(options: TurtleControllerOptions): TurtleController {
  const { id, state, scene, step, angleStep, isActive } = options

  const ensureActive = () => {
    if (!isActive()) {
      throw new SurfaceUnavailableError(`Turtle ${id} belongs to a session that has ended`)
    }
  }

  const run = (list: ReadonlyArray<TurtleCommand>): CommandResult => {
    ensureActive()
    scene.ensureAvailable()

    const before = state.getSnapshot()
    const result = applyCommands(state, list)

    try {
      scene.commit(id, result)
    } catch (error) {
      state.restore(before)
      throw error
    }

    return result
  }

  const execute = (command: TurtleCommand) => {
    run([command])
  }

  const turn = (degrees: number) => {
    execute({ type: commands.turn, degrees })
  }

  return {
    id,

    move: (distance) => {
      execute({ type: commands.move, distance })
    },
    forward: (distance = step) => {
      execute({ type: commands.move, distance })
    },
    back: (distance = step) => {
      execute({ type: commands.move, distance: -distance })
    },
    moveTo: (x, y) => {
      execute({ type: commands.moveTo, x, y })
    },

    turn,
    left: (degrees = angleStep) => turn(degrees),
    right: (degrees = angleStep) => turn(-degrees),
    setHeading: (degrees) => {
      execute({ type: commands.setHeading, degrees })
    },

    penUp: () => {
      execute({ type: commands.setPen, down: false })
    },
    penDown: () => {
      execute({ type: commands.setPen, down: true })
    },
    togglePen: () => {
      execute({ type: commands.togglePen })
      return state.getPose().penDown
    },
    setColor: (color) => {
      execute({ type: commands.setColor, color })
    },
    cycleColor: () => {
      execute({ type: commands.cycleColor })
      return state.getPose().color
    },
    setWidth: (width) => {
      execute({ type: commands.setWidth, width })
      return state.getPose().width
    },

    reset: () => {
      execute({ type: commands.reset })
    },
    clear: () => {
      execute({ type: commands.clear })
    },

    ngon: (sides = 3, length) => {
      run(ngonCommands(sides, length ?? defaultSideLength(step, sides)))
    },
    star: (size = step * 10) => {
      run(starCommands(size))
    },

    execute: (input) => run(parseCommands(input)),

    getPose: state.getPose,
    getTrail: state.getTrail,
  }
}
