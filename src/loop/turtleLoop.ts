/**
 * Turtle Loop
 *
 * The interactive loop: poll input, turn the event into turtle commands,
 * let the controller draw what changed, keep the surface's host alive.
 *
 * Built on the generic cooperative render loop. Surface loss is fatal;
 * any other handler error is reported and the loop keeps going.
 */

import registerDebug from 'debug'
import { createRenderLoop, createThrottledExecutor } from '@turtle-trails/system'
import type { LoopExit, LoopStatus } from '@turtle-trails/system'
import { isSurfaceUnavailable, turtleKeywords } from '@turtle-trails/turtle'
import type { InputEvent } from '@turtle-trails/turtle'
import type { RenderSurface, Scene } from '@turtle-trails/rendering'
import type { TurtleConfig } from '../config'
import type { InputSource } from '../input'
import type { TurtleController } from '../turtle'

const debug = registerDebug('turtle-trails:turtle-loop')

const { inputEvents } = turtleKeywords

// ============================================================================
// Types
// ============================================================================

export type TurtleLoopOptions = {
  input: InputSource
  surface: RenderSurface
  scene: Scene
  turtle: TurtleController
  config: Pick<TurtleConfig, 'step' | 'angleStep' | 'pollTimeoutMs' | 'livenessIntervalMs'>
  onError?: (error: Error) => void
  now?: () => number
}

export type TurtleLoop = {
  /** Run until Quit, stop() or surface loss */
  run: () => Promise<LoopExit>
  stop: () => void
  redrawAll: () => void
  getStatus: () => LoopStatus
  isRunning: () => boolean
}

type LoopContext = Omit<TurtleLoopOptions, 'onError' | 'now'>

// ============================================================================
// Factory
// ============================================================================

export function createTurtleLoop(options: TurtleLoopOptions): TurtleLoop {
  const liveness = createThrottledExecutor('liveness', {
    intervalMs: options.config.livenessIntervalMs,
  })

  const handleEvent = (context: LoopContext, event: InputEvent): void => {
    const { turtle, scene, config } = context

    switch (event.type) {
      case inputEvents.moveForward:
        return turtle.move(config.step)
      case inputEvents.moveBackward:
        return turtle.move(-config.step)
      case inputEvents.turnLeft:
        return turtle.turn(config.angleStep)
      case inputEvents.turnRight:
        return turtle.turn(-config.angleStep)
      case inputEvents.quarterTurnLeft:
        return turtle.turn(90)
      case inputEvents.quarterTurnRight:
        return turtle.turn(-90)
      case inputEvents.faceEast:
        return turtle.setHeading(0)

      case inputEvents.togglePen:
        turtle.togglePen()
        return
      case inputEvents.cycleColor:
        turtle.cycleColor()
        return
      case inputEvents.wider:
        turtle.setWidth(turtle.getPose().width + 1)
        return
      case inputEvents.narrower:
        turtle.setWidth(turtle.getPose().width - 1)
        return

      case inputEvents.cycleBackground:
        scene.cycleBackground()
        return
      case inputEvents.clear:
        return turtle.clear()
      case inputEvents.reset:
        return turtle.reset()
      case inputEvents.ngon:
        return turtle.ngon(event.sides)

      case inputEvents.resize:
        return scene.resize({ columns: event.columns, rows: event.rows })
      case inputEvents.quit:
        debug('Quit requested')
        return loop.stop()

      default:
        debug('Ignoring unknown event %O', event)
    }
  }

  const loop = createRenderLoop<LoopContext, InputEvent>({
    createContext: () => ({
      input: options.input,
      surface: options.surface,
      scene: options.scene,
      turtle: options.turtle,
      config: options.config,
    }),
    poll: (context, timeoutMs) => context.input.poll(timeoutMs),
    handleEvent,
    afterPoll: (context, _timestamp, deltaMs) => {
      if (liveness.shouldExecute(deltaMs)) {
        context.surface.pollLiveness()
        liveness.recordExecution()
      }
    },
    onError: options.onError,
    isFatal: isSurfaceUnavailable,
    pollTimeoutMs: options.config.pollTimeoutMs,
    now: options.now,
  })

  return {
    run: loop.start,
    stop: loop.stop,
    redrawAll: options.scene.redrawAll,
    getStatus: loop.getStatus,
    isRunning: loop.isRunning,
  }
}
