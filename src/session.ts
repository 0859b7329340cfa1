/**
 * Turtle Session
 *
 * Library entry point. A session acquires a surface and an input source,
 * creates the main turtle, and releases everything on end().
 * Sessions are plain objects: several can coexist, nothing is global.
 *
 * @example
 * ```typescript
 * await withSession({}, async ({ turtle }) => {
 *   turtle.forward(20)
 *   turtle.left(90)
 *   turtle.ngon(5)
 * })
 * ```
 */

import registerDebug from 'debug'
import { haltSystem, startSystem } from 'braided'
import type { LoopExit } from '@turtle-trails/system'
import { SurfaceUnavailableError, isTurtleError } from '@turtle-trails/turtle'
import { createTerminalSurface } from '@turtle-trails/rendering'
import { parseConfig } from './config'
import type { TurtleConfig, TurtleConfigInput } from './config'
import { createTerminalInput } from './input'
import type { Keymap } from './input'
import { createTurtleSystemConfig } from './system'
import type { InputFactory, SurfaceFactory } from './system'
import type { CreateTurtleOptions, TurtleController } from './turtle'

const debug = registerDebug('turtle-trails:session')

// ============================================================================
// Types
// ============================================================================

export type SessionOptions = {
  config?: TurtleConfigInput
  /** Render surface to acquire (default: terminal on stdout) */
  surface?: SurfaceFactory
  /** Input source to open (default: keyboard on stdin) */
  input?: InputFactory
}

export type TurtleSession = {
  readonly config: TurtleConfig
  readonly keymap: Keymap

  /** The turtle driven by the keyboard loop */
  readonly turtle: TurtleController

  /** Add a turtle drawing on the same surface */
  createTurtle: (options?: CreateTurtleOptions) => TurtleController

  /** Run the interactive loop until Quit, stop() or surface loss */
  run: () => Promise<LoopExit>
  stop: () => void

  redrawAll: () => void
  setBackground: (color: string) => void
  cycleBackground: () => string

  isEnded: () => boolean

  /** Stop the loop and release input and surface; safe to call twice */
  end: () => Promise<void>
}

// ============================================================================
// Default capabilities
// ============================================================================

export const terminalSurfaceFactory: SurfaceFactory = (config) =>
  createTerminalSurface({
    output: process.stdout,
    size: {
      columns: config.canvas.columns ?? process.stdout.columns ?? 80,
      rows: config.canvas.rows ?? process.stdout.rows ?? 24,
    },
    scale: config.canvas.scale,
  })

export const terminalInputFactory: InputFactory = (_config, keymap) =>
  createTerminalInput({ input: process.stdin, output: process.stdout, keymap })

// ============================================================================
// Lifecycle
// ============================================================================

export async function start(options: SessionOptions = {}): Promise<TurtleSession> {
  const config = parseConfig(options.config ?? {})

  const systemConfig = createTurtleSystemConfig({
    config,
    surface: options.surface ?? terminalSurfaceFactory,
    input: options.input ?? terminalInputFactory,
  })

  const { system, errors } = await startSystem(systemConfig)

  if (errors.size > 0) {
    await haltSystem(systemConfig, system)

    const [[resource, error]] = Array.from(errors)
    if (isTurtleError(error)) throw error
    throw new SurfaceUnavailableError(
      `Could not start ${String(resource)}: ${error.message}`,
      { cause: error },
    )
  }

  const { turtles, scene, loop, input } = system
  let ending: Promise<void> | null = null

  const ensureOpen = () => {
    if (ending) throw new SurfaceUnavailableError('Session has ended')
  }

  const halt = async () => {
    loop.stop()
    await haltSystem(systemConfig, system)
    debug('Session ended')
  }

  debug('Session started')

  return {
    config,
    keymap: input.keymap,
    turtle: turtles.main,

    createTurtle: (turtleOptions) => {
      ensureOpen()
      return turtles.create(turtleOptions)
    },

    run: loop.run,
    stop: loop.stop,

    redrawAll: () => {
      ensureOpen()
      scene.redrawAll()
    },
    setBackground: (color) => {
      ensureOpen()
      scene.setBackground(color)
    },
    cycleBackground: () => {
      ensureOpen()
      return scene.cycleBackground()
    },

    isEnded: () => ending !== null,

    end: () => {
      ending ??= halt()
      return ending
    },
  }
}

/**
 * Run `fn` with a fresh session and always end it afterwards
 */
export async function withSession<T>(
  options: SessionOptions,
  fn: (session: TurtleSession) => Promise<T> | T,
): Promise<T> {
  const session = await start(options)
  try {
    return await fn(session)
  } finally {
    await session.end()
  }
}
