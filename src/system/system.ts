/**
 * Turtle System Configuration
 *
 * The braided resource graph of one session.
 * Resources are started in dependency order and halted in reverse order.
 *
 * Dependency Graph:
 *
 *   config (no deps) - parsed configuration
 *       ↓
 *   palette ← config
 *   surface ← config - render surface (terminal, recording, ...)
 *   input ← config - keymap + input source (keyboard, script, ...)
 *       ↓
 *   scene ← config, surface, palette
 *       ↓
 *   turtles ← config, scene, palette - main turtle + extra turtles
 *       ↓
 *   loop ← config, input, surface, scene, turtles
 *
 * Halting stops the loop first and releases the surface last, so nothing
 * draws on a surface that is already gone.
 */

import type { StartedSystem } from 'braided'
import type { TurtleConfig } from '../config'
import { createConfigResource } from './resources/config'
import { createInputResource } from './resources/input'
import type { InputFactory } from './resources/input'
import { loopResource } from './resources/loop'
import { paletteResource } from './resources/palette'
import { sceneResource } from './resources/scene'
import { createSurfaceResource } from './resources/surface'
import type { SurfaceFactory } from './resources/surface'
import { turtlesResource } from './resources/turtles'

export type TurtleSystemOptions = {
  config: TurtleConfig
  surface: SurfaceFactory
  input: InputFactory
}

export const createTurtleSystemConfig = (options: TurtleSystemOptions) => {
  return {
    config: createConfigResource(options.config),
    palette: paletteResource,
    surface: createSurfaceResource(options.surface),
    input: createInputResource(options.input),
    scene: sceneResource,
    turtles: turtlesResource,
    loop: loopResource,
  }
}

export type TurtleSystemConfig = ReturnType<typeof createTurtleSystemConfig>

export type TurtleSystem = StartedSystem<TurtleSystemConfig>

export type { InputFactory, SurfaceFactory }
