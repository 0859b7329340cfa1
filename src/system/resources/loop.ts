/**
 * Loop Resource
 *
 * The keyboard loop of the main turtle. Starting the resource only builds
 * the loop; `run()` drives it. Halting stops it, and the loop exits as
 * soon as its current poll returns.
 */

import registerDebug from 'debug'
import { defineResource } from 'braided'
import type { RenderSurface, Scene } from '@turtle-trails/rendering'
import type { TurtleConfig } from '../../config'
import type { InputSource, Keymap } from '../../input'
import { createTurtleLoop } from '../../loop'
import type { TurtleRegistry } from '../../turtle'

const debug = registerDebug('turtle-trails:turtle-loop')

export const loopResource = defineResource({
  dependencies: ['config', 'input', 'surface', 'scene', 'turtles'],
  start: ({
    config,
    input,
    surface,
    scene,
    turtles,
  }: {
    config: TurtleConfig
    input: { source: InputSource; keymap: Keymap }
    surface: RenderSurface
    scene: Scene
    turtles: TurtleRegistry
  }) =>
    createTurtleLoop({
      input: input.source,
      surface,
      scene,
      turtle: turtles.main,
      config,
      onError: (error) => debug('Loop error: %s', error.message),
    }),
  halt: (loop) => {
    loop.stop()
  },
})
