import { defineResource } from 'braided'
import type { Scene } from '@turtle-trails/rendering'
import type { Palette } from '@turtle-trails/turtle'
import type { TurtleConfig } from '../../config'
import { createTurtleRegistry } from '../../turtle'

export const turtlesResource = defineResource({
  dependencies: ['config', 'scene', 'palette'],
  start: ({
    config,
    scene,
    palette,
  }: {
    config: TurtleConfig
    scene: Scene
    palette: Palette
  }) => createTurtleRegistry({ config, scene, palette }),
  halt: (turtles) => {
    turtles.deactivate()
  },
})
