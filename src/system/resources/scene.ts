import { defineResource } from 'braided'
import { createScene } from '@turtle-trails/rendering'
import type { RenderSurface } from '@turtle-trails/rendering'
import type { Palette } from '@turtle-trails/turtle'
import type { TurtleConfig } from '../../config'

export const sceneResource = defineResource({
  dependencies: ['config', 'surface', 'palette'],
  start: ({
    config,
    surface,
    palette,
  }: {
    config: TurtleConfig
    surface: RenderSurface
    palette: Palette
  }) => createScene({ surface, palette, background: config.canvas.background }),
  halt: () => {},
})
