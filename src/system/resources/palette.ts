import { defineResource } from 'braided'
import { createPalette } from '@turtle-trails/turtle'
import type { TurtleConfig } from '../../config'

export const paletteResource = defineResource({
  dependencies: ['config'],
  start: ({ config }: { config: TurtleConfig }) => createPalette(config.palette),
  halt: () => {},
})
