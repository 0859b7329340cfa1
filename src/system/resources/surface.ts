/**
 * Surface Resource
 *
 * Acquires the render surface at start and releases it at halt.
 * Which surface is decided by the factory handed to the system config.
 */

import registerDebug from 'debug'
import { defineResource } from 'braided'
import type { RenderSurface } from '@turtle-trails/rendering'
import type { TurtleConfig } from '../../config'

const debug = registerDebug('turtle-trails:surface')

export type SurfaceFactory = (config: TurtleConfig) => RenderSurface

export const createSurfaceResource = (factory: SurfaceFactory) =>
  defineResource({
    dependencies: ['config'],
    start: ({ config }: { config: TurtleConfig }) => {
      const surface = factory(config)
      debug('Surface acquired (%dx%d)', surface.size().columns, surface.size().rows)
      return surface
    },
    halt: (surface) => {
      surface.dispose()
      debug('Surface released')
    },
  })
