import { defineResource } from 'braided'
import type { StartedResource } from 'braided'
import type { TurtleConfig } from '../../config'

/**
 * Already-parsed configuration as a resource, so every other resource
 * declares what it reads
 */
export const createConfigResource = (config: TurtleConfig) =>
  defineResource({
    dependencies: [],
    start: () => config,
    halt: () => {},
  })

export type ConfigResource = StartedResource<ReturnType<typeof createConfigResource>>
