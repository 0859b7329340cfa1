/**
 * Turtle Registry
 *
 * Owns every turtle of a session. Turtles share the scene (and so the
 * surface) but never interact with each other.
 */

import registerDebug from 'debug'
import {
  InvalidArgumentError,
  SurfaceUnavailableError,
  createTurtleState,
} from '@turtle-trails/turtle'
import type { Palette } from '@turtle-trails/turtle'
import type { Scene } from '@turtle-trails/rendering'
import type { TurtleConfig } from '../config'
import { createTurtle } from './turtleController'
import type { TurtleController } from './turtleController'

const debug = registerDebug('turtle-trails:turtles')

export type CreateTurtleOptions = {
  id?: string
  color?: string
  width?: number
  penDown?: boolean
}

export type TurtleRegistry = {
  /** The turtle every session starts with */
  main: TurtleController
  create: (options?: CreateTurtleOptions) => TurtleController
  get: (id: string) => TurtleController | undefined
  list: () => Array<TurtleController>
  isActive: () => boolean
  /** Detach from the scene; every turtle refuses commands afterwards */
  deactivate: () => void
}

export type TurtleRegistryOptions = {
  config: TurtleConfig
  scene: Scene
  palette: Palette
}

export function createTurtleRegistry(options: TurtleRegistryOptions): TurtleRegistry {
  const { config, scene, palette } = options
  const turtles = new Map<string, TurtleController>()
  const detachers: Array<() => void> = []
  let active = true
  let created = 0

  const isActive = () => active

  // Automatic ids skip names a caller already picked
  const nextFreeId = (): string => {
    let id: string
    do {
      created += 1
      id = `turtle-${created}`
    } while (turtles.has(id))
    return id
  }

  const create = (turtleOptions: CreateTurtleOptions = {}) => {
    if (!active) {
      throw new SurfaceUnavailableError('Cannot create a turtle after the session ended')
    }

    const id = turtleOptions.id ?? nextFreeId()
    if (turtles.has(id)) {
      throw new InvalidArgumentError(`A turtle named "${id}" already exists`)
    }

    const state = createTurtleState({
      palette,
      color: turtleOptions.color ?? config.pen.color,
      width: turtleOptions.width ?? config.pen.width,
      penDown: turtleOptions.penDown ?? config.pen.down,
    })

    const turtle = createTurtle({
      id,
      state,
      scene,
      step: config.step,
      angleStep: config.angleStep,
      isActive,
    })

    turtles.set(id, turtle)
    detachers.push(
      scene.addTurtle({ id, getPose: state.getPose, getTrail: state.getTrail }),
    )
    debug('Created %s', id)

    return turtle
  }

  const main = create()

  return {
    main,
    create,
    get: (id) => turtles.get(id),
    list: () => Array.from(turtles.values()),
    isActive,
    deactivate: () => {
      if (!active) return
      active = false
      detachers.forEach((detach) => detach())
      debug('Deactivated %d turtle(s)', turtles.size)
    },
  }
}
