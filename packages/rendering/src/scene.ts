/**
 * Scene
 *
 * Binds turtles to a render surface. The scene never mutates a turtle;
 * it reads trails and poses and decides how much to draw.
 *
 * Two paths:
 * - commit(): a command appended segments, draw only those
 * - redrawAll(): trail segments disappeared (clear, reset, resize,
 *   background change), wipe the surface and replay every trail
 *
 * Replays follow the order segments were first drawn across all turtles,
 * so overlapping trails stack the same way they did live.
 */

import registerDebug from 'debug'
import { SurfaceUnavailableError } from '@turtle-trails/turtle'
import type { CommandResult, Palette, Pose, Segment } from '@turtle-trails/turtle'
import type { RenderSurface, SurfaceSize } from './surface'

const debug = registerDebug('turtle-trails:scene')

// ============================================================================
// Types
// ============================================================================

/**
 * What the scene needs to know about a turtle
 */
export type SceneTurtle = {
  id: string
  getPose: () => Pose
  getTrail: () => ReadonlyArray<Segment>
}

export type SceneOptions = {
  surface: RenderSurface
  palette: Palette
  /** Background color name (default "black") */
  background?: string
}

export type SceneStats = {
  incrementalSegments: number
  fullRedraws: number
}

export type Scene = {
  /** Register a turtle and draw it; returns an unregister function */
  addTurtle: (turtle: SceneTurtle) => () => void

  /** Throw SurfaceUnavailable unless the surface can still draw */
  ensureAvailable: () => void

  /** Render the outcome of one command applied to turtle `id` */
  commit: (id: string, result: CommandResult) => void

  /** Draw the given segments on top of the current picture */
  drawIncremental: (segments: ReadonlyArray<Segment>) => void

  /** Clear the surface and replay every trail */
  redrawAll: () => void

  getBackground: () => string

  setBackground: (color: string) => void

  /** Next palette color as background; returns its name */
  cycleBackground: () => string

  resize: (size: SurfaceSize) => void

  getStats: () => SceneStats
}

// ============================================================================
// Factory
// ============================================================================

export function createScene(options: SceneOptions): Scene {
  const { surface, palette } = options
  const turtles = new Map<string, SceneTurtle>()
  const stats: SceneStats = { incrementalSegments: 0, fullRedraws: 0 }

  let background = options.background ?? 'black'

  // Segments are frozen, so identity is stable for as long as a trail keeps them
  const drawOrder = new WeakMap<Segment, number>()
  let nextOrder = 0

  const orderOf = (segment: Segment): number => {
    const known = drawOrder.get(segment)
    if (known !== undefined) return known
    const order = nextOrder++
    drawOrder.set(segment, order)
    return order
  }

  const ensureSurface = () => {
    if (!surface.isAlive()) {
      throw new SurfaceUnavailableError('Render surface is not available')
    }
  }

  const drawSegment = (segment: Segment) => {
    surface.drawSegment(segment.start, segment.end, palette.resolve(segment.color), segment.width)
  }

  const placeCursor = (turtle: SceneTurtle) => {
    const pose = turtle.getPose()
    surface.setCursor(turtle.id, pose.position, pose.heading, palette.resolve(pose.color))
  }

  const redrawAll = () => {
    ensureSurface()
    surface.clear()

    const replay: Array<{ segment: Segment; order: number }> = []
    for (const turtle of turtles.values()) {
      for (const segment of turtle.getTrail()) {
        replay.push({ segment, order: orderOf(segment) })
      }
    }
    replay.sort((a, b) => a.order - b.order)

    for (const { segment } of replay) drawSegment(segment)
    for (const turtle of turtles.values()) placeCursor(turtle)

    surface.present()
    stats.fullRedraws += 1
  }

  const drawIncremental = (segments: ReadonlyArray<Segment>) => {
    ensureSurface()
    for (const segment of segments) {
      orderOf(segment)
      drawSegment(segment)
    }
    surface.present()
    stats.incrementalSegments += segments.length
  }

  const setBackground = (color: string) => {
    ensureSurface()
    surface.setBackground(palette.resolve(color))
    background = color
    debug('Background %s', color)
    redrawAll()
  }

  surface.setBackground(palette.resolve(background))

  return {
    addTurtle: (turtle) => {
      ensureSurface()
      turtles.set(turtle.id, turtle)
      redrawAll()

      return () => {
        if (!turtles.delete(turtle.id)) return
        if (surface.isAlive()) {
          surface.removeCursor(turtle.id)
          redrawAll()
        }
      }
    },

    ensureAvailable: ensureSurface,

    commit: (id, result) => {
      if (result.redraw) {
        redrawAll()
        return
      }

      ensureSurface()
      const turtle = turtles.get(id)
      if (turtle) placeCursor(turtle)
      drawIncremental(result.segments)
    },

    drawIncremental,
    redrawAll,

    getBackground: () => background,
    setBackground,

    cycleBackground: () => {
      const next = palette.next(background)
      setBackground(next)
      return next
    },

    resize: (size) => {
      ensureSurface()
      surface.resize(size)
      redrawAll()
    },

    getStats: () => ({ ...stats }),
  }
}
