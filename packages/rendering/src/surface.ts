/**
 * Render Surface
 *
 * The capability the scene draws on. Implementations own pixels (or cells);
 * they know nothing about turtles or trails.
 *
 * Contract:
 * - drawSegment/clear only change the back buffer, present() makes it visible
 * - pollLiveness() answers the host's "still alive?" check
 * - every call on a disposed or lost surface throws SurfaceUnavailableError
 */

import type { Point } from '@turtle-trails/turtle'

export type SurfaceSize = {
  columns: number
  rows: number
}

export type RenderSurface = {
  /** Draw one line in world coordinates; `color` is a CSS color */
  drawSegment: (start: Point, end: Point, color: string, width: number) => void

  /** Wipe everything drawn so far */
  clear: () => void

  /** Flush pending drawing to the host */
  present: () => void

  /** Host liveness check; throws when the host is gone */
  pollLiveness: () => void

  /** Background fill used by clear() and present() */
  setBackground: (color: string) => void

  /** Place (or move) the marker of one turtle */
  setCursor: (id: string, position: Point, heading: number, color: string) => void

  removeCursor: (id: string) => void

  /** Change the surface size; the drawing is lost and must be replayed */
  resize: (size: SurfaceSize) => void

  size: () => SurfaceSize

  isAlive: () => boolean

  /** Release the host resource; idempotent */
  dispose: () => void
}
