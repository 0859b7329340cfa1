/**
 * Recording Surface
 *
 * In-memory RenderSurface that keeps a log of every call.
 * Used by tests and headless scripted sessions; `destroy()` simulates the
 * host going away (window closed, terminal detached).
 */

import { SurfaceUnavailableError } from '@turtle-trails/turtle'
import type { Point } from '@turtle-trails/turtle'
import type { RenderSurface, SurfaceSize } from './surface'

export type RecordedCall =
  | { type: 'drawSegment'; start: Point; end: Point; color: string; width: number }
  | { type: 'clear' }
  | { type: 'present' }
  | { type: 'pollLiveness' }
  | { type: 'setBackground'; color: string }
  | { type: 'setCursor'; id: string; position: Point; heading: number; color: string }
  | { type: 'removeCursor'; id: string }
  | { type: 'resize'; size: SurfaceSize }

export type RecordedSegment = Extract<RecordedCall, { type: 'drawSegment' }>

export type RecordingSurface = RenderSurface & {
  calls: () => ReadonlyArray<RecordedCall>

  count: (type: RecordedCall['type']) => number

  /** Segments drawn since the last clear(), i.e. what is on screen */
  visibleSegments: () => ReadonlyArray<RecordedSegment>

  background: () => string

  /** Forget the call log (the visible picture is kept) */
  resetCalls: () => void

  /** Lose the host without disposing */
  destroy: () => void
}

export const DEFAULT_RECORDING_SIZE: SurfaceSize = { columns: 80, rows: 24 }

export function createRecordingSurface(
  initialSize: SurfaceSize = DEFAULT_RECORDING_SIZE,
): RecordingSurface {
  let calls: Array<RecordedCall> = []
  let visible: Array<RecordedSegment> = []
  let size = initialSize
  let background = 'black'
  let alive = true

  const record = (call: RecordedCall) => {
    if (!alive) {
      throw new SurfaceUnavailableError(`Render surface is gone (${call.type})`)
    }
    calls.push(call)
  }

  return {
    drawSegment: (start, end, color, width) => {
      const call: RecordedSegment = { type: 'drawSegment', start, end, color, width }
      record(call)
      visible.push(call)
    },

    clear: () => {
      record({ type: 'clear' })
      visible = []
    },

    present: () => record({ type: 'present' }),

    pollLiveness: () => record({ type: 'pollLiveness' }),

    setBackground: (color) => {
      record({ type: 'setBackground', color })
      background = color
    },

    setCursor: (id, position, heading, color) =>
      record({ type: 'setCursor', id, position, heading, color }),

    removeCursor: (id) => record({ type: 'removeCursor', id }),

    resize: (next) => {
      record({ type: 'resize', size: next })
      size = next
      visible = []
    },

    size: () => size,

    isAlive: () => alive,

    dispose: () => {
      alive = false
    },

    calls: () => calls,
    count: (type) => calls.filter((call) => call.type === type).length,
    visibleSegments: () => visible,
    background: () => background,
    resetCalls: () => {
      calls = []
    },
    destroy: () => {
      alive = false
    },
  }
}
