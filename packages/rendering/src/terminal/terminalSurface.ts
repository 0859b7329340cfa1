/**
 * Terminal Surface
 *
 * RenderSurface backed by a character grid on a truecolor terminal.
 * Each cell is one "pixel" painted with a background-colored space;
 * turtles show up as arrow glyphs on top of the picture.
 *
 * Drawing only touches the in-memory grid. present() writes one frame:
 * a full repaint after clear/resize/background changes, otherwise just
 * the cells that changed since the previous frame.
 */

import chroma from 'chroma-js'
import registerDebug from 'debug'
import { SurfaceUnavailableError } from '@turtle-trails/turtle'
import type { Point } from '@turtle-trails/turtle'
import { headingGlyph, isInside, segmentCells, worldToCell } from '../raster'
import type { Viewport } from '../raster'
import type { RenderSurface, SurfaceSize } from '../surface'
import { ansi } from './ansi'

const debug = registerDebug('turtle-trails:terminal-surface')

// ============================================================================
// Types
// ============================================================================

/**
 * The part of a tty write stream the surface needs
 */
export type TerminalOutput = {
  write(chunk: string): unknown
  readonly writable: boolean
  readonly columns?: number
  readonly rows?: number
}

export type TerminalSurfaceOptions = {
  output: TerminalOutput
  /** Grid size (default: the output's own size, else 80x24) */
  size?: SurfaceSize
  /** World units per column (default 1) */
  scale?: number
  /** Cell height / width (default 2) */
  cellAspect?: number
  background?: string
  /** Draw on the alternate screen buffer (default true) */
  alternateScreen?: boolean
}

export type TerminalSurface = RenderSurface & {
  /** Color stored in a cell, null for background */
  cellAt: (col: number, row: number) => string | null
  viewport: () => Viewport
}

type Cursor = {
  position: Point
  heading: number
  color: string
}

const FALLBACK_SIZE: SurfaceSize = { columns: 80, rows: 24 }

// ============================================================================
// Factory
// ============================================================================

export function createTerminalSurface(
  options: TerminalSurfaceOptions,
): TerminalSurface {
  const { output, scale = 1, cellAspect = 2, alternateScreen = true } = options

  const initialSize = options.size ?? {
    columns: output.columns ?? FALLBACK_SIZE.columns,
    rows: output.rows ?? FALLBACK_SIZE.rows,
  }

  let viewport: Viewport = { ...initialSize, scale, cellAspect }
  let cells: Array<string | null> = new Array<string | null>(initialSize.columns * initialSize.rows).fill(null)
  let background = chroma(options.background ?? 'black').hex()
  let fullPaint = true
  let paintedCursorCells: Array<number> = []
  let disposed = false

  const dirty = new Set<number>()
  const cursors = new Map<string, Cursor>()

  // Few distinct colors, many cells
  const sequences = new Map<string, string>()
  const cached = (key: string, build: () => string) => {
    const existing = sequences.get(key)
    if (existing !== undefined) return existing
    const sequence = build()
    sequences.set(key, sequence)
    return sequence
  }
  const bg = (color: string) => cached(`bg${color}`, () => ansi.bg(color))
  const fg = (color: string) => cached(`fg${color}`, () => ansi.fg(color))

  const isAlive = () => !disposed && output.writable

  const ensureAlive = (operation: string) => {
    if (!isAlive()) {
      throw new SurfaceUnavailableError(`Terminal surface unavailable (${operation})`)
    }
  }

  const position = (index: number) =>
    ansi.moveTo(Math.floor(index / viewport.columns) + 1, (index % viewport.columns) + 1)

  const paintCell = (index: number) =>
    `${position(index)}${bg(cells[index] ?? background)} `

  const cursorIndex = (cursor: Cursor): number | null => {
    const cell = worldToCell(cursor.position, viewport)
    return isInside(cell, viewport) ? cell.row * viewport.columns + cell.col : null
  }

  output.write(`${alternateScreen ? ansi.enterAltScreen : ''}${ansi.hideCursor}`)
  debug('Terminal surface %dx%d (scale %d)', viewport.columns, viewport.rows, scale)

  return {
    drawSegment: (start, end, color, width) => {
      ensureAlive('drawSegment')
      const hex = chroma(color).hex()

      for (const cell of segmentCells(start, end, width, viewport)) {
        const index = cell.row * viewport.columns + cell.col
        cells[index] = hex
        dirty.add(index)
      }
    },

    clear: () => {
      ensureAlive('clear')
      cells.fill(null)
      dirty.clear()
      fullPaint = true
    },

    present: () => {
      ensureAlive('present')
      let frame = ''

      if (fullPaint) {
        frame += `${bg(background)}${ansi.clearScreen}`
        cells.forEach((color, index) => {
          if (color !== null) frame += paintCell(index)
        })
      } else {
        // Uncover cells the cursors sat on last frame
        for (const index of paintedCursorCells) dirty.add(index)
        for (const index of dirty) frame += paintCell(index)
      }

      paintedCursorCells = []
      for (const cursor of cursors.values()) {
        const index = cursorIndex(cursor)
        if (index === null) continue
        frame += `${position(index)}${bg(cells[index] ?? background)}${fg(cursor.color)}${headingGlyph(cursor.heading)}`
        paintedCursorCells.push(index)
      }

      dirty.clear()
      fullPaint = false
      output.write(`${frame}${ansi.reset}`)
    },

    pollLiveness: () => {
      if (disposed) {
        throw new SurfaceUnavailableError('Terminal surface was disposed')
      }
      if (!output.writable) {
        throw new SurfaceUnavailableError('Terminal output is no longer writable')
      }
    },

    setBackground: (color) => {
      ensureAlive('setBackground')
      background = chroma(color).hex()
      fullPaint = true
    },

    setCursor: (id, at, heading, color) => {
      ensureAlive('setCursor')
      cursors.set(id, { position: at, heading, color })
    },

    removeCursor: (id) => {
      ensureAlive('removeCursor')
      cursors.delete(id)
    },

    resize: (size) => {
      ensureAlive('resize')
      viewport = { ...viewport, columns: size.columns, rows: size.rows }
      cells = new Array<string | null>(size.columns * size.rows).fill(null)
      paintedCursorCells = []
      dirty.clear()
      fullPaint = true
      debug('Resized to %dx%d', size.columns, size.rows)
    },

    size: () => ({ columns: viewport.columns, rows: viewport.rows }),

    isAlive,

    dispose: () => {
      if (disposed) return
      disposed = true
      if (output.writable) {
        output.write(
          `${ansi.reset}${ansi.showCursor}${alternateScreen ? ansi.leaveAltScreen : ''}`,
        )
      }
      debug('Terminal surface disposed')
    },

    cellAt: (col, row) => {
      if (!isInside({ col, row }, viewport)) return null
      return cells[row * viewport.columns + col] ?? null
    },

    viewport: () => viewport,
  }
}
