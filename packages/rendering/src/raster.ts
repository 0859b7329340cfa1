/**
 * Rasterizer
 *
 * World → cell mapping and Bresenham lines for character-grid surfaces.
 * World origin sits at the grid center, world y grows upward while rows
 * grow downward. Terminal cells are about twice as tall as wide, so one
 * row covers `scale * cellAspect` world units.
 */

import type { Point } from '@turtle-trails/turtle'

export type Cell = {
  col: number
  row: number
}

export type Viewport = {
  columns: number
  rows: number
  /** World units per column */
  scale: number
  /** Cell height / cell width */
  cellAspect: number
}

export const worldToCell = (point: Point, viewport: Viewport): Cell => ({
  col: Math.floor(viewport.columns / 2) + Math.round(point.x / viewport.scale),
  row:
    Math.floor(viewport.rows / 2) -
    Math.round(point.y / (viewport.scale * viewport.cellAspect)),
})

export const isInside = (cell: Cell, viewport: Viewport): boolean =>
  cell.col >= 0 &&
  cell.col < viewport.columns &&
  cell.row >= 0 &&
  cell.row < viewport.rows

/**
 * Cells on the line between two cells, both ends included
 */
export const rasterizeLine = (from: Cell, to: Cell): Array<Cell> => {
  const cells: Array<Cell> = []

  const dx = Math.abs(to.col - from.col)
  const dy = -Math.abs(to.row - from.row)
  const stepCol = from.col < to.col ? 1 : -1
  const stepRow = from.row < to.row ? 1 : -1

  let col = from.col
  let row = from.row
  let error = dx + dy

  for (;;) {
    cells.push({ col, row })
    if (col === to.col && row === to.row) break

    const doubled = 2 * error
    if (doubled >= dy) {
      error += dy
      col += stepCol
    }
    if (doubled <= dx) {
      error += dx
      row += stepRow
    }
  }

  return cells
}

/**
 * Square brush of `width` cells around a cell
 */
export const stamp = (cell: Cell, width: number): Array<Cell> => {
  if (width <= 1) return [cell]

  const before = Math.floor((width - 1) / 2)
  const after = width - 1 - before
  const cells: Array<Cell> = []

  for (let row = cell.row - before; row <= cell.row + after; row++) {
    for (let col = cell.col - before; col <= cell.col + after; col++) {
      cells.push({ col, row })
    }
  }

  return cells
}

type Offset = {
  u: number
  v: number
}

/**
 * Liang-Barsky clip of the segment `from -> to` against an axis-aligned box.
 * Returns null when nothing of the segment lies inside.
 * Endpoints already inside are returned untouched.
 */
const clipToBox = (
  from: Offset,
  to: Offset,
  box: { minU: number; maxU: number; minV: number; maxV: number },
): [Offset, Offset] | null => {
  const du = to.u - from.u
  const dv = to.v - from.v

  let enter = 0
  let exit = 1

  const edges: Array<[number, number]> = [
    [-du, from.u - box.minU],
    [du, box.maxU - from.u],
    [-dv, from.v - box.minV],
    [dv, box.maxV - from.v],
  ]

  for (const [p, q] of edges) {
    if (p === 0) {
      if (q < 0) return null
      continue
    }
    const t = q / p
    if (p < 0) {
      enter = Math.max(enter, t)
    } else {
      exit = Math.min(exit, t)
    }
    if (enter > exit) return null
  }

  const at = (t: number): Offset => ({ u: from.u + t * du, v: from.v + t * dv })

  return [enter === 0 ? from : at(enter), exit === 1 ? to : at(exit)]
}

/**
 * Every in-bounds cell covered by a segment drawn with a given pen width.
 * The segment is clipped to the viewport (padded by the brush) before it is
 * rasterized, so the work is bounded by the grid size, not the segment length.
 */
export const segmentCells = (
  start: Point,
  end: Point,
  width: number,
  viewport: Viewport,
): Array<Cell> => {
  const centerCol = Math.floor(viewport.columns / 2)
  const centerRow = Math.floor(viewport.rows / 2)
  const rowUnit = viewport.scale * viewport.cellAspect

  // Offsets from the center cell, before rounding (rows measured upward)
  const pad = Math.max(1, width) + 0.5
  const clipped = clipToBox(
    { u: start.x / viewport.scale, v: start.y / rowUnit },
    { u: end.x / viewport.scale, v: end.y / rowUnit },
    {
      minU: -centerCol - pad,
      maxU: viewport.columns - 1 - centerCol + pad,
      minV: centerRow - (viewport.rows - 1) - pad,
      maxV: centerRow + pad,
    },
  )
  if (!clipped) return []

  const toCell = ({ u, v }: Offset): Cell => ({
    col: centerCol + Math.round(u),
    row: centerRow - Math.round(v),
  })

  const seen = new Set<string>()
  const cells: Array<Cell> = []

  for (const center of rasterizeLine(toCell(clipped[0]), toCell(clipped[1]))) {
    for (const cell of stamp(center, width)) {
      const key = `${cell.col}:${cell.row}`
      if (seen.has(key) || !isInside(cell, viewport)) continue
      seen.add(key)
      cells.push(cell)
    }
  }

  return cells
}

const ARROWS = ['→', '↗', '↑', '↖', '←', '↙', '↓', '↘'] as const

/**
 * Arrow glyph closest to a heading (degrees, 0 = east, counter-clockwise)
 */
export const headingGlyph = (heading: number): string =>
  ARROWS[((Math.round(heading / 45) % 8) + 8) % 8]
