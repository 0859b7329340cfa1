import { describe, expect, it } from 'vitest'
import { SurfaceUnavailableError } from '@turtle-trails/turtle'
import { createTerminalSurface } from '@turtle-trails/rendering'

const createOutput = (columns?: number, rows?: number) => {
  const chunks: Array<string> = []
  const output = {
    writable: true,
    columns,
    rows,
    write: (chunk: string) => {
      chunks.push(chunk)
      return true
    },
  }
  return { output, chunks, last: () => chunks[chunks.length - 1] }
}

const RED = '\x1b[48;2;255;0;0m'
const GREEN = '\x1b[48;2;0;255;0m'
const BLACK = '\x1b[48;2;0;0;0m'
const WHITE_FG = '\x1b[38;2;255;255;255m'
const RESET = '\x1b[0m'

const createSurface = () => {
  const fake = createOutput()
  const surface = createTerminalSurface({
    output: fake.output,
    size: { columns: 20, rows: 10 },
    alternateScreen: false,
  })
  return { ...fake, surface }
}

describe('createTerminalSurface', () => {
  it('should enter the alternate screen and hide the cursor', () => {
    const { output, chunks } = createOutput()

    createTerminalSurface({ output })

    expect(chunks).toEqual(['\x1b[?1049h\x1b[?25l'])
  })

  it('should take its size from the output', () => {
    const { output } = createOutput(30, 12)

    expect(createTerminalSurface({ output }).size()).toEqual({ columns: 30, rows: 12 })
  })

  it('should fill the cells under a segment', () => {
    const { surface } = createSurface()

    surface.drawSegment({ x: 0, y: 0 }, { x: 5, y: 0 }, 'red', 1)

    expect(surface.cellAt(10, 5)).toBe('#ff0000')
    expect(surface.cellAt(15, 5)).toBe('#ff0000')
    expect(surface.cellAt(16, 5)).toBeNull()
    expect(surface.cellAt(10, 4)).toBeNull()
  })

  it('should repaint everything on the first frame', () => {
    const { surface, last } = createSurface()
    surface.drawSegment({ x: 0, y: 0 }, { x: 5, y: 0 }, '#ff0000', 1)

    surface.present()

    expect(last().startsWith(`${BLACK}\x1b[2J\x1b[H`)).toBe(true)
    expect(last()).toContain(`\x1b[6;11H${RED} `)
    expect(last()).toContain(`\x1b[6;16H${RED} `)
    expect(last().endsWith(RESET)).toBe(true)
  })

  it('should write only changed cells afterwards', () => {
    const { surface, last } = createSurface()
    surface.drawSegment({ x: 0, y: 0 }, { x: 5, y: 0 }, '#ff0000', 1)
    surface.present()

    surface.drawSegment({ x: 0, y: 0 }, { x: 0, y: 2 }, '#00ff00', 1)
    surface.present()

    expect(last()).toBe(`\x1b[6;11H${GREEN} \x1b[5;11H${GREEN} ${RESET}`)
  })

  it('should uncover the old cursor cell when a cursor moves', () => {
    const { surface, last } = createSurface()
    surface.setCursor('main', { x: 0, y: 0 }, 90, '#ffffff')
    surface.present()

    expect(last()).toBe(
      `${BLACK}\x1b[2J\x1b[H\x1b[6;11H${BLACK}${WHITE_FG}↑${RESET}`,
    )

    surface.setCursor('main', { x: 2, y: 0 }, 0, '#ffffff')
    surface.present()

    expect(last()).toBe(
      `\x1b[6;11H${BLACK} \x1b[6;13H${BLACK}${WHITE_FG}→${RESET}`,
    )
  })

  it('should forget the picture on clear and resize', () => {
    const { surface } = createSurface()
    surface.drawSegment({ x: 0, y: 0 }, { x: 5, y: 0 }, '#ff0000', 1)

    surface.clear()
    expect(surface.cellAt(10, 5)).toBeNull()

    surface.drawSegment({ x: 0, y: 0 }, { x: 5, y: 0 }, '#ff0000', 1)
    surface.resize({ columns: 10, rows: 4 })

    expect(surface.size()).toEqual({ columns: 10, rows: 4 })
    expect(surface.cellAt(5, 2)).toBeNull()
  })

  it('should report a closed output as unavailable', () => {
    const { surface, output } = createSurface()

    output.writable = false

    expect(surface.isAlive()).toBe(false)
    expect(() => surface.pollLiveness()).toThrow(SurfaceUnavailableError)
    expect(() => surface.present()).toThrow(SurfaceUnavailableError)
  })

  it('should restore the terminal once on dispose', () => {
    const { surface, chunks } = createSurface()

    surface.dispose()
    surface.dispose()

    expect(chunks).toEqual(['\x1b[?25l', '\x1b[0m\x1b[?25h'])
    expect(() => surface.drawSegment({ x: 0, y: 0 }, { x: 1, y: 0 }, 'red', 1)).toThrow(
      SurfaceUnavailableError,
    )
  })
})
