import chroma from 'chroma-js'
import { InvalidArgumentError } from './errors'

/**
 * Named pen colors
 * Anything chroma-js can parse (hex, rgb(), CSS names) is accepted too;
 * palette names win over CSS names ("purple" is the brighter #cc00ff here).
 */
export const DEFAULT_COLORS: Readonly<Record<string, string>> = {
  red: '#ff0000',
  green: '#00ff00',
  blue: '#0000ff',
  yellow: '#ffff00',
  magenta: '#ff00ff',
  cyan: '#00ffff',
  purple: '#cc00ff',
  white: '#ffffff',
  black: '#000000',
}

export type Palette = {
  /** True for palette names and any color chroma-js can parse */
  has: (color: string) => boolean

  /** Hex string for a palette name or CSS color */
  resolve: (color: string) => string

  /** [r, g, b] components (0-255) */
  toRgb: (color: string) => [number, number, number]

  /**
   * Next palette name after `color` in sorted order, wrapping around.
   * Colors outside the palette restart at the first name.
   */
  next: (color: string) => string

  /** Register or replace a named color */
  add: (name: string, color: string) => void

  names: () => Array<string>
}

export function createPalette(
  extraColors: Readonly<Record<string, string>> = {},
): Palette {
  const colors = new Map<string, string>()

  const add = (name: string, color: string) => {
    const key = name.trim().toLowerCase()
    if (key.length === 0) {
      throw new InvalidArgumentError('Color name must not be empty')
    }
    if (!chroma.valid(color)) {
      throw new InvalidArgumentError(`Unknown color "${color}" for "${name}"`)
    }
    colors.set(key, chroma(color).hex())
  }

  for (const [name, color] of Object.entries({ ...DEFAULT_COLORS, ...extraColors })) {
    add(name, color)
  }

  const lookup = (color: string) => colors.get(color.trim().toLowerCase())

  const names = () => Array.from(colors.keys()).sort()

  const resolve = (color: string) => {
    const named = lookup(color)
    if (named) return named
    if (chroma.valid(color)) return chroma(color).hex()
    throw new InvalidArgumentError(`Unknown color "${color}"`)
  }

  return {
    has: (color) => lookup(color) !== undefined || chroma.valid(color),
    resolve,
    toRgb: (color) => chroma(resolve(color)).rgb(),
    next: (color) => {
      const sorted = names()
      const index = sorted.indexOf(color.trim().toLowerCase())
      return sorted[(index + 1) % sorted.length]
    },
    add,
    names,
  }
}
