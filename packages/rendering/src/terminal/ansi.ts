/**
 * ANSI escape sequences for truecolor terminals
 */

import chroma from 'chroma-js'

const ESC = '\x1b['

const rgbOf = (color: string): string => chroma(color).rgb().join(';')

export const ansi = {
  reset: `${ESC}0m`,
  clearScreen: `${ESC}2J${ESC}H`,
  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,
  enterAltScreen: `${ESC}?1049h`,
  leaveAltScreen: `${ESC}?1049l`,

  /** 1-based row/column, as terminals count them */
  moveTo: (row: number, col: number) => `${ESC}${row};${col}H`,

  fg: (color: string) => `${ESC}38;2;${rgbOf(color)}m`,
  bg: (color: string) => `${ESC}48;2;${rgbOf(color)}m`,
} as const
