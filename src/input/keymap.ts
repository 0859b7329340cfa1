/**
 * Keymap
 *
 * Maps key descriptors ("up", "space", "ctrl+c", "+") to input events.
 * Descriptors follow the shortcut format: optional modifiers joined with
 * "+", then exactly one key.
 */

import registerDebug from 'debug'
import { InvalidArgumentError, turtleKeywords } from '@turtle-trails/turtle'
import type { BindableInputEvent } from '@turtle-trails/turtle'

const debug = registerDebug('turtle-trails:keymap')

const { inputEvents } = turtleKeywords

// ============================================================================
// Types
// ============================================================================

const keyModifiers = {
  shift: 'shift',
  ctrl: 'ctrl',
  meta: 'meta',
  alt: 'alt',
} as const

type Modifier = keyof typeof keyModifiers

export type KeyBindings = Readonly<Record<string, BindableInputEvent>>

/**
 * A decoded keypress, as readline reports it
 */
export type KeyPress = {
  name?: string
  sequence?: string
  ctrl?: boolean
  meta?: boolean
  shift?: boolean
}

type EvaluatedKeymap = {
  key: string
  shift: boolean
  ctrl: boolean
  meta: boolean
  alt: boolean
}

export type Keymap = {
  /** Event bound to a keypress, null when unbound */
  resolve: (press: KeyPress) => BindableInputEvent | null
  bindings: () => KeyBindings
}

// ============================================================================
// Defaults
// ============================================================================

const ngonKeys: KeyBindings = Object.fromEntries(
  [3, 4, 5, 6, 7, 8, 9].map((sides) => [String(sides), { type: inputEvents.ngon, sides }] as const),
)

export const DEFAULT_KEY_BINDINGS: KeyBindings = {
  up: { type: inputEvents.moveForward },
  down: { type: inputEvents.moveBackward },
  left: { type: inputEvents.turnLeft },
  right: { type: inputEvents.turnRight },
  space: { type: inputEvents.togglePen },
  escape: { type: inputEvents.quit },
  q: { type: inputEvents.quit },
  'ctrl+c': { type: inputEvents.quit },
  ',': { type: inputEvents.quarterTurnLeft },
  '.': { type: inputEvents.quarterTurnRight },
  e: { type: inputEvents.faceEast },
  z: { type: inputEvents.cycleColor },
  a: { type: inputEvents.cycleBackground },
  '-': { type: inputEvents.narrower },
  '=': { type: inputEvents.wider },
  '+': { type: inputEvents.wider },
  backspace: { type: inputEvents.clear },
  '0': { type: inputEvents.reset },
  ...ngonKeys,
  c: { type: inputEvents.ngon, sides: 72 },
}

// ============================================================================
// Keymap Evaluation
// ============================================================================

const isModifier = (token: string): token is Modifier =>
  Object.keys(keyModifiers).includes(token)

const isSpace = (key: string) => key === ' ' || key === 'space'

const spaceOrKey = (key: string) => (isSpace(key) ? 'space' : key)

// "+" is a key as well as the separator
const tokenize = (keymap: string): Array<string> => {
  if (keymap === '+') return ['+']
  if (keymap.endsWith('++')) return [...keymap.slice(0, -2).split('+'), '+']
  return keymap.split('+')
}

export const evaluateKeymap = (keymap: string): EvaluatedKeymap | null => {
  const tokens = tokenize(keymap.trim())
  const modifiers = tokens.filter(isModifier)
  const keys = tokens.filter((token) => !isModifier(token))

  if (keys.length !== 1 || keys[0] === '') {
    debug('Invalid keymap: %s - expected exactly one key', keymap)
    return null
  }

  return {
    key: spaceOrKey(keys[0].toLowerCase()),
    shift: modifiers.includes('shift'),
    ctrl: modifiers.includes('ctrl'),
    meta: modifiers.includes('meta'),
    alt: modifiers.includes('alt'),
  }
}

const keyOf = (press: KeyPress) =>
  spaceOrKey((press.name ?? press.sequence ?? '').toLowerCase())

const matches = (keymap: EvaluatedKeymap, press: KeyPress) =>
  keymap.key === keyOf(press) &&
  keymap.shift === (press.shift ?? false) &&
  keymap.ctrl === (press.ctrl ?? false) &&
  // terminals report alt as meta
  (keymap.meta || keymap.alt) === (press.meta ?? false)

// ============================================================================
// Factory
// ============================================================================

/**
 * Compile bindings (defaults first, `overrides` win)
 * Throws InvalidArgumentError for descriptors that do not parse.
 */
export function createKeymap(
  overrides: KeyBindings = {},
  defaults: KeyBindings = DEFAULT_KEY_BINDINGS,
): Keymap {
  const bindings: KeyBindings = { ...defaults, ...overrides }

  const compiled = Object.entries(bindings).map(([descriptor, event]) => {
    const keymap = evaluateKeymap(descriptor)
    if (!keymap) {
      throw new InvalidArgumentError(`Invalid key binding "${descriptor}"`)
    }
    return { keymap, event }
  })

  return {
    resolve: (press) =>
      compiled.find(({ keymap }) => matches(keymap, press))?.event ?? null,
    bindings: () => bindings,
  }
}

const describeEvent = (event: BindableInputEvent) =>
  event.type === inputEvents.ngon ? `${event.type} ${event.sides}` : event.type

/**
 * One "key  Event" line per binding
 */
export const formatKeymapHelp = (bindings: KeyBindings): string =>
  Object.entries(bindings)
    .map(([key, event]) => `${key.padEnd(12)}${describeEvent(event)}`)
    .join('\n')
