import { describe, expect, it } from 'vitest'
import { InvalidArgumentError } from '@turtle-trails/turtle'
import { createKeymap, evaluateKeymap, formatKeymapHelp } from '../input'

describe('createKeymap', () => {
  const keymap = createKeymap()

  it.each([
    [{ name: 'up' }, { type: 'MoveForward' }],
    [{ name: 'down' }, { type: 'MoveBackward' }],
    [{ name: 'left' }, { type: 'TurnLeft' }],
    [{ name: 'right' }, { type: 'TurnRight' }],
    [{ name: 'space', sequence: ' ' }, { type: 'TogglePen' }],
    [{ name: 'escape' }, { type: 'Quit' }],
    [{ name: 'c', ctrl: true }, { type: 'Quit' }],
    [{ sequence: ',' }, { type: 'QuarterTurnLeft' }],
    [{ sequence: '+' }, { type: 'Wider' }],
    [{ name: '5' }, { type: 'Ngon', sides: 5 }],
    [{ name: 'c' }, { type: 'Ngon', sides: 72 }],
    [{ name: 'backspace' }, { type: 'Clear' }],
  ])('should resolve %o to %o', (press, event) => {
    expect(keymap.resolve(press)).toEqual(event)
  })

  it('should not resolve unbound keys', () => {
    expect(keymap.resolve({ name: 'x' })).toBeNull()
    expect(keymap.resolve({ name: 'q', shift: true })).toBeNull()
    expect(keymap.resolve({})).toBeNull()
  })

  it('should layer overrides over the defaults', () => {
    const custom = createKeymap({
      w: { type: 'MoveForward' },
      up: { type: 'Quit' },
    })

    expect(custom.resolve({ name: 'w' })).toEqual({ type: 'MoveForward' })
    expect(custom.resolve({ name: 'up' })).toEqual({ type: 'Quit' })
    expect(custom.resolve({ name: 'down' })).toEqual({ type: 'MoveBackward' })
  })

  it('should reject descriptors without a key', () => {
    expect(() => createKeymap({ 'ctrl+shift': { type: 'Quit' } })).toThrow(
      InvalidArgumentError,
    )
  })
})

describe('evaluateKeymap', () => {
  it('should read modifiers and the key', () => {
    expect(evaluateKeymap('ctrl+shift+X')).toEqual({
      key: 'x',
      shift: true,
      ctrl: true,
      meta: false,
      alt: false,
    })
  })

  it('should treat a trailing plus as the plus key', () => {
    expect(evaluateKeymap('shift++')).toMatchObject({ key: '+', shift: true })
    expect(evaluateKeymap('+')).toMatchObject({ key: '+', shift: false })
  })

  it('should return null for more than one key', () => {
    expect(evaluateKeymap('a+b')).toBeNull()
  })

  it('should match alt bindings against meta presses', () => {
    const custom = createKeymap({ 'alt+x': { type: 'Reset' } }, {})

    expect(custom.resolve({ name: 'x', meta: true })).toEqual({ type: 'Reset' })
    expect(custom.resolve({ name: 'x' })).toBeNull()
  })
})

describe('formatKeymapHelp', () => {
  it('should print one padded line per binding', () => {
    const help = formatKeymapHelp({
      up: { type: 'MoveForward' },
      '5': { type: 'Ngon', sides: 5 },
    })

    expect(help).toBe(`5${' '.repeat(11)}Ngon 5\nup${' '.repeat(10)}MoveForward`)
  })
})
