/**
 * Terminal Input
 *
 * Keyboard input source for a TTY. Puts stdin in raw mode, decodes
 * keypresses with readline, resolves them through the keymap and queues
 * the resulting events for the loop. Terminal resizes become Resize events.
 *
 * Toggle-style events are throttled so a held key does not flicker
 * the pen or spin through the palette.
 */

import { emitKeypressEvents } from 'node:readline'
import type { Readable } from 'node:stream'
import { throttle } from '@tanstack/pacer'
import registerDebug from 'debug'
import { createMailbox } from '@turtle-trails/system'
import { turtleKeywords } from '@turtle-trails/turtle'
import type { InputEvent, InputEventType } from '@turtle-trails/turtle'
import type { InputSource } from './inputSource'
import type { KeyPress, Keymap } from './keymap'

const debug = registerDebug('turtle-trails:terminal-input')

const { inputEvents } = turtleKeywords

// ============================================================================
// Types
// ============================================================================

export type TerminalInputStream = Readable & {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}

export type TerminalResizeSource = {
  readonly columns?: number
  readonly rows?: number
  on(event: 'resize', listener: () => void): unknown
  off(event: 'resize', listener: () => void): unknown
}

export type TerminalInputOptions = {
  input: TerminalInputStream
  /** Stream whose 'resize' events are reported (usually stdout) */
  output?: TerminalResizeSource
  keymap: Keymap
  /** Minimum gap between two toggle events of the same type (default 100) */
  throttleMs?: number
}

const THROTTLED_EVENTS: ReadonlySet<InputEventType> = new Set([
  inputEvents.togglePen,
  inputEvents.cycleColor,
  inputEvents.cycleBackground,
  inputEvents.clear,
  inputEvents.reset,
  inputEvents.ngon,
])

// ============================================================================
// Factory
// ============================================================================

export function createTerminalInput(options: TerminalInputOptions): InputSource {
  const { input, output, keymap, throttleMs = 100 } = options
  const mailbox = createMailbox<InputEvent>()
  const throttled = new Map<InputEventType, (event: InputEvent) => void>()
  let disposed = false

  const deliver = (event: InputEvent) => {
    if (!THROTTLED_EVENTS.has(event.type)) {
      mailbox.put(event)
      return
    }

    let send = throttled.get(event.type)
    if (!send) {
      send = throttle((next: InputEvent) => mailbox.put(next), { wait: throttleMs })
      throttled.set(event.type, send)
    }
    send(event)
  }

  const handleKeypress = (_text: string | undefined, key: KeyPress | undefined) => {
    if (!key) return

    const event = keymap.resolve(key)
    if (!event) {
      debug('Unbound key %s', key.name ?? JSON.stringify(key.sequence))
      return
    }

    deliver(event)
  }

  const handleResize = () => {
    if (!output?.columns || !output.rows) return
    mailbox.put({ type: inputEvents.resize, columns: output.columns, rows: output.rows })
  }

  emitKeypressEvents(input)
  if (input.isTTY) input.setRawMode?.(true)
  input.on('keypress', handleKeypress)
  input.resume()
  output?.on('resize', handleResize)

  debug('Listening for keys (tty: %s)', input.isTTY ?? false)

  return {
    poll: mailbox.poll,

    dispose: () => {
      if (disposed) return
      disposed = true

      input.off('keypress', handleKeypress)
      if (input.isTTY) input.setRawMode?.(false)
      input.pause()
      output?.off('resize', handleResize)
      mailbox.close()

      debug('Stopped listening')
    },
  }
}
