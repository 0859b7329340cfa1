import type { InputEvent } from '@turtle-trails/turtle'

/**
 * Where the loop gets its events from
 */
export type InputSource = {
  /** Next event, or null when nothing arrived within `timeoutMs` */
  poll: (timeoutMs: number) => Promise<InputEvent | null>

  /** Stop listening; pending and later polls resolve null */
  dispose: () => void
}
