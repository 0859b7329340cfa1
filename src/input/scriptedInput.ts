/**
 * Scripted Input
 *
 * Input source fed by code instead of a keyboard. Used for headless
 * sessions, demos and tests.
 */

import { createMailbox } from '@turtle-trails/system'
import { InvalidArgumentError, inputEventSchema } from '@turtle-trails/turtle'
import type { InputEvent } from '@turtle-trails/turtle'
import type { InputSource } from './inputSource'

const validate = (event: InputEvent): InputEvent => {
  const result = inputEventSchema.safeParse(event)
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid input event ${JSON.stringify(event)}`, {
      cause: result.error,
    })
  }
  return result.data
}

export type ScriptedInput = InputSource & {
  push: (...events: Array<InputEvent>) => void
  pending: () => number
}

export function createScriptedInput(
  initialEvents: ReadonlyArray<InputEvent> = [],
): ScriptedInput {
  const mailbox = createMailbox<InputEvent>()
  const enqueue = (events: ReadonlyArray<InputEvent>) => {
    // Validate the whole batch before queueing any of it
    events.map(validate).forEach(mailbox.put)
  }

  enqueue(initialEvents)

  return {
    poll: mailbox.poll,
    dispose: mailbox.close,
    push: (...events) => enqueue(events),
    pending: mailbox.size,
  }
}
