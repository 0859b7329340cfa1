import registerDebug from 'debug'
import { defineResource } from 'braided'
import type { TurtleConfig } from '../../config'
import { createKeymap } from '../../input'
import type { InputSource, Keymap } from '../../input'

const debug = registerDebug('turtle-trails:input')

export type InputFactory = (config: TurtleConfig, keymap: Keymap) => InputSource

/**
 * Input capability: compiles the keymap and opens the input source
 */
export const createInputResource = (factory: InputFactory) =>
  defineResource({
    dependencies: ['config'],
    start: ({ config }: { config: TurtleConfig }) => {
      const keymap = createKeymap(config.keymap)
      const source = factory(config, keymap)
      debug('Input source opened')
      return { source, keymap }
    },
    halt: ({ source }) => {
      source.dispose()
      debug('Input source closed')
    },
  })
