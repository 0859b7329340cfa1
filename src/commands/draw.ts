import { Command, Flags } from '@oclif/core'
import { isTurtleError } from '@turtle-trails/turtle'
import { loadConfigFile, mergeConfig, parseConfig } from '../config'
import type { TurtleConfigInput } from '../config'
import { createKeymap, formatKeymapHelp } from '../input'
import { withSession } from '../session'

export default class Draw extends Command {
  static description = 'Drive a turtle around the terminal with the keyboard'

  static flags = {
    config: Flags.file({
      description: 'JSON configuration file',
      exists: true,
      char: 'c',
    }),
    step: Flags.integer({
      description: 'Distance of one forward/back key press',
      min: 1,
    }),
    'angle-step': Flags.integer({
      description: 'Degrees of one left/right key press',
      min: 1,
    }),
    keys: Flags.boolean({
      description: 'Print the key bindings and exit',
      default: false,
    }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Draw)

    try {
      const fileConfig: TurtleConfigInput = flags.config
        ? await loadConfigFile(flags.config)
        : {}
      const config = mergeConfig(fileConfig, {
        step: flags.step,
        angleStep: flags['angle-step'],
      })

      if (flags.keys) {
        this.log(formatKeymapHelp(createKeymap(parseConfig(config).keymap).bindings()))
        return
      }

      if (!process.stdin.isTTY || !process.stdout.isTTY) {
        this.error('Drawing needs an interactive terminal', { exit: 1 })
      }

      const exit = await withSession({ config }, (session) => session.run())

      if (exit.reason === 'error') {
        this.error(exit.error.message, { exit: 1 })
      }
    } catch (error) {
      if (isTurtleError(error)) {
        this.error(error.message, { exit: 1 })
      }
      throw error
    }
  }
}
