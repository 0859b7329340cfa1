import { readFile } from 'node:fs/promises'
import registerDebug from 'debug'
import { InvalidArgumentError } from '@turtle-trails/turtle'
import { turtleConfigSchema } from './configSchema'
import type { TurtleConfig, TurtleConfigInput } from './configSchema'

const debug = registerDebug('turtle-trails:config')

/**
 * Validate raw input and fill in defaults
 */
export const parseConfig = (input: unknown): TurtleConfig => {
  const result = turtleConfigSchema.safeParse(input ?? {})

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new InvalidArgumentError(`Invalid configuration: ${issues}`, {
      cause: result.error,
    })
  }

  return result.data
}

/**
 * Layer overrides on top of a config input.
 * A field left undefined in `overrides` keeps the base value.
 */
export const mergeConfig = (
  base: TurtleConfigInput,
  overrides: TurtleConfigInput,
): TurtleConfigInput => ({
  step: overrides.step ?? base.step,
  angleStep: overrides.angleStep ?? base.angleStep,
  pollTimeoutMs: overrides.pollTimeoutMs ?? base.pollTimeoutMs,
  livenessIntervalMs: overrides.livenessIntervalMs ?? base.livenessIntervalMs,
  canvas: {
    columns: overrides.canvas?.columns ?? base.canvas?.columns,
    rows: overrides.canvas?.rows ?? base.canvas?.rows,
    scale: overrides.canvas?.scale ?? base.canvas?.scale,
    background: overrides.canvas?.background ?? base.canvas?.background,
  },
  pen: {
    color: overrides.pen?.color ?? base.pen?.color,
    width: overrides.pen?.width ?? base.pen?.width,
    down: overrides.pen?.down ?? base.pen?.down,
  },
  palette: { ...base.palette, ...overrides.palette },
  keymap: { ...base.keymap, ...overrides.keymap },
})

/**
 * Read a JSON config file
 */
export const loadConfigFile = async (path: string): Promise<TurtleConfigInput> => {
  debug('Loading config from %s', path)

  const text = await readFile(path, 'utf8')

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new InvalidArgumentError(`Config file ${path} is not valid JSON`, {
      cause: error,
    })
  }

  return parseConfig(raw)
}
