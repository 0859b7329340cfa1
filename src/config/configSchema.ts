/**
 * Configuration Schema
 *
 * Every tunable of the controller in one zod schema: step sizes, loop
 * timing, canvas, default pen, extra palette colors and key bindings.
 * Parsing fills in defaults, so `parseConfig({})` is a complete config.
 */

import { z } from 'zod'
import {
  PEN_WIDTH_MAX,
  PEN_WIDTH_MIN,
  bindableInputEventSchema,
} from '@turtle-trails/turtle'

export const turtleConfigSchema = z.object({
  /** Distance of one MoveForward / MoveBackward */
  step: z.number().positive().finite().default(4),

  /** Degrees of one TurnLeft / TurnRight */
  angleStep: z.number().positive().finite().default(15),

  /** Longest wait for input before the loop does housekeeping */
  pollTimeoutMs: z.number().int().positive().default(50),

  /** How often the surface is asked whether its host is still there */
  livenessIntervalMs: z.number().int().positive().default(1000),

  canvas: z
    .object({
      /** Grid size; the terminal's size when omitted */
      columns: z.number().int().positive().optional(),
      rows: z.number().int().positive().optional(),
      /** World units per column */
      scale: z.number().positive().finite().default(1),
      background: z.string().min(1).default('black'),
    })
    .default({}),

  pen: z
    .object({
      color: z.string().min(1).default('red'),
      width: z.number().int().min(PEN_WIDTH_MIN).max(PEN_WIDTH_MAX).default(1),
      down: z.boolean().default(true),
    })
    .default({}),

  /** Extra named colors, e.g. { "sunset": "#fa5a3c" } */
  palette: z.record(z.string(), z.string()).default({}),

  /**
   * Key bindings layered over the defaults, e.g. { "w": { "type": "MoveForward" } }
   */
  keymap: z.record(z.string(), bindableInputEventSchema).default({}),
})

export type TurtleConfig = z.infer<typeof turtleConfigSchema>

export type TurtleConfigInput = z.input<typeof turtleConfigSchema>
