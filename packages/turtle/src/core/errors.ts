/**
 * Turtle Errors
 *
 * Two failure kinds, both raised synchronously to the caller:
 * - InvalidArgument: non-finite numbers, unknown colors, bad configuration
 * - SurfaceUnavailable: drawing before a surface exists or after it is gone
 *
 * Unknown input events are not errors; the loop ignores them.
 */

import { turtleKeywords } from '../vocabulary/keywords'
import type { TurtleErrorCode } from '../vocabulary/keywords'

export class TurtleError extends Error {
  readonly code: TurtleErrorCode

  constructor(code: TurtleErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = code
    this.code = code
  }
}

export class InvalidArgumentError extends TurtleError {
  constructor(message: string, options?: ErrorOptions) {
    super(turtleKeywords.errors.invalidArgument, message, options)
  }
}

export class SurfaceUnavailableError extends TurtleError {
  constructor(message: string, options?: ErrorOptions) {
    super(turtleKeywords.errors.surfaceUnavailable, message, options)
  }
}

export const isTurtleError = (error: unknown): error is TurtleError =>
  error instanceof TurtleError

export const isSurfaceUnavailable = (
  error: unknown,
): error is SurfaceUnavailableError =>
  isTurtleError(error) && error.code === turtleKeywords.errors.surfaceUnavailable

export const isInvalidArgument = (
  error: unknown,
): error is InvalidArgumentError =>
  isTurtleError(error) && error.code === turtleKeywords.errors.invalidArgument
