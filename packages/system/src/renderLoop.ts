/**
 * Cooperative Render Loop
 *
 * A reusable loop for any poll-driven interactive system (terminal canvas,
 * scripted sessions, test harnesses).
 * Each iteration polls one event with a short timeout, hands it to the
 * handler, then runs housekeeping even when nothing arrived.
 *
 * Philosophy:
 * - Generic context and event types
 * - One suspension point (the poll), no parallelism
 * - Two states worth naming: running and stopped (stopped is terminal)
 * - Errors go through a single handler; fatal ones end the loop
 */

import registerDebug from 'debug'

const debug = registerDebug('turtle-trails:render-loop')

export type LoopStatus = 'idle' | 'running' | 'stopped'

export type LoopExit =
  | { reason: 'stopped' }
  | { reason: 'error'; error: Error }

export type RenderLoopOptions<TContext, TEvent> = {
  /**
   * Factory function to create the loop context
   * Called once when the loop starts
   */
  createContext: () => TContext

  /**
   * Wait for the next event, at most `timeoutMs`.
   * Resolve null when nothing arrived in time.
   * A rejected poll is treated as fatal (the input source is gone).
   */
  poll: (context: TContext, timeoutMs: number) => Promise<TEvent | null>

  /**
   * Apply one event (only called for non-null polls)
   */
  handleEvent: (context: TContext, event: TEvent) => void

  /**
   * Optional hook called after every poll, with or without an event
   * Use for periodic housekeeping (liveness, metrics)
   */
  afterPoll?: (context: TContext, timestamp: number, deltaMs: number) => void

  /**
   * Optional error handler
   * Called when handleEvent or afterPoll throws
   */
  onError?: (error: Error) => void

  /**
   * Errors for which this returns true stop the loop
   */
  isFatal?: (error: Error) => boolean

  /** Poll timeout in milliseconds (default 50) */
  pollTimeoutMs?: number

  /** Clock used for deltas (default Date.now) */
  now?: () => number
}

export type RenderLoopAPI<TContext = unknown> = {
  /**
   * Start the loop and resolve when it exits.
   * Calling it again returns the same exit promise; a stopped loop
   * never runs again.
   */
  start: () => Promise<LoopExit>

  /**
   * Request termination
   * The loop exits after the current poll returns
   */
  stop: () => void

  isRunning: () => boolean

  isStopped: () => boolean

  getStatus: () => LoopStatus

  /**
   * Get the current context
   * Returns null if loop hasn't started yet
   */
  getContext: () => TContext | null
}

const DEFAULT_POLL_TIMEOUT_MS = 50

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))

/**
 * Create a cooperative render loop
 *
 * @example
 * ```typescript
 * const loop = createRenderLoop({
 *   createContext: () => ({ queue }),
 *   poll: (context, timeoutMs) => context.queue.poll(timeoutMs),
 *   handleEvent: (context, event) => {
 *     if (event.type === 'quit') loop.stop()
 *   },
 * })
 *
 * const exit = await loop.start()
 * ```
 */
export function createRenderLoop<TContext, TEvent>(
  options: RenderLoopOptions<TContext, TEvent>,
): RenderLoopAPI<TContext> {
  const {
    createContext,
    poll,
    handleEvent,
    afterPoll,
    onError,
    isFatal,
    pollTimeoutMs = DEFAULT_POLL_TIMEOUT_MS,
    now = Date.now,
  } = options

  // State
  let status: LoopStatus = 'idle'
  let context: TContext | null = null
  let exit: Promise<LoopExit> | null = null

  const report = (error: Error) => {
    if (onError) {
      onError(error)
    } else {
      debug('Error in render loop: %O', error)
    }
  }

  const finish = (result: LoopExit): LoopExit => {
    status = 'stopped'
    debug('Loop exited (%s)', result.reason)
    return result
  }

  const run = async (ctx: TContext): Promise<LoopExit> => {
    let lastTimestamp = now()

    while (status === 'running') {
      let event: TEvent | null
      try {
        event = await poll(ctx, pollTimeoutMs)
      } catch (caught) {
        const error = toError(caught)
        report(error)
        return finish({ reason: 'error', error })
      }

      // stop() may have been called while we were waiting
      if (status !== 'running') break

      try {
        if (event !== null) {
          handleEvent(ctx, event)
          if (status !== 'running') break
        }

        const timestamp = now()
        afterPoll?.(ctx, timestamp, timestamp - lastTimestamp)
        lastTimestamp = timestamp
      } catch (caught) {
        const error = toError(caught)
        report(error)
        if (isFatal?.(error)) {
          return finish({ reason: 'error', error })
        }
      }
    }

    return finish({ reason: 'stopped' })
  }

  const start = () => {
    if (exit) return exit

    if (status === 'stopped') {
      exit = Promise.resolve<LoopExit>({ reason: 'stopped' })
      return exit
    }

    context = createContext()
    status = 'running'
    debug('Loop started (poll timeout %dms)', pollTimeoutMs)

    exit = run(context)
    return exit
  }

  const stop = () => {
    if (status === 'stopped') return
    status = 'stopped'
  }

  return {
    start,
    stop,
    isRunning: () => status === 'running',
    isStopped: () => status === 'stopped',
    getStatus: () => status,
    getContext: () => context,
  }
}
