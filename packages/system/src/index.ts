/**
 * @turtle-trails/system
 *
 * Generic loop infrastructure for interactive drawing programs.
 * Framework-agnostic, no rendering or input assumptions.
 *
 * ## Modules
 *
 * ### State Management
 * Lightweight atoms and subscriptions for reactive state.
 *
 * ### Mailbox
 * Single-consumer queue with a cooperative poll-with-timeout.
 *
 * ### Render Loop
 * Poll, handle, housekeep, repeat; running until stopped.
 *
 * ### Throttled Executor
 * Fixed-interval housekeeping driven by loop deltas.
 *
 * @example
 * ```ts
 * import { createMailbox, createRenderLoop } from '@turtle-trails/system'
 *
 * const inbox = createMailbox<string>()
 * const loop = createRenderLoop({
 *   createContext: () => ({ inbox }),
 *   poll: (ctx, timeoutMs) => ctx.inbox.poll(timeoutMs),
 *   handleEvent: (_ctx, event) => {
 *     if (event === 'quit') loop.stop()
 *   },
 * })
 *
 * inbox.put('quit')
 * await loop.start()
 * ```
 */

// ============================================================================
// State Management
// ============================================================================

export * from './state'

// ============================================================================
// Mailbox
// ============================================================================

export * from './mailbox'

// ============================================================================
// Render Loop
// ============================================================================

export * from './renderLoop'

// ============================================================================
// Throttled Executor
// ============================================================================

export * from './frameRater'
