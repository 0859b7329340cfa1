/**
 * Throttled Executor
 *
 * Fixed-interval check for periodic housekeeping inside a loop
 * (liveness signals, status refreshes).
 * Time is fed in as deltas, so the executor never reads a clock itself.
 *
 * @example
 * const liveness = createThrottledExecutor('liveness', { intervalMs: 1000 })
 * if (liveness.shouldExecute(deltaMs)) {
 *   surface.pollLiveness()
 *   liveness.recordExecution()
 * }
 */

import registerDebug from 'debug'
import { createAtom } from './state'

const debug = registerDebug('turtle-trails:frame-rater')

const ONE_SECOND_MS = 1000

export type ThrottledConfig = {
  intervalMs: number // How often to execute (e.g., 1000 for 1Hz)
}

export type ExecutorMetrics = {
  frequency: number // Executions per second at the configured interval
  executionCount: number
  accumulatedTime: number // Time since the last due execution
}

type ThrottledState = {
  config: ThrottledConfig
  metrics: ExecutorMetrics
  accumulator: number
}

export type ThrottledExecutor = {
  getConfig: () => ThrottledConfig

  setConfig: (config: Partial<ThrottledConfig>) => void

  /**
   * Check if enough time has passed to execute
   * Uses loop time (deltaMs) rather than wall-clock time
   */
  shouldExecute: (deltaMs: number) => boolean

  recordExecution: () => void

  getMetrics: () => ExecutorMetrics

  reset: () => void
}

const initialMetrics = (config: ThrottledConfig): ExecutorMetrics => ({
  frequency: ONE_SECOND_MS / config.intervalMs,
  executionCount: 0,
  accumulatedTime: 0,
})

export function createThrottledExecutor(
  name: string,
  config: ThrottledConfig,
): ThrottledExecutor {
  const stateAtom = createAtom<ThrottledState>({
    config,
    metrics: initialMetrics(config),
    accumulator: 0,
  })

  debug(
    '[%s] Throttled executor: %dms interval (%s Hz)',
    name,
    config.intervalMs,
    (ONE_SECOND_MS / config.intervalMs).toFixed(2),
  )

  return {
    getConfig: () => stateAtom.get().config,

    setConfig: (newConfig) => {
      stateAtom.update((state) => ({
        ...state,
        config: { ...state.config, ...newConfig },
      }))
    },

    shouldExecute: (deltaMs: number) => {
      let shouldExecute = false

      stateAtom.update((state) => {
        const newAccumulator = state.accumulator + Math.max(0, deltaMs)

        if (newAccumulator >= state.config.intervalMs) {
          shouldExecute = true
          return {
            ...state,
            // Long stalls collapse into one execution
            accumulator: newAccumulator % state.config.intervalMs,
          }
        }

        return {
          ...state,
          accumulator: newAccumulator,
        }
      })

      return shouldExecute
    },

    recordExecution: () => {
      stateAtom.update((state) => ({
        ...state,
        metrics: {
          frequency: ONE_SECOND_MS / state.config.intervalMs,
          executionCount: state.metrics.executionCount + 1,
          accumulatedTime: state.accumulator,
        },
      }))
    },

    getMetrics: () => stateAtom.get().metrics,

    reset: () => {
      stateAtom.update((state) => ({
        ...state,
        metrics: initialMetrics(state.config),
        accumulator: 0,
      }))
    },
  }
}
