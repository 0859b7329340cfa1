/**
 * Mailbox
 *
 * Single-consumer queue with a cooperative poll.
 * Producers `put` items at any time; the consumer awaits `poll(timeoutMs)`,
 * which resolves with the next item or with null once the timeout elapses.
 *
 * This is the loop's only suspension point: a poll never blocks longer than
 * its timeout, so the consumer keeps getting control back even when nothing
 * arrives.
 */

export type Mailbox<T> = {
  /** Enqueue an item (wakes a pending poll) */
  put: (item: T) => void

  /**
   * Take the next item, waiting at most `timeoutMs`.
   * Resolves null on timeout or when the mailbox is closed.
   */
  poll: (timeoutMs: number) => Promise<T | null>

  /** Number of queued items */
  size: () => number

  /** Drop queued items and release a pending poll */
  close: () => void

  isClosed: () => boolean
}

type Waiter<T> = {
  resolve: (item: T | null) => void
  timer: ReturnType<typeof setTimeout>
}

export function createMailbox<T>(): Mailbox<T> {
  const queue: Array<T> = []
  let waiter: Waiter<T> | null = null
  let closed = false

  const release = (item: T | null) => {
    if (!waiter) return
    const { resolve, timer } = waiter
    waiter = null
    clearTimeout(timer)
    resolve(item)
  }

  return {
    put: (item) => {
      if (closed) return

      if (waiter) {
        release(item)
        return
      }

      queue.push(item)
    },

    poll: (timeoutMs) => {
      if (queue.length > 0) {
        return Promise.resolve(queue.shift() ?? null)
      }

      if (closed) {
        return Promise.resolve(null)
      }

      // A second concurrent poll supersedes the first
      release(null)

      return new Promise<T | null>((resolve) => {
        const timer = setTimeout(() => {
          waiter = null
          resolve(null)
        }, Math.max(0, timeoutMs))

        waiter = { resolve, timer }
      })
    },

    size: () => queue.length,

    close: () => {
      closed = true
      queue.length = 0
      release(null)
    },

    isClosed: () => closed,
  }
}
