import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMailbox } from '@turtle-trails/system'

describe('createMailbox', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should return queued items in order without waiting', async () => {
    const mailbox = createMailbox<number>()
    mailbox.put(1)
    mailbox.put(2)

    expect(mailbox.size()).toBe(2)
    await expect(mailbox.poll(100)).resolves.toBe(1)
    await expect(mailbox.poll(100)).resolves.toBe(2)
    expect(mailbox.size()).toBe(0)
  })

  it('should resolve null when the timeout elapses', async () => {
    const mailbox = createMailbox<number>()
    const pending = mailbox.poll(50)

    await vi.advanceTimersByTimeAsync(50)

    await expect(pending).resolves.toBe(null)
  })

  it('should wake a pending poll when an item arrives', async () => {
    const mailbox = createMailbox<string>()
    const pending = mailbox.poll(1000)

    await vi.advanceTimersByTimeAsync(10)
    mailbox.put('hello')

    await expect(pending).resolves.toBe('hello')
    expect(mailbox.size()).toBe(0)
  })

  it('should release a pending poll with null on close', async () => {
    const mailbox = createMailbox<string>()
    const pending = mailbox.poll(1000)

    mailbox.close()

    await expect(pending).resolves.toBe(null)
    expect(mailbox.isClosed()).toBe(true)
  })

  it('should drop items put after close', async () => {
    const mailbox = createMailbox<string>()
    mailbox.put('kept')
    mailbox.close()
    mailbox.put('dropped')

    expect(mailbox.size()).toBe(0)
    await expect(mailbox.poll(10)).resolves.toBe(null)
  })

  it('should supersede an earlier poll with a later one', async () => {
    const mailbox = createMailbox<string>()
    const first = mailbox.poll(1000)
    const second = mailbox.poll(1000)

    mailbox.put('item')

    await expect(first).resolves.toBe(null)
    await expect(second).resolves.toBe('item')
  })
})
