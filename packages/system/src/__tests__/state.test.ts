import { describe, expect, it, vi } from 'vitest'
import { createAtom, createSubscription } from '@turtle-trails/system'

describe('createSubscription', () => {
  it('should notify subscribers until they unsubscribe', () => {
    const subscription = createSubscription<number>()
    const callback = vi.fn()

    const unsubscribe = subscription.subscribe(callback)
    subscription.notify(1)
    unsubscribe()
    subscription.notify(2)

    expect(callback).toHaveBeenCalledTimes(1)
    expect(callback).toHaveBeenCalledWith(1)
    expect(subscription.size()).toBe(0)
  })
})

describe('createAtom', () => {
  it('should update state and notify subscribers', () => {
    const atom = createAtom({ count: 0 })
    const callback = vi.fn()
    atom.subscribe(callback)

    atom.update((state) => ({ count: state.count + 1 }))
    atom.set({ count: 10 })

    expect(atom.get()).toEqual({ count: 10 })
    expect(callback).toHaveBeenNthCalledWith(1, { count: 1 })
    expect(callback).toHaveBeenNthCalledWith(2, { count: 10 })
  })
})
