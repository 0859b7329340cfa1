/**
 * Turtle Loop Tests
 */

import { describe, expect, it, vi } from 'vitest'
import {
  InvalidArgumentError,
  SurfaceUnavailableError,
  createPalette,
  createTurtleState,
} from '@turtle-trails/turtle'
import type { InputEvent } from '@turtle-trails/turtle'
import { createRecordingSurface, createScene } from '@turtle-trails/rendering'
import { createScriptedInput } from '../input'
import type { InputSource } from '../input'
import { createTurtleLoop } from '../loop'
import { createTurtle } from '../turtle'

const config = {
  step: 10,
  angleStep: 90,
  pollTimeoutMs: 5,
  livenessIntervalMs: 1000,
}

// Hands events to the loop as-is, bypassing validation
const rawInput = (events: Array<InputEvent>): InputSource => {
  const queue = [...events]
  return {
    poll: async () => queue.shift() ?? null,
    dispose: () => {},
  }
}

const setup = (events: Array<InputEvent> = [], source?: InputSource) => {
  const palette = createPalette()
  const surface = createRecordingSurface()
  const scene = createScene({ surface, palette })
  const state = createTurtleState({ palette })
  scene.addTurtle({ id: 'main', getPose: state.getPose, getTrail: state.getTrail })
  const turtle = createTurtle({
    id: 'main',
    state,
    scene,
    step: config.step,
    angleStep: config.angleStep,
    isActive: () => true,
  })
  const input = createScriptedInput(source ? [] : events)
  const onError = vi.fn()
  const loop = createTurtleLoop({
    input: source ?? input,
    surface,
    scene,
    turtle,
    config,
    onError,
  })
  surface.resetCalls()

  return { surface, scene, turtle, input, loop, onError }
}

describe('createTurtleLoop', () => {
  it('should apply keyboard events until Quit', async () => {
    const { loop, turtle, surface } = setup([
      { type: 'MoveForward' },
      { type: 'TurnLeft' },
      { type: 'MoveForward' },
      { type: 'Quit' },
      { type: 'MoveForward' },
    ])

    const exit = await loop.run()

    expect(exit).toEqual({ reason: 'stopped' })
    expect(turtle.getTrail()).toHaveLength(2)
    expect(turtle.getPose().position.x).toBeCloseTo(10)
    expect(turtle.getPose().position.y).toBeCloseTo(10)
    expect(surface.count('drawSegment')).toBe(2)
    expect(loop.getStatus()).toBe('stopped')
  })

  it('should move backwards and turn right', async () => {
    const { loop, turtle } = setup([
      { type: 'TurnRight' },
      { type: 'MoveBackward' },
      { type: 'Quit' },
    ])

    await loop.run()

    expect(turtle.getPose().heading).toBe(270)
    expect(turtle.getPose().position.x).toBeCloseTo(0)
    expect(turtle.getPose().position.y).toBeCloseTo(10)
  })

  it('should handle pen, width and page events', async () => {
    const { loop, turtle, scene } = setup([
      { type: 'Wider' },
      { type: 'Wider' },
      { type: 'Narrower' },
      { type: 'CycleColor' },
      { type: 'CycleBackground' },
      { type: 'QuarterTurnLeft' },
      { type: 'FaceEast' },
      { type: 'TogglePen' },
      { type: 'Quit' },
    ])

    await loop.run()

    expect(turtle.getPose()).toMatchObject({
      width: 2,
      color: 'white',
      heading: 0,
      penDown: false,
    })
    expect(scene.getBackground()).toBe('blue')
  })

  it('should draw polygons and clear them', async () => {
    const { loop, turtle, surface } = setup([
      { type: 'Ngon', sides: 4 },
      { type: 'MoveForward' },
      { type: 'Clear' },
      { type: 'Quit' },
    ])

    await loop.run()

    expect(surface.count('drawSegment')).toBe(5)
    expect(surface.visibleSegments()).toEqual([])
    expect(turtle.getTrail()).toEqual([])
  })

  it('should reset the pose', async () => {
    const { loop, turtle, input } = setup([{ type: 'MoveForward' }, { type: 'TurnLeft' }])

    input.push({ type: 'Reset' }, { type: 'Quit' })
    await loop.run()

    expect(turtle.getPose()).toMatchObject({ position: { x: 0, y: 0 }, heading: 0 })
    expect(turtle.getTrail()).toEqual([])
  })

  it('should replay the trail on resize', async () => {
    const { loop, surface } = setup([
      { type: 'MoveForward' },
      { type: 'Resize', columns: 40, rows: 12 },
      { type: 'Quit' },
    ])

    await loop.run()

    expect(surface.size()).toEqual({ columns: 40, rows: 12 })
    expect(surface.count('clear')).toBe(1)
    expect(surface.visibleSegments()).toHaveLength(1)
  })

  it('should ignore unknown events', async () => {
    const unknown: InputEvent = JSON.parse('{"type":"Fly"}')
    const { loop, onError } = setup([], rawInput([unknown, { type: 'Quit' }]))

    const exit = await loop.run()

    expect(exit).toEqual({ reason: 'stopped' })
    expect(onError).not.toHaveBeenCalled()
  })

  it('should report bad events and keep going', async () => {
    const { loop, onError, turtle } = setup(
      [],
      rawInput([{ type: 'Ngon', sides: Number.NaN }, { type: 'MoveForward' }, { type: 'Quit' }]),
    )

    const exit = await loop.run()

    expect(exit).toEqual({ reason: 'stopped' })
    expect(onError).toHaveBeenCalledWith(expect.any(InvalidArgumentError))
    expect(turtle.getTrail()).toHaveLength(1)
  })

  it('should stop with an error when the surface disappears', async () => {
    const { loop, surface, onError } = setup([{ type: 'MoveForward' }])

    surface.destroy()
    const exit = await loop.run()

    expect(exit.reason).toBe('error')
    expect(exit.reason === 'error' && exit.error).toBeInstanceOf(SurfaceUnavailableError)
    expect(onError).toHaveBeenCalledTimes(1)
  })

  it('should check surface liveness while idle', async () => {
    const palette = createPalette()
    const surface = createRecordingSurface()
    const scene = createScene({ surface, palette })
    const state = createTurtleState({ palette })
    const turtle = createTurtle({
      id: 'main',
      state,
      scene,
      step: 10,
      angleStep: 90,
      isActive: () => true,
    })

    let polls = 0
    let clock = 0
    const input: InputSource = {
      poll: async () => {
        polls += 1
        if (polls === 6) loop.stop()
        return null
      },
      dispose: () => {},
    }
    const loop = createTurtleLoop({
      input,
      surface,
      scene,
      turtle,
      config,
      now: () => (clock += 600),
    })

    await loop.run()

    // afterPoll deltas of 600ms against a 1000ms interval: due at 1200, 2400, 3000
    expect(surface.count('pollLiveness')).toBe(3)
  })
})
