import { beforeEach, describe, expect, it } from 'vitest'
import {
  SurfaceUnavailableError,
  applyCommand,
  createPalette,
  createTurtleState,
} from '@turtle-trails/turtle'
import type { TurtleState } from '@turtle-trails/turtle'
import { createRecordingSurface, createScene } from '@turtle-trails/rendering'
import type { RecordingSurface, Scene } from '@turtle-trails/rendering'

const asSceneTurtle = (id: string, state: TurtleState) => ({
  id,
  getPose: state.getPose,
  getTrail: state.getTrail,
})

describe('createScene', () => {
  let surface: RecordingSurface
  let scene: Scene
  let state: TurtleState

  beforeEach(() => {
    const palette = createPalette()
    surface = createRecordingSurface()
    scene = createScene({ surface, palette })
    state = createTurtleState({ palette })
    scene.addTurtle(asSceneTurtle('main', state))
    surface.resetCalls()
  })

  it('should draw exactly one segment per move', () => {
    for (let i = 0; i < 5; i++) {
      scene.commit('main', applyCommand(state, { type: 'move', distance: 10 }))
      applyCommand(state, { type: 'turn', degrees: 30 })
    }

    expect(surface.count('drawSegment')).toBe(5)
    expect(surface.count('clear')).toBe(0)
    expect(surface.count('present')).toBe(5)
  })

  it('should replay the whole trail on redrawAll', () => {
    for (let i = 0; i < 4; i++) {
      scene.commit('main', applyCommand(state, { type: 'move', distance: 10 }))
    }
    surface.resetCalls()

    scene.redrawAll()

    expect(surface.count('clear')).toBe(1)
    expect(surface.count('drawSegment')).toBe(4)
    expect(surface.visibleSegments()).toHaveLength(state.getTrail().length)
  })

  it('should hand resolved colors to the surface', () => {
    applyCommand(state, { type: 'setColor', color: 'purple' })
    scene.commit('main', applyCommand(state, { type: 'move', distance: 2 }))

    expect(surface.visibleSegments()[0]).toMatchObject({
      color: '#cc00ff',
      start: { x: 0, y: 0 },
      end: { x: 2, y: 0 },
    })
  })

  it('should move the cursor after a turn without drawing', () => {
    scene.commit('main', applyCommand(state, { type: 'turn', degrees: 90 }))

    expect(surface.calls()).toEqual([
      {
        type: 'setCursor',
        id: 'main',
        position: { x: 0, y: 0 },
        heading: 90,
        color: '#ff0000',
      },
      { type: 'present' },
    ])
  })

  it('should wipe the picture when a command clears the trail', () => {
    scene.commit('main', applyCommand(state, { type: 'move', distance: 10 }))

    scene.commit('main', applyCommand(state, { type: 'clear' }))

    expect(surface.visibleSegments()).toEqual([])
    expect(scene.getStats().fullRedraws).toBe(2)
  })

  it('should cycle the background through the palette', () => {
    expect(scene.getBackground()).toBe('black')

    expect(scene.cycleBackground()).toBe('blue')
    expect(surface.background()).toBe('#0000ff')
  })

  it('should replay trails after a resize', () => {
    scene.commit('main', applyCommand(state, { type: 'move', distance: 10 }))

    scene.resize({ columns: 40, rows: 12 })

    expect(surface.size()).toEqual({ columns: 40, rows: 12 })
    expect(surface.visibleSegments()).toHaveLength(1)
  })

  it('should draw every registered turtle', () => {
    const other = createTurtleState()
    other.move(5)
    scene.addTurtle(asSceneTurtle('other', other))
    scene.commit('main', applyCommand(state, { type: 'move', distance: 10 }))
    surface.resetCalls()

    scene.redrawAll()

    expect(surface.count('drawSegment')).toBe(2)
    expect(surface.count('setCursor')).toBe(2)
  })

  it('should replay trails in the order they were drawn', () => {
    const other = createTurtleState()
    scene.addTurtle(asSceneTurtle('other', other))

    scene.commit('main', applyCommand(state, { type: 'move', distance: 10 }))
    scene.commit('other', applyCommand(other, { type: 'moveTo', x: 0, y: 10 }))
    scene.commit('main', applyCommand(state, { type: 'moveTo', x: 10, y: 10 }))

    scene.redrawAll()

    expect(surface.visibleSegments().map((segment) => segment.end)).toEqual([
      { x: 10, y: 0 },
      { x: 0, y: 10 },
      { x: 10, y: 10 },
    ])
  })

  it('should drop the cursor of an unregistered turtle', () => {
    const other = createTurtleState()
    const remove = scene.addTurtle(asSceneTurtle('other', other))
    surface.resetCalls()

    remove()

    expect(surface.calls()[0]).toEqual({ type: 'removeCursor', id: 'other' })
  })

  it('should refuse to draw once the surface is gone', () => {
    surface.destroy()

    expect(() =>
      scene.commit('main', applyCommand(state, { type: 'move', distance: 10 })),
    ).toThrow(SurfaceUnavailableError)
  })
})
