import { afterEach, describe, expect, it, vi } from 'vitest'
import { ZodError } from 'zod'
import { DependencyError } from '../errors'
import { Entity } from './entity'
import { Scene } from './scene'
import { loadScene } from './scene-loader'

const harbor = {
  name: 'harbor',
  time: 1,
  entities: {
    Ship: { track: 'orbit(2, 4)' },
    Camera: { track: 'lookAt(entity("Ship", Point3(0, 2, 10)), entity("Ship"))' },
    Broken: { track: 'transform(entity("Ship"), nope)' },
    Buoy: { frame: 'Point3(1, 0, 0)', canChange: false },
  },
}

describe('loadScene', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('loads every entity whose track compiles and skips the rest', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const scene = new Scene()
    const result = loadScene(scene, harbor)

    expect(result.name).toBe('harbor')
    expect(result.loaded).toEqual(['Ship', 'Camera', 'Buoy'])
    expect(result.errors.map(({ entity, error }) => [entity, error.code])).toEqual([
      ['Broken', 'UnboundVariable'],
    ])
    expect(warn).toHaveBeenCalledWith('[loadScene] Skipping entity Broken: Unbound variable nope')
    expect(scene.entity('Broken')).toBeUndefined()
  })

  it('keeps the edges of loaded tracks only', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const scene = new Scene()
    loadScene(scene, harbor)

    expect(scene.hasOrder('Camera', 'Ship')).toBe(true)
    expect(scene.hasOrder('Broken', 'Ship')).toBe(false)
    expect(scene.entities.map(entity => entity.name)).toEqual(['Ship', 'Camera', 'Buoy'])
  })

  it('sets the initial frame, flags and time', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const scene = new Scene()
    loadScene(scene, { ...harbor, editing: true })

    const buoy = scene.entity('Buoy')
    const ship = scene.entity('Ship')
    expect(buoy).toBeInstanceOf(Entity)
    if (buoy instanceof Entity) {
      expect(buoy.canChange).toBe(false)
      expect(Array.from(buoy.frame.translation)).toEqual([1, 0, 0])
    }
    expect(scene.time).toBe(1)
    expect(scene.isEditing).toBe(true)
    expect(ship?.frame.translation[0]).toBeCloseTo(2, 9)
  })

  it('accepts tracks as expression trees', () => {
    const scene = new Scene()
    const result = loadScene(scene, {
      entities: { Ship: { track: { tag: 'orbit', args: [2, 4] } } },
    })

    expect(result.errors).toEqual([])
    expect(scene.entity('Ship')?.frame.translation[2]).toBeCloseTo(2, 9)
  })

  it('reports syntax errors as skipped entities', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const result = loadScene(new Scene(), { entities: { Ship: { track: 'orbit(1,' } } })

    expect(result.loaded).toEqual([])
    expect(result.errors[0]?.error.code).toBe('ParseError')
  })

  it('replaces what was loaded before', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const scene = new Scene()
    loadScene(scene, harbor)
    loadScene(scene, { entities: { Dock: {} } })

    expect(scene.entities.map(entity => entity.name)).toEqual(['Dock'])
    expect(scene.dependencies.isEmpty).toBe(true)
  })

  it('rejects a malformed description', () => {
    expect(() => loadScene(new Scene(), { entities: { Ship: { color: 'red' } } })).toThrow(ZodError)
    expect(() => loadScene(new Scene(), { time: 'noon', entities: {} })).toThrow(ZodError)
  })

  it('does not recover from impossible orderings', () => {
    const description = {
      entities: {
        A: { track: 'entity("B")' },
        B: { track: 'entity("A")' },
      },
    }
    expect(() => loadScene(new Scene(), description)).toThrow(DependencyError)
  })
})
