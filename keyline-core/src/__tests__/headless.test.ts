import { DependencyError } from '@keyline/engine'
import { describe, expect, it } from 'vitest'
import { sampleScene } from '../utils/headless'

const description = {
  entities: {
    Ship: { track: 'orbit(2, 4)' },
    Buoy: { frame: 'Point3(1, 0, 0)' },
  },
}

describe('sampleScene', () => {
  it('samples every loaded entity from the start time through the duration', () => {
    const samples = sampleScene({ description, duration: 4, step: 1 })

    expect(samples.map(sample => sample.time)).toEqual([0, 1, 2, 3, 4])
    expect(Object.keys(samples[0].frames)).toEqual(['Ship', 'Buoy'])
    expect(samples[1].frames.Ship.translation[0]).toBeCloseTo(2, 9)
    expect(samples[4].frames.Ship.translation[2]).toBeCloseTo(2, 9)
    expect(Array.from(samples[4].frames.Buoy.translation)).toEqual([1, 0, 0])
  })

  it('starts at the time the description gives', () => {
    const samples = sampleScene({ description: { ...description, time: 2 }, duration: 1, step: 0.5 })
    expect(samples.map(sample => sample.time)).toEqual([2, 2.5, 3])
  })

  it('records only the requested entities', () => {
    const samples = sampleScene({ description, duration: 0, step: 1, entities: ['Buoy'] })

    expect(samples).toHaveLength(1)
    expect(Object.keys(samples[0].frames)).toEqual(['Buoy'])
  })

  it('rejects unknown entities and bad steps', () => {
    expect(() => sampleScene({ description, duration: 1, step: 1, entities: ['Ghost'] })).toThrow(
      DependencyError
    )
    expect(() => sampleScene({ description, duration: 1, step: 0 })).toThrow(RangeError)
    expect(() => sampleScene({ description, duration: -1, step: 1 })).toThrow(RangeError)
  })
})
