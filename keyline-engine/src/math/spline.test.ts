import type { ReadonlyVec3 } from 'gl-matrix'
import { describe, expect, it } from 'vitest'
import { frameFromTranslation, framesApproxEqual, identityFrame } from './frame'
import {
  createFrameSpline,
  evaluateSpline,
  type FrameSplineOptions,
  physicsFrameFromFrame,
} from './spline'

function expectVec(actual: ReadonlyVec3, expected: [number, number, number]) {
  expect(actual[0]).toBeCloseTo(expected[0], 9)
  expect(actual[1]).toBeCloseTo(expected[1], 9)
  expect(actual[2]).toBeCloseTo(expected[2], 9)
}

function xSpline(xs: number[], options: FrameSplineOptions = {}) {
  return createFrameSpline(
    xs.map(x => physicsFrameFromFrame(frameFromTranslation(x, 0, 0))),
    options
  )
}

describe('FrameSpline', () => {
  it('defaults to cyclic cubic splines with one time unit per control', () => {
    const spline = xSpline([0, 1, 2])
    expect(spline.time).toEqual([0, 1, 2])
    expect(spline.extrapolationMode).toBe('cyclic')
    expect(spline.interpolationMode).toBe('cubic')
    expect(spline.finalInterval).toBe(-1)
  })

  it('rejects mismatched and non-increasing times', () => {
    expect(() => xSpline([0, 1], { time: [0] })).toThrow(RangeError)
    expect(() => xSpline([0, 1], { time: [1, 1] })).toThrow(RangeError)
  })

  it('evaluates to identity without control points and constant with one', () => {
    expect(framesApproxEqual(evaluateSpline(xSpline([]), 3), identityFrame())).toBe(true)
    expectVec(evaluateSpline(xSpline([5]), -100).translation, [5, 0, 0])
    expectVec(evaluateSpline(xSpline([5]), 100).translation, [5, 0, 0])
  })

  describe('interpolation', () => {
    it('passes through control points', () => {
      const spline = xSpline([0, 2, 7], { extrapolationMode: 'clamp' })
      expectVec(evaluateSpline(spline, 0).translation, [0, 0, 0])
      expectVec(evaluateSpline(spline, 1).translation, [2, 0, 0])
      expectVec(evaluateSpline(spline, 2).translation, [7, 0, 0])
    })

    it('is linear between controls in linear mode', () => {
      const spline = xSpline([0, 1, 3], {
        time: [0, 1, 3],
        extrapolationMode: 'clamp',
        interpolationMode: 'linear',
      })
      expectVec(evaluateSpline(spline, 2).translation, [2, 0, 0])
    })

    it('hits the midpoint of a symmetric cubic segment', () => {
      const spline = xSpline([0, 2], { extrapolationMode: 'clamp' })
      expectVec(evaluateSpline(spline, 0.5).translation, [1, 0, 0])
    })
  })

  describe('extrapolation', () => {
    it('clamps to the end controls', () => {
      const spline = xSpline([0, 2], { extrapolationMode: 'clamp' })
      expectVec(evaluateSpline(spline, -1).translation, [0, 0, 0])
      expectVec(evaluateSpline(spline, 5).translation, [2, 0, 0])
    })

    it('continues the end segments linearly', () => {
      const spline = xSpline([0, 2], { extrapolationMode: 'linear' })
      expectVec(evaluateSpline(spline, 2).translation, [4, 0, 0])
      expectVec(evaluateSpline(spline, -1).translation, [-2, 0, 0])
    })

    it('wraps cyclic splines with the average interval as the closing segment', () => {
      const spline = xSpline([0, 2])
      // period 2: control 0 at t = 0, control 1 at t = 1, back to control 0 at t = 2
      expectVec(evaluateSpline(spline, 1.5).translation, [1, 0, 0])
      expectVec(evaluateSpline(spline, 2).translation, [0, 0, 0])
      expectVec(evaluateSpline(spline, -0.5).translation, [1, 0, 0])
    })

    it('uses an explicit final interval', () => {
      const spline = xSpline([0, 2], { finalInterval: 3, interpolationMode: 'linear' })
      // closing segment runs from t = 1 to t = 4
      expectVec(evaluateSpline(spline, 2.5).translation, [1, 0, 0])
      expectVec(evaluateSpline(spline, 4).translation, [0, 0, 0])
    })
  })
})
