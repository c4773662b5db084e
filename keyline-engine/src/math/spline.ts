// Keyframed splines of rigid transforms.
// Control points keep rotation as a unit quaternion.

import { mat3, quat, vec3 } from 'gl-matrix'
import type { ReadonlyQuat, ReadonlyVec3 } from 'gl-matrix'

import { type Frame, identityFrame } from './frame'

export type ExtrapolationMode = 'cyclic' | 'linear' | 'clamp'
export type InterpolationMode = 'linear' | 'cubic'

export interface PhysicsFrame {
  readonly rotation: ReadonlyQuat
  readonly translation: ReadonlyVec3
}

export interface FrameSpline {
  readonly control: readonly PhysicsFrame[]
  // Strictly increasing, one entry per control point
  readonly time: readonly number[]
  readonly extrapolationMode: ExtrapolationMode
  readonly interpolationMode: InterpolationMode
  // Cyclic splines only: time from the last control point back to the first.
  // Zero or negative means the average interval between control points.
  readonly finalInterval: number
}

export type FrameSplineOptions = Partial<Omit<FrameSpline, 'control'>>

export function physicsFrameFromFrame(frame: Frame): PhysicsFrame {
  const rotation = quat.fromMat3(quat.create(), frame.rotation)
  return { rotation: quat.normalize(rotation, rotation), translation: vec3.clone(frame.translation) }
}

export function physicsFrameToFrame(frame: PhysicsFrame): Frame {
  return {
    rotation: mat3.fromQuat(mat3.create(), frame.rotation),
    translation: vec3.clone(frame.translation),
  }
}

export function createFrameSpline(
  control: readonly PhysicsFrame[],
  options: FrameSplineOptions = {}
): FrameSpline {
  const time = options.time ?? control.map((_, i) => i)
  if (time.length !== control.length) {
    throw new RangeError(
      `Spline has ${control.length} control points but ${time.length} times`
    )
  }
  for (let i = 1; i < time.length; i++) {
    if (!(time[i] > time[i - 1])) {
      throw new RangeError(`Spline times must be strictly increasing (index ${i})`)
    }
  }
  return {
    control: [...control],
    time: [...time],
    extrapolationMode: options.extrapolationMode ?? 'cyclic',
    interpolationMode: options.interpolationMode ?? 'cubic',
    finalInterval: options.finalInterval ?? -1,
  }
}

export function constantSpline(frame: Frame): FrameSpline {
  return createFrameSpline([physicsFrameFromFrame(frame)])
}

function effectiveFinalInterval(spline: FrameSpline): number {
  const n = spline.time.length
  if (spline.finalInterval > 0) return spline.finalInterval
  if (n < 2) return 1
  return (spline.time[n - 1] - spline.time[0]) / (n - 1)
}

function positiveModulo(a: number, b: number): number {
  return ((a % b) + b) % b
}

export function evaluateSpline(spline: FrameSpline, t: number): Frame {
  const { control, time } = spline
  const n = control.length

  if (n === 0) return identityFrame()
  if (n === 1) return physicsFrameToFrame(control[0])

  const first = time[0]
  const last = time[n - 1]

  if (spline.extrapolationMode === 'cyclic') {
    const period = last - first + effectiveFinalInterval(spline)
    const s = first + positiveModulo(t - first, period)
    // Extended knot vector: the closing segment runs from the last control back to the first
    const knots = [...time, first + period]
    let i = n - 1
    while (i > 0 && knots[i] > s) i--
    const u = (s - knots[i]) / (knots[i + 1] - knots[i])
    return interpolate(spline, i, u)
  }

  if (t <= first) {
    if (spline.extrapolationMode === 'clamp' || t === first) return physicsFrameToFrame(control[0])
    return extrapolateLinearly(control[0], control[1], (t - first) / (time[1] - first), control[0])
  }

  if (t >= last) {
    if (spline.extrapolationMode === 'clamp' || t === last) {
      return physicsFrameToFrame(control[n - 1])
    }
    return extrapolateLinearly(
      control[n - 2],
      control[n - 1],
      (t - time[n - 2]) / (last - time[n - 2]),
      control[n - 1]
    )
  }

  let i = n - 2
  while (i > 0 && time[i] > t) i--
  return interpolate(spline, i, (t - time[i]) / (time[i + 1] - time[i]))
}

// Translation continues along the end segment; rotation holds at the end control point
function extrapolateLinearly(
  a: PhysicsFrame,
  b: PhysicsFrame,
  u: number,
  rotationSource: PhysicsFrame
): Frame {
  return {
    rotation: mat3.fromQuat(mat3.create(), rotationSource.rotation),
    translation: vec3.lerp(vec3.create(), a.translation, b.translation, u),
  }
}

function controlAt(spline: FrameSpline, index: number): PhysicsFrame {
  const n = spline.control.length
  if (spline.extrapolationMode === 'cyclic') {
    return spline.control[positiveModulo(index, n)]
  }
  return spline.control[Math.min(Math.max(index, 0), n - 1)]
}

// Interpolates segment i (control i to control i + 1) at parameter u in [0, 1]
function interpolate(spline: FrameSpline, i: number, u: number): Frame {
  const p1 = controlAt(spline, i)
  const p2 = controlAt(spline, i + 1)

  const rotation = quat.slerp(quat.create(), p1.rotation, p2.rotation, u)
  quat.normalize(rotation, rotation)

  let translation: vec3
  if (spline.interpolationMode === 'linear') {
    translation = vec3.lerp(vec3.create(), p1.translation, p2.translation, u)
  } else {
    translation = catmullRom(
      controlAt(spline, i - 1).translation,
      p1.translation,
      p2.translation,
      controlAt(spline, i + 2).translation,
      u
    )
  }

  return { rotation: mat3.fromQuat(mat3.create(), rotation), translation }
}

function catmullRom(
  p0: ReadonlyVec3,
  p1: ReadonlyVec3,
  p2: ReadonlyVec3,
  p3: ReadonlyVec3,
  u: number
): vec3 {
  const u2 = u * u
  const u3 = u2 * u
  const out = vec3.create()
  for (let k = 0; k < 3; k++) {
    out[k] =
      0.5 *
      (2 * p1[k] +
        (-p0[k] + p2[k]) * u +
        (2 * p0[k] - 5 * p1[k] + 4 * p2[k] - p3[k]) * u2 +
        (-p0[k] + 3 * p1[k] - 3 * p2[k] + p3[k]) * u3)
  }
  return out
}
