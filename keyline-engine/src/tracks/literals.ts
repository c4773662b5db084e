// Geometric literals inside track expressions: points, rotations, full frames and
// keyframed splines. Every frame literal compiles to a SplineTrack.

import { mat3, quat, vec3 } from 'gl-matrix'
import type { ReadonlyMat3, ReadonlyQuat, ReadonlyVec3 } from 'gl-matrix'

import { TrackError } from '../errors'
import {
  type Frame,
  frameFromXYZYPRDegrees,
  frameFromXYZYPRRadians,
  identityFrame,
  rotationFromRowMajor,
  uprightFrame,
} from '../math/frame'
import {
  createFrameSpline,
  type ExtrapolationMode,
  type FrameSpline,
  type InterpolationMode,
  type PhysicsFrame,
  physicsFrameFromFrame,
} from '../math/spline'
import {
  describeExpression,
  isTaggedTable,
  isTaggedTuple,
  type TaggedTable,
  type TaggedTuple,
  type TrackExpression,
} from './expression'

// Order matters: the spline names must be tried before PFrame / PhysicsFrame
const SPLINE_PREFIXES = ['PhysicsFrameSpline', 'PFrameSpline', 'UprightSpline']
// Control frames of these splines lose their roll
const UPRIGHT_SPLINE_PREFIX = 'UprightSpline'
const FRAME_PREFIXES = [
  'Point3',
  'Vector3',
  'Matrix3',
  'Matrix4',
  'CFrame',
  'CoordinateFrame',
  'PFrame',
  'PhysicsFrame',
]

function tagIs(tag: string, prefixes: string[]): boolean {
  return prefixes.some(prefix => tag.startsWith(prefix))
}

export function isFrameLiteral(expression: TrackExpression): expression is TaggedTuple | TaggedTable {
  if (!isTaggedTuple(expression) && !isTaggedTable(expression)) return false
  const tag = expression.tag ?? ''
  return tagIs(tag, SPLINE_PREFIXES) || tagIs(tag, FRAME_PREFIXES)
}

function invalid(tag: string, message: string): TrackError {
  return new TrackError({ code: 'InvalidArgument', message: `${tag}: ${message}`, tag })
}

export function expectNumber(tag: string, expression: TrackExpression | undefined, what: string): number {
  if (typeof expression !== 'number' || !Number.isFinite(expression)) {
    throw invalid(tag, `${what} must be a finite number`)
  }
  return expression
}

function numbers(tag: string, args: TrackExpression[], min: number, max = min): number[] {
  if (args.length < min || args.length > max) {
    const count = min === max ? `${min}` : `${min} to ${max}`
    throw invalid(tag, `expected ${count} numbers, got ${args.length}`)
  }
  return args.map((arg, i) => expectNumber(tag, arg, `argument ${i + 1}`))
}

// Vector3(x, y, z), Point3(x, y, z) or a plain [x, y, z] list
export function parseVectorLiteral(expression: TrackExpression): ReadonlyVec3 {
  if (Array.isArray(expression)) {
    const [x, y, z] = numbers('vector', expression, 3)
    return vec3.fromValues(x, y, z)
  }
  if (isTaggedTuple(expression) && (expression.tag === 'Vector3' || expression.tag === 'Point3')) {
    const [x, y, z] = numbers(expression.tag, expression.args, 3)
    return vec3.fromValues(x, y, z)
  }
  throw invalid(describeExpression(expression), 'expected Vector3(x, y, z)')
}

function parseRotation(expression: TrackExpression): ReadonlyMat3 {
  if (isTaggedTuple(expression)) {
    if (expression.tag === 'Quat') {
      return mat3.fromQuat(mat3.create(), parseQuat(expression))
    }
    if (expression.tag.startsWith('Matrix3')) {
      return parseFrameTuple(expression).rotation
    }
  }
  throw invalid(describeExpression(expression), 'expected a Matrix3 or Quat rotation')
}

function parseQuat(expression: TaggedTuple): ReadonlyQuat {
  const [x, y, z, w] = numbers('Quat', expression.args, 4)
  const q = quat.fromValues(x, y, z, w)
  if (quat.length(q) === 0) throw invalid('Quat', 'quaternion must not be zero')
  return quat.normalize(q, q)
}

function parseFrameTuple(expression: TaggedTuple): Frame {
  const { tag, args } = expression
  switch (tag) {
    case 'Point3':
    case 'Vector3': {
      const [x, y, z] = numbers(tag, args, 3)
      return { rotation: mat3.create(), translation: vec3.fromValues(x, y, z) }
    }
    case 'Matrix3':
      return { rotation: rotationFromRowMajor(numbers(tag, args, 9)), translation: vec3.create() }
    case 'Matrix3::identity':
    case 'Matrix4::identity':
    case 'CFrame':
    case 'CoordinateFrame':
    case 'PFrame':
    case 'PhysicsFrame':
      if (args.length === 0) return identityFrame()
      if (tag === 'PFrame' || tag === 'PhysicsFrame') {
        if (args.length !== 2) throw invalid(tag, 'expected (rotation, translation)')
        return { rotation: parseRotation(args[0]), translation: parseVectorLiteral(args[1]) }
      }
      throw invalid(tag, 'expected no arguments')
    case 'Matrix3::fromAxisAngle': {
      if (args.length !== 2) throw invalid(tag, 'expected (axis, angle)')
      const axis = vec3.normalize(vec3.create(), parseVectorLiteral(args[0]))
      const q = quat.setAxisAngle(quat.create(), axis, expectNumber(tag, args[1], 'angle'))
      return { rotation: mat3.fromQuat(mat3.create(), q), translation: vec3.create() }
    }
    case 'Matrix4': {
      const m = numbers(tag, args, 16)
      return {
        rotation: rotationFromRowMajor([m[0], m[1], m[2], m[4], m[5], m[6], m[8], m[9], m[10]]),
        translation: vec3.fromValues(m[3], m[7], m[11]),
      }
    }
    case 'Matrix4::translation': {
      const [x, y, z] = numbers(tag, args, 3)
      return { rotation: mat3.create(), translation: vec3.fromValues(x, y, z) }
    }
    case 'CFrame::fromXYZYPRDegrees':
    case 'CoordinateFrame::fromXYZYPRDegrees': {
      const [x, y, z, yaw, pitch, roll] = numbers(tag, args, 3, 6)
      return frameFromXYZYPRDegrees(x, y, z, yaw, pitch, roll)
    }
    case 'CFrame::fromXYZYPRRadians':
    case 'CoordinateFrame::fromXYZYPRRadians': {
      const [x, y, z, yaw, pitch, roll] = numbers(tag, args, 3, 6)
      return frameFromXYZYPRRadians(x, y, z, yaw, pitch, roll)
    }
    default:
      throw new TrackError({
        code: 'UnrecognizedExpression',
        message: `Unrecognized frame literal ${tag}`,
        tag,
      })
  }
}

// CFrame { rotation = ..., translation = ... } and the PFrame equivalent
function parseFrameTable(expression: TaggedTable): Frame {
  const tag = expression.tag ?? 'CFrame'
  let rotation: ReadonlyMat3 = mat3.create()
  let translation: ReadonlyVec3 = vec3.create()
  for (const [key, value] of Object.entries(expression.fields)) {
    switch (key.toLowerCase()) {
      case 'rotation':
        rotation = parseRotation(value)
        break
      case 'translation':
        translation = parseVectorLiteral(value)
        break
      default:
        throw invalid(tag, `illegal table key ${key}`)
    }
  }
  return { rotation, translation }
}

export function parseFrameLiteral(expression: TrackExpression): Frame {
  if (isTaggedTuple(expression) && tagIs(expression.tag, FRAME_PREFIXES)) {
    return parseFrameTuple(expression)
  }
  if (isTaggedTable(expression) && tagIs(expression.tag ?? '', FRAME_PREFIXES)) {
    return parseFrameTable(expression)
  }
  throw invalid(describeExpression(expression), 'expected a frame literal')
}

function parseMode<T extends string>(tag: string, value: TrackExpression, allowed: readonly T[]): T {
  if (typeof value === 'string') {
    // Accept both "clamp" and SplineExtrapolationMode::CLAMP
    const name = value.slice(value.lastIndexOf(':') + 1).toLowerCase()
    const match = allowed.find(mode => mode === name)
    if (match) return match
  }
  throw invalid(tag, `expected one of ${allowed.join(', ')}`)
}

const EXTRAPOLATION_MODES: readonly ExtrapolationMode[] = ['cyclic', 'linear', 'clamp']
const INTERPOLATION_MODES: readonly InterpolationMode[] = ['linear', 'cubic']

function controlPoint(tag: string, expression: TrackExpression): PhysicsFrame {
  const frame = parseFrameLiteral(expression)
  return physicsFrameFromFrame(tag.startsWith(UPRIGHT_SPLINE_PREFIX) ? uprightFrame(frame) : frame)
}

function parseSplineTable(expression: TaggedTable): FrameSpline {
  const tag = expression.tag ?? 'PhysicsFrameSpline'
  let control: PhysicsFrame[] = []
  let time: number[] | undefined
  let extrapolationMode: ExtrapolationMode | undefined
  let interpolationMode: InterpolationMode | undefined
  let finalInterval: number | undefined
  let cyclic: boolean | undefined

  for (const [key, value] of Object.entries(expression.fields)) {
    switch (key) {
      case 'control':
        if (!Array.isArray(value)) throw invalid(tag, 'control must be a list of frames')
        control = value.map(frame => controlPoint(tag, frame))
        break
      case 'time':
        if (!Array.isArray(value)) throw invalid(tag, 'time must be a list of numbers')
        time = value.map((t, i) => expectNumber(tag, t, `time ${i + 1}`))
        break
      case 'extrapolationMode':
        extrapolationMode = parseMode(tag, value, EXTRAPOLATION_MODES)
        break
      case 'interpolationMode':
        interpolationMode = parseMode(tag, value, INTERPOLATION_MODES)
        break
      case 'finalInterval':
        finalInterval = expectNumber(tag, value, 'finalInterval')
        break
      case 'cyclic':
        if (typeof value !== 'boolean') throw invalid(tag, 'cyclic must be true or false')
        cyclic = value
        break
      default:
        throw invalid(tag, `illegal table key ${key}`)
    }
  }

  // The older boolean form picks between cyclic and linear extrapolation
  if (extrapolationMode === undefined && cyclic !== undefined) {
    extrapolationMode = cyclic ? 'cyclic' : 'linear'
  }

  try {
    return createFrameSpline(control, { time, extrapolationMode, interpolationMode, finalInterval })
  } catch (error) {
    if (error instanceof RangeError) throw invalid(tag, error.message)
    throw error
  }
}

// Any frame literal; a plain frame becomes a single-control (constant) spline
export function parseSplineLiteral(expression: TaggedTuple | TaggedTable): FrameSpline {
  const tag = expression.tag ?? ''
  if (tagIs(tag, SPLINE_PREFIXES)) {
    if (isTaggedTable(expression)) return parseSplineTable(expression)
    // PhysicsFrameSpline(frame, frame, ...) with one time unit between controls
    const control = expression.args.map(frame => controlPoint(tag, frame))
    return createFrameSpline(control)
  }
  return createFrameSpline([physicsFrameFromFrame(parseFrameLiteral(expression))])
}
