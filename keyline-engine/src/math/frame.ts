// Rigid transforms ("frames") built on gl-matrix.
// Rotations are column-major 3x3 matrices; a frame maps object space to world space.

import { glMatrix, mat3, quat, vec3 } from 'gl-matrix'
import type { ReadonlyMat3, ReadonlyVec3 } from 'gl-matrix'
import { isEqual } from 'lodash'

import { FRAME_EPSILON } from '../globals'

// Plain double-precision arrays instead of Float32Array
glMatrix.setMatrixArrayType(Array)

export type SimTime = number

export interface Frame {
  readonly rotation: ReadonlyMat3
  readonly translation: ReadonlyVec3
}

export const UNIT_X: ReadonlyVec3 = vec3.fromValues(1, 0, 0)
export const UNIT_Y: ReadonlyVec3 = vec3.fromValues(0, 1, 0)
export const UNIT_Z: ReadonlyVec3 = vec3.fromValues(0, 0, 1)

export function identityFrame(): Frame {
  return { rotation: mat3.create(), translation: vec3.create() }
}

export function createFrame(rotation: ReadonlyMat3, translation: ReadonlyVec3): Frame {
  return { rotation: mat3.clone(rotation), translation: vec3.clone(translation) }
}

export function frameFromTranslation(x: number, y: number, z: number): Frame {
  return { rotation: mat3.create(), translation: vec3.fromValues(x, y, z) }
}

// Matrix3 literals are written row by row
export function rotationFromRowMajor(m: readonly number[]): ReadonlyMat3 {
  return mat3.fromValues(m[0], m[3], m[6], m[1], m[4], m[7], m[2], m[5], m[8])
}

// Yaw about +Y, then pitch about +X, then roll about +Z
export function rotationFromYawPitchRoll(yaw: number, pitch: number, roll: number): ReadonlyMat3 {
  const q = quat.setAxisAngle(quat.create(), UNIT_Y, yaw)
  quat.multiply(q, q, quat.setAxisAngle(quat.create(), UNIT_X, pitch))
  quat.multiply(q, q, quat.setAxisAngle(quat.create(), UNIT_Z, roll))
  return mat3.fromQuat(mat3.create(), q)
}

export function frameFromXYZYPRRadians(
  x: number,
  y: number,
  z: number,
  yaw = 0,
  pitch = 0,
  roll = 0
): Frame {
  return {
    rotation: rotationFromYawPitchRoll(yaw, pitch, roll),
    translation: vec3.fromValues(x, y, z),
  }
}

export function frameFromXYZYPRDegrees(
  x: number,
  y: number,
  z: number,
  yaw = 0,
  pitch = 0,
  roll = 0
): Frame {
  const toRadian = glMatrix.toRadian
  return frameFromXYZYPRRadians(x, y, z, toRadian(yaw), toRadian(pitch), toRadian(roll))
}

// a * b: b expressed in a's object space
export function multiplyFrames(a: Frame, b: Frame): Frame {
  const translation = vec3.transformMat3(vec3.create(), b.translation, a.rotation)
  vec3.add(translation, translation, a.translation)
  return {
    rotation: mat3.multiply(mat3.create(), a.rotation, b.rotation),
    translation,
  }
}

export function transformPoint(frame: Frame, point: ReadonlyVec3): ReadonlyVec3 {
  const out = vec3.transformMat3(vec3.create(), point, frame.rotation)
  return vec3.add(out, out, frame.translation)
}

// Keeps the translation and turns the frame so that its -Z axis faces target
export function lookAt(frame: Frame, target: ReadonlyVec3, up: ReadonlyVec3 = UNIT_Y): Frame {
  const look = vec3.subtract(vec3.create(), target, frame.translation)
  if (vec3.squaredLength(look) === 0) {
    return frame
  }
  vec3.normalize(look, look)

  let upDirection = vec3.normalize(vec3.create(), up)
  // A zero up vector is as useless as one parallel to the view direction
  if (vec3.squaredLength(upDirection) === 0 || Math.abs(vec3.dot(look, upDirection)) > 0.99) {
    upDirection = vec3.clone(UNIT_X)
    if (Math.abs(vec3.dot(look, upDirection)) > 0.99) {
      upDirection = vec3.clone(UNIT_Y)
    }
  }
  vec3.scaleAndAdd(upDirection, upDirection, look, -vec3.dot(look, upDirection))
  vec3.normalize(upDirection, upDirection)

  const z = vec3.negate(vec3.create(), look)
  const x = vec3.cross(vec3.create(), z, upDirection)
  vec3.normalize(x, vec3.negate(x, x))
  const y = vec3.cross(vec3.create(), z, x)

  return {
    rotation: mat3.fromValues(x[0], x[1], x[2], y[0], y[1], y[2], z[0], z[1], z[2]),
    translation: vec3.clone(frame.translation),
  }
}

// Same position and heading with the roll taken out, so +X stays level
export function uprightFrame(frame: Frame): Frame {
  const forward = vec3.transformMat3(vec3.create(), vec3.fromValues(0, 0, -1), frame.rotation)
  return lookAt(frame, vec3.add(forward, forward, frame.translation))
}

export function framesEqual(a: Frame, b: Frame): boolean {
  return isEqual(Array.from(a.rotation), Array.from(b.rotation)) &&
    isEqual(Array.from(a.translation), Array.from(b.translation))
}

export function framesApproxEqual(a: Frame, b: Frame, epsilon = FRAME_EPSILON): boolean {
  return mat3EqualsWithin(a.rotation, b.rotation, epsilon) &&
    vec3.distance(a.translation, b.translation) <= epsilon
}

function mat3EqualsWithin(a: ReadonlyMat3, b: ReadonlyMat3, epsilon: number): boolean {
  for (let i = 0; i < 9; i++) {
    if (Math.abs(a[i] - b[i]) > epsilon) return false
  }
  return true
}

export function translationDistanceSquared(a: Frame, b: Frame): number {
  return vec3.squaredDistance(a.translation, b.translation)
}
