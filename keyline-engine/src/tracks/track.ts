// Track variants. The set is closed: everything the track language can build is listed
// in the Track union, and each variant computes a frame as a pure function of time.

import type { ReadonlyVec3 } from 'gl-matrix'

import { TWO_PI } from '../globals'
import {
  type Frame,
  frameFromXYZYPRRadians,
  lookAt,
  multiplyFrames,
  type SimTime,
} from '../math/frame'
import { evaluateSpline, type FrameSpline } from '../math/spline'

// What an EntityTrack needs from its scene
export interface EntityLookup {
  entity(name: string): { readonly frame: Frame } | undefined
}

export class SplineTrack {
  readonly kind = 'spline'
  private _spline: FrameSpline
  // True once setSpline has been called
  private _changed = false

  constructor(spline: FrameSpline) {
    this._spline = spline
  }

  get spline(): FrameSpline {
    return this._spline
  }

  get changed(): boolean {
    return this._changed
  }

  // Interactive editing. Only call between simulation steps.
  setSpline(spline: FrameSpline): void {
    this._spline = spline
    this._changed = true
  }

  computeFrame(time: SimTime): Frame {
    return evaluateSpline(this._spline, time)
  }
}

// Follows another entity's current frame. The scene is held weakly so a track
// never keeps its scene alive.
export class EntityTrack {
  readonly kind = 'entity'
  private readonly scene: WeakRef<EntityLookup>
  private _childFrame: Frame

  constructor(
    readonly entityName: string,
    scene: EntityLookup,
    childFrame: Frame
  ) {
    this.scene = new WeakRef(scene)
    this._childFrame = childFrame
  }

  get childFrame(): Frame {
    return this._childFrame
  }

  setChildFrame(frame: Frame): void {
    this._childFrame = frame
  }

  computeFrame(_time: SimTime): Frame {
    const target = this.scene.deref()?.entity(this.entityName)
    // The target may not exist yet while a scene is still loading
    return target ? multiplyFrames(target.frame, this._childFrame) : this._childFrame
  }
}

export class TransformTrack {
  readonly kind = 'transform'

  constructor(
    readonly a: Track,
    readonly b: Track
  ) {}

  computeFrame(time: SimTime): Frame {
    return multiplyFrames(this.a.computeFrame(time), this.b.computeFrame(time))
  }
}

export class CombineTrack {
  readonly kind = 'combine'

  constructor(
    readonly rotationTrack: Track,
    readonly translationTrack: Track
  ) {}

  computeFrame(time: SimTime): Frame {
    return {
      rotation: this.rotationTrack.computeFrame(time).rotation,
      translation: this.translationTrack.computeFrame(time).translation,
    }
  }
}

// Circles the Y axis in the XZ plane, facing along the direction of travel
export class OrbitTrack {
  readonly kind = 'orbit'

  constructor(
    readonly radius: number,
    readonly period: number
  ) {}

  computeFrame(time: SimTime): Frame {
    const angle = (TWO_PI * time) / this.period
    return frameFromXYZYPRRadians(
      Math.sin(angle) * this.radius,
      0,
      Math.cos(angle) * this.radius,
      angle
    )
  }
}

export class LookAtTrack {
  readonly kind = 'lookAt'

  constructor(
    readonly base: Track,
    readonly target: Track,
    readonly up: ReadonlyVec3
  ) {}

  computeFrame(time: SimTime): Frame {
    return lookAt(this.base.computeFrame(time), this.target.computeFrame(time).translation, this.up)
  }
}

export type TimeShiftable = SplineTrack | OrbitTrack

export class TimeShiftTrack {
  readonly kind = 'timeShift'

  constructor(
    readonly track: TimeShiftable,
    readonly dt: SimTime
  ) {}

  computeFrame(time: SimTime): Frame {
    return this.track.computeFrame(time + this.dt)
  }
}

export type Track =
  | SplineTrack
  | EntityTrack
  | TransformTrack
  | CombineTrack
  | OrbitTrack
  | LookAtTrack
  | TimeShiftTrack

export type TrackKind = Track['kind']
