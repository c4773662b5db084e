// Entity - a named object with a rigid frame, optionally driven by a Track

import { DEFAULT_TELEPORT_DISTANCE } from '../globals'
import {
  type Frame,
  framesEqual,
  identityFrame,
  type SimTime,
  translationDistanceSquared,
} from '../math/frame'
import type { FrameSpline } from '../math/spline'
import { SplineTrack, type Track } from '../tracks/track'

// The scheduler only needs this much from an entity
export interface SceneEntity {
  readonly name: string
  readonly frame: Frame
  readonly previousFrame: Frame
  readonly track: Track | null
  // Clock time of the last frame change, for cache invalidation downstream
  readonly lastChangeTime: number
  onSimulation(absoluteTime: SimTime, deltaTime: SimTime): void
}

export type EntityOptions = {
  frame?: Frame
  previousFrame?: Frame
  track?: Track | null
  canChange?: boolean
  teleportDistance?: number
  now?: () => number
}

export class Entity implements SceneEntity {
  readonly canChange: boolean
  private _frame: Frame
  private _previousFrame: Frame
  private _track: Track | null
  private _lastChangeTime: number
  private _movedSinceLoad = false
  // Set by setFrame; the next simulation step then leaves previousFrame alone
  private movedSinceSimulation = false
  private readonly teleportDistance: number
  private readonly now: () => number

  constructor(
    readonly name: string,
    options: EntityOptions = {}
  ) {
    this.canChange = options.canChange ?? true
    this.teleportDistance = options.teleportDistance ?? DEFAULT_TELEPORT_DISTANCE
    this.now = options.now ?? (() => performance.now())
    this._track = options.track ?? null

    this._frame = this._track ? this._track.computeFrame(0) : (options.frame ?? identityFrame())
    this._previousFrame = options.previousFrame ?? this._frame
    this._lastChangeTime = this.now()

    if (!this.canChange && this._track) {
      console.warn(`[Entity] Track specified for ${name}, which has canChange = false`)
    }
  }

  get frame(): Frame {
    return this._frame
  }

  get previousFrame(): Frame {
    return this._previousFrame
  }

  get track(): Track | null {
    return this._track
  }

  get lastChangeTime(): number {
    return this._lastChangeTime
  }

  get movedSinceLoad(): boolean {
    return this._movedSinceLoad
  }

  // Moves the entity from outside the simulation
  setFrame(frame: Frame, updatePreviousFrame = true): void {
    if (updatePreviousFrame) {
      this._previousFrame = this._frame
    }
    if (!framesEqual(this._frame, frame)) {
      this._lastChangeTime = this.now()
      this._frame = frame
      this._movedSinceLoad = true
      this.movedSinceSimulation = true
    }
  }

  setTrack(track: Track | null): void {
    this._track = track
  }

  // Edits the spline in place when the entity already follows one
  setFrameSpline(spline: FrameSpline): void {
    if (this._track instanceof SplineTrack) {
      this._track.setSpline(spline)
    } else {
      this.setTrack(new SplineTrack(spline))
    }
  }

  // deltaTime is NaN across a discontinuous time change
  onSimulation(absoluteTime: SimTime, deltaTime: SimTime): void {
    if (!framesEqual(this._frame, this._previousFrame)) {
      this._lastChangeTime = this.now()
    }

    // With time paused previousFrame is kept, so motion stays visible while inspecting
    if ((Number.isNaN(deltaTime) || deltaTime !== 0) && !this.movedSinceSimulation) {
      this._previousFrame = this._frame
    }

    if (this._track) {
      this._frame = this._track.computeFrame(absoluteTime)
      const limit = this.teleportDistance
      if (translationDistanceSquared(this._previousFrame, this._frame) > limit * limit) {
        this._previousFrame = this._frame
      }
    }

    this.movedSinceSimulation = false
  }
}
