/**
 * Headless sampling utilities
 *
 * Runs a scene without a host frame loop and bakes entity frames at a fixed step,
 * e.g. for exporting camera paths or checking a scene offline.
 */

import {
  DependencyError,
  type Frame,
  loadScene,
  Scene,
  type SceneOptions,
  type SimTime,
} from '@keyline/engine'

/**
 * Options for sampling a scene
 */
export interface SampleSceneOptions {
  /**
   * Scene description to load
   */
  description: unknown

  /**
   * Simulated time to cover, starting at the description's time
   */
  duration: SimTime

  /**
   * Time between samples
   */
  step: SimTime

  /**
   * Entities to record (default: every loaded entity)
   */
  entities?: string[]

  sceneOptions?: SceneOptions
}

export interface SceneSample {
  time: SimTime
  frames: Record<string, Frame>
}

/**
 * Load a scene into a private Scene and record frames every step
 *
 * @example
 * ```ts
 * const samples = sampleScene({ description, duration: 4, step: 0.5, entities: ['Camera'] })
 * samples.map(({ time, frames }) => [time, frames.Camera.translation])
 * ```
 */
export function sampleScene(options: SampleSceneOptions): SceneSample[] {
  const { duration, step } = options
  if (!(step > 0) || !Number.isFinite(step)) {
    throw new RangeError(`Sample step must be a positive number, got ${step}`)
  }
  if (!(duration >= 0) || !Number.isFinite(duration)) {
    throw new RangeError(`Sample duration must be a non-negative number, got ${duration}`)
  }

  const scene = new Scene(options.sceneOptions)
  try {
    const result = loadScene(scene, options.description)
    const names = options.entities ?? result.loaded
    for (const name of names) {
      if (!scene.entity(name)) {
        throw new DependencyError({
          code: 'UnknownEntity',
          message: `No entity named "${name}" to sample`,
          entities: [name],
        })
      }
    }

    const record = (): SceneSample => {
      const frames: Record<string, Frame> = {}
      for (const name of names) {
        const entity = scene.entity(name)
        if (entity) frames[name] = entity.frame
      }
      return { time: scene.time, frames }
    }

    // Tolerance so that duration / step landing just under an integer still counts
    const count = Math.floor(duration / step + 1e-9)
    const samples = [record()]
    for (let i = 0; i < count; i++) {
      scene.onSimulation(step)
      samples.push(record())
    }
    return samples
  } finally {
    scene.destroy()
  }
}
