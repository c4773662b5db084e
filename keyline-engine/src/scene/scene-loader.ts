// Builds a scene from a JSON description. Tracks may be written either as tagged
// expression trees or as text in the track syntax.

import { z } from 'zod'

import { isTrackError, type TrackError } from '../errors'
import type { Frame } from '../math/frame'
import { type TrackExpression, trackExpressionSchema } from '../tracks/expression'
import { parseFrameLiteral } from '../tracks/literals'
import { parseTrackExpression } from '../tracks/parse-expression'
import type { Track } from '../tracks/track'
import { Entity } from './entity'
import type { Scene } from './scene'

export const entityDescriptionSchema = z
  .object({
    // Initial frame for entities without a track
    frame: trackExpressionSchema.optional(),
    // A string is parsed as track text, anything else is a tagged tree
    track: trackExpressionSchema.optional(),
    canChange: z.boolean().optional(),
  })
  .strict()

export const sceneDescriptionSchema = z
  .object({
    name: z.string().optional(),
    time: z.number().finite().optional(),
    editing: z.boolean().optional(),
    entities: z.record(entityDescriptionSchema),
  })
  .strict()

export type EntityDescription = z.infer<typeof entityDescriptionSchema>
export type SceneDescription = z.infer<typeof sceneDescriptionSchema>

export type LoadError = {
  entity: string
  error: TrackError
}

export type LoadResult = {
  name?: string
  // Entity names in declaration order
  loaded: string[]
  errors: LoadError[]
}

function toExpression(source: TrackExpression): TrackExpression {
  return typeof source === 'string' ? parseTrackExpression(source) : source
}

function loadEntity(scene: Scene, name: string, description: EntityDescription): Entity {
  const frame: Frame | undefined =
    description.frame === undefined ? undefined : parseFrameLiteral(toExpression(description.frame))
  // Edges are committed by createTrack only once the whole track compiled
  const track: Track | null =
    description.track === undefined ? null : scene.createTrack(name, toExpression(description.track))

  return new Entity(name, {
    frame,
    track,
    canChange: description.canChange,
    teleportDistance: scene.options.teleportDistance,
    now: scene.options.now,
  })
}

// Replaces the contents of scene. Throws a ZodError for a malformed description and a
// DependencyError for an impossible ordering; an entity whose track or frame cannot be
// compiled is skipped and reported instead.
export function loadScene(scene: Scene, description: unknown): LoadResult {
  const parsed = sceneDescriptionSchema.parse(description)
  const result: LoadResult = { name: parsed.name, loaded: [], errors: [] }

  scene.clear()

  for (const [name, entityDescription] of Object.entries(parsed.entities)) {
    let entity: Entity
    try {
      entity = loadEntity(scene, name, entityDescription)
    } catch (error) {
      if (!isTrackError(error)) throw error
      console.warn(`[loadScene] Skipping entity ${name}: ${error.message}`)
      result.errors.push({ entity: name, error })
      continue
    }
    scene.insert(entity)
    result.loaded.push(name)
  }

  scene.setEditing(parsed.editing ?? false)
  scene.setTime(parsed.time ?? 0)
  return result
}
