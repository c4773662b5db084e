// Scene - owns the live entities and their dependency graph, and simulates them
// each step in an order where every entity updates after the entities it reads.

import { Subject, type Subscription } from 'rxjs'

import { DependencyError } from '../errors'
import { DEFAULT_TELEPORT_DISTANCE } from '../globals'
import { DependencyGraph } from '../graph/dependency-graph'
import type { SimTime } from '../math/frame'
import { createTrack, type DependencySink, trackDependencies } from '../tracks/create-track'
import type { Track } from '../tracks/track'
import { Entity, type SceneEntity } from './entity'

export type SceneOptions = {
  // Passed to entities the scene creates itself
  teleportDistance?: number
  // Wall clock for change timestamps (default performance.now)
  now?: () => number
  // Warn when sorting meets a dependency on a missing entity
  warnOnDanglingDependency?: boolean
}

export type SceneEvent =
  | { type: 'entity-inserted'; name: string }
  | { type: 'entity-removed'; name: string }
  | { type: 'sorted'; order: string[] }
  | { type: 'simulated'; time: SimTime; deltaTime: SimTime }

enum VisitorState {
  NOT_VISITED = 'not-visited',
  VISITING = 'visiting',
  ALREADY_VISITED = 'already-visited',
}

type StackEntry = {
  entity: SceneEntity
  // The dependent that pushed this entry, used to report cycles
  from?: string
}

// Buffers the edges a track compile asks for, so a failed compile leaves the graph untouched
class PendingDependencies implements DependencySink {
  readonly edges: Array<[dependent: string, dependency: string]> = []

  constructor(private readonly graph: DependencyGraph) {}

  hasOrder(dependent: string, dependency: string): boolean {
    return (
      this.graph.hasOrder(dependent, dependency) ||
      this.edges.some(([a, b]) => a === dependent && b === dependency)
    )
  }

  setOrder(dependent: string, dependency: string): void {
    this.edges.push([dependent, dependency])
  }

  // All or nothing: a rejected edge takes back the ones already added
  commit(): void {
    let added = 0
    try {
      for (const [dependent, dependency] of this.edges) {
        this.graph.setOrder(dependent, dependency)
        added++
      }
    } catch (error) {
      for (const [dependent, dependency] of this.edges.slice(0, added)) {
        this.graph.clearOrder(dependent, dependency)
      }
      throw error
    }
  }
}

export class Scene {
  readonly options: Required<SceneOptions>
  readonly events = new Subject<SceneEvent>()

  private entityArray: SceneEntity[] = []
  private entityTable: Map<string, SceneEntity> = new Map()
  private readonly graph = new DependencyGraph()
  private needsSort = false
  private _time: SimTime = 0
  private editing = false

  private _lastStructuralChangeTime: number
  private _lastChangeTime: number
  private _lastEditingTime: number

  private subs: Subscription[] = []

  constructor(options: SceneOptions = {}) {
    this.options = {
      teleportDistance: options.teleportDistance ?? DEFAULT_TELEPORT_DISTANCE,
      now: options.now ?? (() => performance.now()),
      warnOnDanglingDependency: options.warnOnDanglingDependency ?? true,
    }

    const now = this.options.now()
    this._lastStructuralChangeTime = now
    this._lastChangeTime = now
    this._lastEditingTime = now

    this.subs.push(
      this.graph.changes.subscribe(change => {
        // Removing an entity or resetting the graph leaves the current order valid
        if (change.type === 'set' || change.type === 'clear') {
          this.needsSort = true
        }
      })
    )
  }

  get time(): SimTime {
    return this._time
  }

  // Entities in update order (as of the last sort)
  get entities(): readonly SceneEntity[] {
    return this.entityArray
  }

  get dependencies(): DependencyGraph {
    return this.graph
  }

  get isSortNeeded(): boolean {
    return this.needsSort
  }

  get isEditing(): boolean {
    return this.editing
  }

  get lastStructuralChangeTime(): number {
    return this._lastStructuralChangeTime
  }

  get lastChangeTime(): number {
    return this._lastChangeTime
  }

  get lastEditingTime(): number {
    return this._lastEditingTime
  }

  entity(name: string): SceneEntity | undefined {
    return this.entityTable.get(name)
  }

  // === Dependency edits ===

  // dependent will be simulated after dependency
  setOrder(dependent: string, dependency: string): void {
    this.graph.setOrder(dependent, dependency)
  }

  clearOrder(dependent: string, dependency: string): void {
    this.graph.clearOrder(dependent, dependency)
  }

  hasOrder(dependent: string, dependency: string): boolean {
    return this.graph.hasOrder(dependent, dependency)
  }

  // Everything that (transitively) rides on the roots, e.g. to teleport it along with them
  getDescendants(roots: Iterable<string>): string[] {
    return this.graph.descendantsOf(roots)
  }

  // === Entities ===

  insert<E extends SceneEntity>(entity: E): E {
    if (this.entityTable.has(entity.name)) {
      throw new DependencyError({
        code: 'DuplicateEntity',
        message: `Two entities with the same name, "${entity.name}"`,
        entities: [entity.name],
      })
    }

    this.entityTable.set(entity.name, entity)
    this.entityArray.push(entity)
    // Edges naming this entity may have been recorded while it was missing
    if (this.graph.involves(entity.name)) {
      this.needsSort = true
    }
    this._lastStructuralChangeTime = this.options.now()

    entity.onSimulation(this._time, 0)
    this.events.next({ type: 'entity-inserted', name: entity.name })
    return entity
  }

  remove(name: string): void {
    const entity = this.entityTable.get(name)
    if (!entity) {
      throw new DependencyError({
        code: 'UnknownEntity',
        message: `No entity named "${name}"`,
        entities: [name],
      })
    }

    this.graph.removeEntity(name)
    this.entityTable.delete(name)
    this.entityArray.splice(this.entityArray.indexOf(entity), 1)
    this._lastStructuralChangeTime = this.options.now()
    this.events.next({ type: 'entity-removed', name })
  }

  clear(): void {
    this.graph.clear()
    this.entityTable.clear()
    this.entityArray = []
    this.needsSort = false
    this._time = 0
    const now = this.options.now()
    this._lastStructuralChangeTime = now
    this._lastChangeTime = now
  }

  // === Tracks ===

  // Compiles a track for owner. Its entity() edges are added only if the whole
  // expression compiles.
  createTrack(owner: string, expression: unknown): Track {
    const pending = new PendingDependencies(this.graph)
    const track = createTrack({ owner, scene: this, dependencies: pending }, expression)
    pending.commit()
    return track
  }

  // Replaces an entity's track, dropping the edges only the old track needed
  setEntityTrack(name: string, expression: unknown): Track {
    const entity = this.entityTable.get(name)
    if (!(entity instanceof Entity)) {
      throw new DependencyError({
        code: 'UnknownEntity',
        message: `No track-driven entity named "${name}"`,
        entities: [name],
      })
    }

    const previous = entity.track ? trackDependencies(entity.track) : []
    const track = this.createTrack(name, expression)
    const current = new Set(trackDependencies(track))
    for (const dependency of previous) {
      if (!current.has(dependency) && this.graph.hasOrder(name, dependency)) {
        this.graph.clearOrder(name, dependency)
      }
    }

    entity.setTrack(track)
    return track
  }

  // === Simulation ===

  setEditing(editing: boolean): void {
    this.editing = editing
    this._lastEditingTime = this.options.now()
  }

  // Jumps to time t. Simulated twice so previousFrame matches frame (no velocity).
  setTime(t: SimTime): void {
    this._time = t
    this.onSimulation(Number.NaN)
    this.onSimulation(Number.NaN)
  }

  // deltaTime NaN marks a discontinuity: time does not advance
  onSimulation(deltaTime: SimTime): void {
    this.sortEntitiesByDependency()
    this._time += Number.isNaN(deltaTime) ? 0 : deltaTime

    for (const entity of this.entityArray) {
      entity.onSimulation(this._time, deltaTime)
      this._lastChangeTime = Math.max(this._lastChangeTime, entity.lastChangeTime)
    }

    if (this.editing) {
      this._lastEditingTime = this.options.now()
    }

    this.events.next({ type: 'simulated', time: this._time, deltaTime })
  }

  // Iterative depth-first topological sort. Entities are stacked in reverse so that
  // unconstrained entities keep their relative order.
  sortEntitiesByDependency(): void {
    if (!this.needsSort) return

    if (this.graph.isEmpty) {
      this.needsSort = false
      return
    }

    const state = new Map<SceneEntity, VisitorState>()
    // For each entity being visited, the dependent that led to it
    const via = new Map<SceneEntity, string | undefined>()
    const stack: StackEntry[] = []

    for (let i = this.entityArray.length - 1; i >= 0; i--) {
      const entity = this.entityArray[i]
      stack.push({ entity })
      state.set(entity, VisitorState.NOT_VISITED)
    }

    const sorted: SceneEntity[] = []

    while (stack.length > 0) {
      const entry = stack.pop()
      if (entry === undefined) break
      const { entity } = entry

      switch (state.get(entity)) {
        case VisitorState.NOT_VISITED: {
          const dependencies = this.graph.dependenciesOf(entity.name)
          if (dependencies.length === 0) {
            state.set(entity, VisitorState.ALREADY_VISITED)
            sorted.push(entity)
            break
          }

          state.set(entity, VisitorState.VISITING)
          via.set(entity, entry.from)
          // Finalized on its second pop, after everything it depends on
          stack.push(entry)

          for (const dependencyName of dependencies) {
            const dependency = this.entityTable.get(dependencyName)
            if (!dependency) {
              if (this.options.warnOnDanglingDependency) {
                console.warn(
                  `[Scene] ${entity.name} depends on ${dependencyName}, which does not exist`
                )
              }
              continue
            }

            const dependencyState = state.get(dependency)
            if (dependencyState === VisitorState.VISITING) {
              throw this.cycleError(entity, dependency, via)
            }
            if (dependencyState === VisitorState.NOT_VISITED) {
              stack.push({ entity: dependency, from: entity.name })
            }
            // ALREADY_VISITED: already placed ahead of this entity
          }
          break
        }

        case VisitorState.VISITING:
          state.set(entity, VisitorState.ALREADY_VISITED)
          sorted.push(entity)
          break

        case VisitorState.ALREADY_VISITED:
        case undefined:
          // Duplicate stack entry
          break
      }
    }

    this.entityArray = sorted
    this.needsSort = false
    this.events.next({ type: 'sorted', order: sorted.map(e => e.name) })
  }

  // entity depends on dependency, which is still on the visiting path; walking the path
  // back from entity reaches dependency and closes the loop
  private cycleError(
    entity: SceneEntity,
    dependency: SceneEntity,
    via: Map<SceneEntity, string | undefined>
  ): DependencyError {
    const path = [entity.name]
    let current: SceneEntity | undefined = entity
    while (current && current !== dependency) {
      const next = via.get(current)
      if (next === undefined) break
      path.push(next)
      current = this.entityTable.get(next)
    }
    // path runs dependency-ward to dependent-ward; reverse it into depends-on order
    const cycle = [...path.reverse(), dependency.name]

    return new DependencyError({
      code: 'CycleDetected',
      message: `Dependency cycle detected containing ${entity.name} and ${dependency.name}: ${cycle.join(' -> ')}`,
      entities: [entity.name, dependency.name],
      cycle,
    })
  }

  destroy(): void {
    for (const sub of this.subs) sub.unsubscribe()
    this.subs = []
    this.graph.changes.complete()
    this.events.complete()
  }
}
