// DependencyGraph - "depends-on" edges between entity names
// Two inverse adjacency maps, kept consistent with each other.

import { Subject } from 'rxjs'

import { DependencyError } from '../errors'

export type DependencyChange =
  | { type: 'set'; dependent: string; dependency: string }
  | { type: 'clear'; dependent: string; dependency: string }
  | { type: 'remove'; entity: string }
  | { type: 'reset' }

export class DependencyGraph {
  // dependent -> the names it must update after
  private ancestors: Map<string, string[]> = new Map()
  // dependency -> the names that must update after it
  private descendants: Map<string, string[]> = new Map()
  private edges = 0

  // Every structural edit is announced here; the scene uses it to mark its order dirty
  readonly changes = new Subject<DependencyChange>()

  // Declares that dependent is updated after dependency.
  // Only the immediate reverse edge is rejected here; longer cycles surface when sorting.
  setOrder(dependent: string, dependency: string): void {
    if (dependent === dependency) {
      throw new DependencyError({
        code: 'InvalidDependency',
        message: `Entity ${dependent} cannot depend on itself`,
        entities: [dependent],
      })
    }
    if (this.hasOrder(dependency, dependent)) {
      throw new DependencyError({
        code: 'InvalidDependency',
        message: `Tried to specify a cyclic dependency between ${dependent} and ${dependency}`,
        entities: [dependent, dependency],
      })
    }
    if (this.hasOrder(dependent, dependency)) {
      throw new DependencyError({
        code: 'DuplicateDependency',
        message: `Duplicate dependency: ${dependent} already depends on ${dependency}`,
        entities: [dependent, dependency],
      })
    }

    appendTo(this.ancestors, dependent, dependency)
    appendTo(this.descendants, dependency, dependent)
    this.edges++
    this.changes.next({ type: 'set', dependent, dependency })
  }

  clearOrder(dependent: string, dependency: string): void {
    if (!this.hasOrder(dependent, dependency)) {
      throw new DependencyError({
        code: 'MissingDependencyEdge',
        message: `Tried to remove a dependency that did not exist: ${dependent} on ${dependency}`,
        entities: [dependent, dependency],
      })
    }

    removeFrom(this.ancestors, dependent, dependency)
    removeFrom(this.descendants, dependency, dependent)
    this.edges--
    this.changes.next({ type: 'clear', dependent, dependency })
  }

  hasOrder(dependent: string, dependency: string): boolean {
    return this.ancestors.get(dependent)?.includes(dependency) ?? false
  }

  // Drops every edge naming this entity on either side
  removeEntity(name: string): void {
    const dependencies = this.ancestors.get(name) ?? []
    const dependents = this.descendants.get(name) ?? []
    if (dependencies.length === 0 && dependents.length === 0) return

    for (const dependency of dependencies) {
      removeFrom(this.descendants, dependency, name)
    }
    for (const dependent of dependents) {
      removeFrom(this.ancestors, dependent, name)
    }
    this.ancestors.delete(name)
    this.descendants.delete(name)
    this.edges -= dependencies.length + dependents.length
    this.changes.next({ type: 'remove', entity: name })
  }

  // Names this entity must update after, in insertion order
  dependenciesOf(name: string): readonly string[] {
    return this.ancestors.get(name) ?? []
  }

  // Names that must update after this entity, in insertion order
  dependentsOf(name: string): readonly string[] {
    return this.descendants.get(name) ?? []
  }

  // True when the name takes part in any edge
  involves(name: string): boolean {
    return this.ancestors.has(name) || this.descendants.has(name)
  }

  // Everything that transitively depends on one of the roots. Roots themselves are
  // not reported; each name appears once.
  descendantsOf(roots: Iterable<string>): string[] {
    const result: string[] = []
    const visited = new Set<string>(roots)
    const stack = [...visited]

    while (stack.length > 0) {
      const name = stack.pop()
      if (name === undefined) break
      for (const dependent of this.dependentsOf(name)) {
        if (!visited.has(dependent)) {
          visited.add(dependent)
          result.push(dependent)
          stack.push(dependent)
        }
      }
    }

    return result
  }

  get edgeCount(): number {
    return this.edges
  }

  get isEmpty(): boolean {
    return this.edges === 0
  }

  clear(): void {
    this.ancestors.clear()
    this.descendants.clear()
    this.edges = 0
    this.changes.next({ type: 'reset' })
  }
}

function appendTo(table: Map<string, string[]>, key: string, value: string): void {
  const list = table.get(key)
  if (list) {
    list.push(value)
  } else {
    table.set(key, [value])
  }
}

// Empty lists are never stored
function removeFrom(table: Map<string, string[]>, key: string, value: string): void {
  const list = table.get(key)
  if (!list) return
  const index = list.indexOf(value)
  if (index >= 0) list.splice(index, 1)
  if (list.length === 0) table.delete(key)
}
