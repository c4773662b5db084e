import { describe, expect, it } from 'vitest'
import { DependencyError } from '../errors'
import { type DependencyChange, DependencyGraph } from './dependency-graph'

function codeOf(fn: () => void): string | undefined {
  try {
    fn()
  } catch (error) {
    if (error instanceof DependencyError) return error.code
    throw error
  }
  return undefined
}

describe('DependencyGraph', () => {
  describe('setOrder', () => {
    it('records the edge in both directions', () => {
      const graph = new DependencyGraph()
      graph.setOrder('Camera', 'Ship')

      expect(graph.hasOrder('Camera', 'Ship')).toBe(true)
      expect(graph.hasOrder('Ship', 'Camera')).toBe(false)
      expect(graph.dependenciesOf('Camera')).toEqual(['Ship'])
      expect(graph.dependentsOf('Ship')).toEqual(['Camera'])
      expect(graph.edgeCount).toBe(1)
    })

    it('rejects a self edge', () => {
      const graph = new DependencyGraph()
      expect(codeOf(() => graph.setOrder('A', 'A'))).toBe('InvalidDependency')
      expect(graph.isEmpty).toBe(true)
    })

    it('rejects the reverse of an existing edge', () => {
      const graph = new DependencyGraph()
      graph.setOrder('A', 'B')
      expect(codeOf(() => graph.setOrder('B', 'A'))).toBe('InvalidDependency')
      expect(graph.edgeCount).toBe(1)
    })

    it('rejects a duplicate edge', () => {
      const graph = new DependencyGraph()
      graph.setOrder('A', 'B')
      expect(codeOf(() => graph.setOrder('A', 'B'))).toBe('DuplicateDependency')
      expect(graph.dependenciesOf('A')).toEqual(['B'])
    })

    it('does not detect longer cycles', () => {
      const graph = new DependencyGraph()
      graph.setOrder('A', 'B')
      graph.setOrder('B', 'C')
      expect(() => graph.setOrder('C', 'A')).not.toThrow()
      expect(graph.edgeCount).toBe(3)
    })
  })

  describe('clearOrder', () => {
    it('removes the edge and prunes empty lists', () => {
      const graph = new DependencyGraph()
      graph.setOrder('A', 'B')
      graph.clearOrder('A', 'B')

      expect(graph.hasOrder('A', 'B')).toBe(false)
      expect(graph.involves('A')).toBe(false)
      expect(graph.involves('B')).toBe(false)
      expect(graph.isEmpty).toBe(true)
    })

    it('throws when the edge is missing', () => {
      const graph = new DependencyGraph()
      graph.setOrder('A', 'B')
      expect(codeOf(() => graph.clearOrder('B', 'A'))).toBe('MissingDependencyEdge')
    })
  })

  it('removeEntity strips edges on both sides', () => {
    const graph = new DependencyGraph()
    graph.setOrder('B', 'A')
    graph.setOrder('C', 'B')
    graph.setOrder('D', 'C')
    graph.removeEntity('C')

    expect(graph.dependentsOf('B')).toEqual([])
    expect(graph.dependenciesOf('D')).toEqual([])
    expect(graph.dependenciesOf('B')).toEqual(['A'])
    expect(graph.involves('C')).toBe(false)
    expect(graph.edgeCount).toBe(1)
  })

  describe('descendantsOf', () => {
    it('returns transitive dependents once, without the roots', () => {
      const graph = new DependencyGraph()
      // B and C ride on A; D rides on both B and C
      graph.setOrder('B', 'A')
      graph.setOrder('C', 'A')
      graph.setOrder('D', 'B')
      graph.setOrder('D', 'C')

      const result = graph.descendantsOf(['A'])
      expect([...result].sort()).toEqual(['B', 'C', 'D'])
    })

    it('excludes roots that depend on other roots', () => {
      const graph = new DependencyGraph()
      graph.setOrder('B', 'A')
      graph.setOrder('C', 'B')

      expect(graph.descendantsOf(['A', 'B'])).toEqual(['C'])
    })

    it('is empty for an unknown name', () => {
      expect(new DependencyGraph().descendantsOf(['nobody'])).toEqual([])
    })
  })

  it('announces structural changes', () => {
    const graph = new DependencyGraph()
    const changes: DependencyChange[] = []
    const sub = graph.changes.subscribe(change => changes.push(change))

    graph.setOrder('A', 'B')
    graph.clearOrder('A', 'B')
    graph.setOrder('A', 'B')
    graph.removeEntity('B')
    graph.clear()
    sub.unsubscribe()

    expect(changes.map(change => change.type)).toEqual(['set', 'clear', 'set', 'remove', 'reset'])
  })
})
