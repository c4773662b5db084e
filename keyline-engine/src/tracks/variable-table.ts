import type { Track } from './track'

// Lexical environment for `with` bindings. Lookup walks outward through parents.
export class VariableTable {
  private readonly variables = new Map<string, Track>()

  constructor(readonly parent: VariableTable | null = null) {}

  set(id: string, track: Track): void {
    this.variables.set(id, track)
  }

  lookup(id: string): Track | undefined {
    return this.variables.get(id) ?? this.parent?.lookup(id)
  }

  has(id: string): boolean {
    return this.lookup(id) !== undefined
  }

  extend(): VariableTable {
    return new VariableTable(this)
  }
}
