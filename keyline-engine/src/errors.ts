// Structured failures raised by the dependency graph, the scheduler and the track compiler

export type DependencyErrorCode =
  | 'InvalidDependency'
  | 'DuplicateDependency'
  | 'MissingDependencyEdge'
  | 'CycleDetected'
  | 'DuplicateEntity'
  | 'UnknownEntity'

// Programmer errors in calling code. Never recovered from.
export class DependencyError extends Error {
  readonly code: DependencyErrorCode
  readonly entities: string[]
  // Depends-on chain for CycleDetected, first name repeated at the end
  readonly cycle?: string[]

  constructor(options: {
    code: DependencyErrorCode
    message: string
    entities: string[]
    cycle?: string[]
  }) {
    super(options.message)
    this.name = 'DependencyError'
    this.code = options.code
    this.entities = options.entities
    this.cycle = options.cycle
  }
}

export type TrackErrorCode =
  | 'UnboundVariable'
  | 'UnrecognizedExpression'
  | 'InvalidArgument'
  | 'NotImplemented'
  | 'ParseError'

// Content errors found while compiling or parsing a track expression.
// The scene loader skips the offending entity; nothing else catches these.
export class TrackError extends Error {
  readonly code: TrackErrorCode
  readonly tag?: string
  readonly position?: number

  constructor(options: { code: TrackErrorCode; message: string; tag?: string; position?: number }) {
    super(options.message)
    this.name = 'TrackError'
    this.code = options.code
    this.tag = options.tag
    this.position = options.position
  }
}

export function isTrackError(error: unknown): error is TrackError {
  return error instanceof TrackError
}
