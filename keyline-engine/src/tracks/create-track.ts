// Track compiler - turns a tagged expression tree into a tree of Track objects.
//
// Grammar (tag dispatch):
//   Point3(...) | Vector3(...) | Matrix3... | Matrix4... | CFrame... | PFrame...
//   | PhysicsFrameSpline { ... }                 constant or keyframed SplineTrack
//   | "<id>"                                     variable bound by an enclosing with()
//   | entity("name" [, childFrame])              follows another entity; adds a dependency
//   | transform(a, b)                            a * b
//   | combine(rotation, translation)
//   | orbit(radius, period)
//   | lookAt(base, target [, up])
//   | timeShift(splineOrOrbit, dt)
//   | with({ id = track, ... }, body)            bindings see only the enclosing scope
//   | follow(...)                                reserved

import { TrackError } from '../errors'
import { identityFrame, UNIT_Y } from '../math/frame'
import {
  describeExpression,
  isTaggedTable,
  isTaggedTuple,
  type TrackExpression,
  trackExpressionSchema,
} from './expression'
import {
  expectNumber,
  isFrameLiteral,
  parseFrameLiteral,
  parseSplineLiteral,
  parseVectorLiteral,
} from './literals'
import {
  CombineTrack,
  type EntityLookup,
  EntityTrack,
  LookAtTrack,
  OrbitTrack,
  SplineTrack,
  TimeShiftTrack,
  type Track,
  TransformTrack,
} from './track'
import { VariableTable } from './variable-table'

// Where entity() references record their ordering constraint
export interface DependencySink {
  hasOrder(dependent: string, dependency: string): boolean
  setOrder(dependent: string, dependency: string): void
}

export interface TrackContext {
  // Name of the entity that will own the compiled track
  readonly owner: string
  readonly scene: EntityLookup
  readonly dependencies: DependencySink
}

export function createTrack(context: TrackContext, expression: unknown): Track {
  const result = trackExpressionSchema.safeParse(expression)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new TrackError({
      code: 'UnrecognizedExpression',
      message: `Malformed track expression${issue ? ` at ${issue.path.join('.') || 'root'}: ${issue.message}` : ''}`,
    })
  }
  return compileTrack(context, result.data, new VariableTable())
}

function unrecognized(tag: string): TrackError {
  return new TrackError({
    code: 'UnrecognizedExpression',
    message: `Unrecognized track type ${tag}`,
    tag,
  })
}

function invalidArgument(tag: string, message: string): TrackError {
  return new TrackError({ code: 'InvalidArgument', message: `${tag}: ${message}`, tag })
}

function expectArity(tag: string, args: TrackExpression[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} or ${max}`
    throw invalidArgument(tag, `expected ${expected} arguments, got ${args.length}`)
  }
}

export function compileTrack(
  context: TrackContext,
  expression: TrackExpression,
  variables: VariableTable
): Track {
  if (typeof expression === 'string') {
    const bound = variables.lookup(expression)
    if (!bound) {
      throw new TrackError({
        code: 'UnboundVariable',
        message: `Unbound variable ${expression}`,
        tag: expression,
      })
    }
    return bound
  }

  if (isFrameLiteral(expression)) {
    return new SplineTrack(parseSplineLiteral(expression))
  }

  if (!isTaggedTuple(expression)) {
    throw unrecognized(describeExpression(expression))
  }

  const { tag, args } = expression
  const compile = (arg: TrackExpression) => compileTrack(context, arg, variables)

  switch (tag) {
    case 'entity': {
      expectArity(tag, args, 1, 2)
      const name = args[0]
      if (typeof name !== 'string' || name === '') {
        throw invalidArgument(tag, 'entity name must be a non-empty string')
      }
      if (name === context.owner) {
        throw invalidArgument(tag, `${name} cannot follow itself`)
      }
      const childFrame = args.length > 1 ? parseFrameLiteral(args[1]) : identityFrame()
      // One edge per pair, however many times the track mentions the entity
      if (!context.dependencies.hasOrder(context.owner, name)) {
        context.dependencies.setOrder(context.owner, name)
      }
      return new EntityTrack(name, context.scene, childFrame)
    }

    case 'transform':
      expectArity(tag, args, 2)
      return new TransformTrack(compile(args[0]), compile(args[1]))

    case 'combine':
      expectArity(tag, args, 2)
      return new CombineTrack(compile(args[0]), compile(args[1]))

    case 'orbit': {
      expectArity(tag, args, 2)
      const radius = expectNumber(tag, args[0], 'radius')
      const period = expectNumber(tag, args[1], 'period')
      if (period === 0) throw invalidArgument(tag, 'period must not be zero')
      return new OrbitTrack(radius, period)
    }

    case 'lookAt': {
      expectArity(tag, args, 2, 3)
      const up = args.length > 2 ? parseVectorLiteral(args[2]) : UNIT_Y
      return new LookAtTrack(compile(args[0]), compile(args[1]), up)
    }

    case 'timeShift': {
      expectArity(tag, args, 2)
      const shifted = compile(args[0])
      // Checked here rather than at evaluation time
      if (!(shifted instanceof SplineTrack || shifted instanceof OrbitTrack)) {
        throw invalidArgument(tag, 'requires a spline or orbit track')
      }
      return new TimeShiftTrack(shifted, expectNumber(tag, args[1], 'dt'))
    }

    case 'with': {
      expectArity(tag, args, 2)
      const bindings = args[0]
      if (!isTaggedTable(bindings) || (bindings.tag !== undefined && bindings.tag !== '')) {
        throw invalidArgument(tag, 'first argument must be a table of bindings')
      }
      // let, not let*: every binding is compiled in the enclosing table
      const extended = variables.extend()
      for (const [id, value] of Object.entries(bindings.fields)) {
        extended.set(id, compile(value))
      }
      return compileTrack(context, args[1], extended)
    }

    case 'follow':
      throw new TrackError({
        code: 'NotImplemented',
        message: 'follow tracks are not implemented',
        tag,
      })

    default:
      throw unrecognized(tag)
  }
}

// Names of the entities a compiled track reads. Shared sub-tracks are walked once.
export function trackDependencies(root: Track): string[] {
  const names = new Set<string>()
  const seen = new Set<Track>()
  const stack: Track[] = [root]

  while (stack.length > 0) {
    const track = stack.pop()
    if (track === undefined || seen.has(track)) continue
    seen.add(track)

    switch (track.kind) {
      case 'entity':
        names.add(track.entityName)
        break
      case 'transform':
        stack.push(track.a, track.b)
        break
      case 'combine':
        stack.push(track.rotationTrack, track.translationTrack)
        break
      case 'lookAt':
        stack.push(track.base, track.target)
        break
      case 'timeShift':
        stack.push(track.track)
        break
      case 'spline':
      case 'orbit':
        break
      default: {
        const unreachable: never = track
        throw new Error(`Unhandled track ${String(unreachable)}`)
      }
    }
  }

  return [...names]
}
