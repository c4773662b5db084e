// Tagged expression trees: the source form of every Track.
// A node is a literal, a bare identifier, a list, a tagged tuple `tag(args...)`
// or a (possibly tagged) table `tag { key = value }`.

import { z } from 'zod'

export type TrackExpression =
  | number
  | string
  | boolean
  | TrackExpression[]
  | TaggedTuple
  | TaggedTable

export interface TaggedTuple {
  tag: string
  args: TrackExpression[]
}

export interface TaggedTable {
  tag?: string
  fields: { [key: string]: TrackExpression }
}

export const trackExpressionSchema: z.ZodType<TrackExpression> = z.lazy(() =>
  z.union([
    z.number(),
    z.string(),
    z.boolean(),
    z.array(trackExpressionSchema),
    z.object({ tag: z.string(), args: z.array(trackExpressionSchema) }).strict(),
    z
      .object({ tag: z.string().optional(), fields: z.record(trackExpressionSchema) })
      .strict(),
  ])
)

export function isTaggedTuple(expression: TrackExpression): expression is TaggedTuple {
  return typeof expression === 'object' && !Array.isArray(expression) && 'args' in expression
}

export function isTaggedTable(expression: TrackExpression): expression is TaggedTable {
  return typeof expression === 'object' && !Array.isArray(expression) && 'fields' in expression
}

// Short description used in diagnostics
export function describeExpression(expression: TrackExpression): string {
  if (isTaggedTuple(expression)) return expression.tag
  if (isTaggedTable(expression)) return expression.tag ?? 'table'
  if (Array.isArray(expression)) return 'list'
  return typeof expression
}

// Builders for writing expressions in code: call('orbit', 2, 4), table({ x: ... })
export function call(tag: string, ...args: TrackExpression[]): TaggedTuple {
  return { tag, args }
}

export function table(fields: { [key: string]: TrackExpression }, tag?: string): TaggedTable {
  return tag === undefined ? { fields } : { tag, fields }
}
