import { describe, expect, it } from 'vitest'
import { TrackError } from '../errors'
import { parseTrackExpression } from './parse-expression'

function parseErrorOf(source: string): { message: string; position?: number } | undefined {
  try {
    parseTrackExpression(source)
  } catch (error) {
    if (error instanceof TrackError && error.code === 'ParseError') {
      return { message: error.message, position: error.position }
    }
    throw error
  }
  return undefined
}

describe('parseTrackExpression', () => {
  it('parses calls into tagged tuples', () => {
    expect(parseTrackExpression('orbit(2, 4)')).toEqual({ tag: 'orbit', args: [2, 4] })
  })

  it('keeps qualified names and negative numbers', () => {
    expect(parseTrackExpression('Matrix4::translation(0, 0, -3)')).toEqual({
      tag: 'Matrix4::translation',
      args: [0, 0, -3],
    })
  })

  it('parses bare names as identifiers and tables of bindings', () => {
    expect(parseTrackExpression('with({ x = orbit(1, 2) }, transform(x, x))')).toEqual({
      tag: 'with',
      args: [
        { fields: { x: { tag: 'orbit', args: [1, 2] } } },
        { tag: 'transform', args: ['x', 'x'] },
      ],
    })
  })

  it('parses tagged tables with parenthesized lists and semicolons', () => {
    const source =
      'PhysicsFrameSpline { control = (Point3(0, 0, 0), Point3(1, 0, 0)); time = (0, 1.5); cyclic = false }'
    expect(parseTrackExpression(source)).toEqual({
      tag: 'PhysicsFrameSpline',
      fields: {
        control: [
          { tag: 'Point3', args: [0, 0, 0] },
          { tag: 'Point3', args: [1, 0, 0] },
        ],
        time: [0, 1.5],
        cyclic: false,
      },
    })
  })

  it('parses bracketed lists, strings and booleans', () => {
    expect(parseTrackExpression('[1, "two", true]')).toEqual([1, 'two', true])
    expect(parseTrackExpression('entity("Ship \\"A\\"")')).toEqual({ tag: 'entity', args: ['Ship "A"'] })
  })

  it('accepts quoted table keys and trailing separators', () => {
    expect(parseTrackExpression('{ "a key" = 1, }')).toEqual({ fields: { 'a key': 1 } })
    expect(parseTrackExpression('orbit(1, 2,)')).toEqual({ tag: 'orbit', args: [1, 2] })
  })

  it('skips comments', () => {
    const source = '// the camera\norbit(1, /* period */ 2)'
    expect(parseTrackExpression(source)).toEqual({ tag: 'orbit', args: [1, 2] })
  })

  it('accepts keys that name Object.prototype members', () => {
    expect(parseTrackExpression('with({ constructor = orbit(1, 2), toString = 3 }, constructor)')).toEqual({
      tag: 'with',
      args: [{ fields: { constructor: { tag: 'orbit', args: [1, 2] }, toString: 3 } }, 'constructor'],
    })
  })

  it('parses empty argument lists', () => {
    expect(parseTrackExpression('CFrame()')).toEqual({ tag: 'CFrame', args: [] })
  })

  describe('errors', () => {
    it('reports a missing closing parenthesis at the end of input', () => {
      expect(parseErrorOf('orbit(1, 2')).toEqual({ message: "Expected ')' at position 10", position: 10 })
    })

    it('reports duplicate table keys', () => {
      expect(parseErrorOf('{ a = 1, a = 2 }')).toEqual({ message: 'Duplicate key a at position 9', position: 9 })
    })

    it('rejects __proto__ as a table key', () => {
      expect(parseErrorOf('{ __proto__ = 1 }')).toEqual({
        message: 'Reserved key __proto__ at position 2',
        position: 2,
      })
    })

    it('reports unexpected characters', () => {
      expect(parseErrorOf('orbit(1 $ 2)')).toEqual({
        message: "Unexpected character '$' at position 8",
        position: 8,
      })
    })

    it('reports input after the expression', () => {
      expect(parseErrorOf('orbit(1, 2) x')).toEqual({
        message: 'Unexpected input after expression at position 12',
        position: 12,
      })
    })

    it('reports unterminated strings and comments', () => {
      expect(parseErrorOf('entity("Ship')?.message).toBe('Unterminated string at position 7')
      expect(parseErrorOf('orbit(1, 2) /* never closed')?.message).toBe('Unterminated comment at position 12')
    })

    it('reports empty input', () => {
      expect(parseErrorOf('   ')?.message).toBe('Unexpected end of input at position 3')
    })
  })
})
