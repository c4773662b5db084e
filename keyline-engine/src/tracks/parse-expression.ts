// Parser for the textual track syntax, e.g.
//   with({ target = entity("mothership"); spline = PhysicsFrameSpline { control = (Point3(0, 0, 0)) } },
//        lookAt(spline, transform(target, Matrix4::translation(0, 0, -3)), Vector3(0, 1, 0)))
// Produces the same tagged tree that createTrack accepts.

import { TrackError } from '../errors'
import type { TrackExpression } from './expression'

type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'name'; value: string; position: number }
  | { type: 'punct'; value: string; position: number }
  | { type: 'end'; position: number }

const NAME_RE = /[A-Za-z_][A-Za-z0-9_]*(?:::[A-Za-z_][A-Za-z0-9_]*)*/y
const NUMBER_RE = /-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/y
const PUNCTUATION = '(){}[],;='

function parseError(message: string, position: number): TrackError {
  return new TrackError({ code: 'ParseError', message: `${message} at position ${position}`, position })
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let i = 0

  while (i < source.length) {
    const ch = source[i]

    if (/\s/.test(ch)) {
      i++
      continue
    }
    if (source.startsWith('//', i)) {
      const end = source.indexOf('\n', i)
      i = end === -1 ? source.length : end + 1
      continue
    }
    if (source.startsWith('/*', i)) {
      const end = source.indexOf('*/', i + 2)
      if (end === -1) throw parseError('Unterminated comment', i)
      i = end + 2
      continue
    }
    if (ch === '"') {
      let value = ''
      let j = i + 1
      while (j < source.length && source[j] !== '"') {
        if (source[j] === '\\' && j + 1 < source.length) {
          const escaped = source[j + 1]
          value += escaped === 'n' ? '\n' : escaped === 't' ? '\t' : escaped
          j += 2
        } else {
          value += source[j]
          j++
        }
      }
      if (j >= source.length) throw parseError('Unterminated string', i)
      tokens.push({ type: 'string', value, position: i })
      i = j + 1
      continue
    }

    NUMBER_RE.lastIndex = i
    const number = NUMBER_RE.exec(source)
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]), position: i })
      i += number[0].length
      continue
    }

    NAME_RE.lastIndex = i
    const name = NAME_RE.exec(source)
    if (name) {
      tokens.push({ type: 'name', value: name[0], position: i })
      i += name[0].length
      continue
    }

    if (PUNCTUATION.includes(ch)) {
      tokens.push({ type: 'punct', value: ch, position: i })
      i++
      continue
    }

    throw parseError(`Unexpected character '${ch}'`, i)
  }

  tokens.push({ type: 'end', position: source.length })
  return tokens
}

class Parser {
  private index = 0

  constructor(private readonly tokens: Token[]) {}

  private peek(): Token {
    return this.tokens[this.index]
  }

  private next(): Token {
    const token = this.tokens[this.index]
    if (token.type !== 'end') this.index++
    return token
  }

  private isPunct(value: string): boolean {
    const token = this.peek()
    return token.type === 'punct' && token.value === value
  }

  private expectPunct(value: string): void {
    const token = this.next()
    if (token.type !== 'punct' || token.value !== value) {
      throw parseError(`Expected '${value}'`, token.position)
    }
  }

  parseDocument(): TrackExpression {
    const value = this.parseValue()
    const trailing = this.peek()
    if (trailing.type !== 'end') throw parseError('Unexpected input after expression', trailing.position)
    return value
  }

  private parseValue(): TrackExpression {
    const token = this.next()
    switch (token.type) {
      case 'number':
      case 'string':
        return token.value
      case 'name':
        if (token.value === 'true') return true
        if (token.value === 'false') return false
        if (this.isPunct('(')) {
          this.next()
          return { tag: token.value, args: this.parseList(')') }
        }
        if (this.isPunct('{')) {
          this.next()
          return { tag: token.value, fields: this.parseFields() }
        }
        // A bare name is an identifier (or an enumerated constant inside a table)
        return token.value
      case 'punct':
        if (token.value === '(') return this.parseList(')')
        if (token.value === '[') return this.parseList(']')
        if (token.value === '{') return { fields: this.parseFields() }
        throw parseError(`Unexpected '${token.value}'`, token.position)
      case 'end':
        throw parseError('Unexpected end of input', token.position)
    }
  }

  private parseList(close: string): TrackExpression[] {
    const values: TrackExpression[] = []
    while (!this.isPunct(close)) {
      values.push(this.parseValue())
      if (!this.isPunct(',')) break
      this.next()
    }
    this.expectPunct(close)
    return values
  }

  private parseFields(): { [key: string]: TrackExpression } {
    const fields: { [key: string]: TrackExpression } = {}
    while (!this.isPunct('}')) {
      const key = this.next()
      if (key.type !== 'name' && key.type !== 'string') {
        throw parseError('Expected a table key', key.position)
      }
      if (key.type === 'name' && key.value.includes(':')) {
        throw parseError('Expected a table key', key.position)
      }
      // Assigning __proto__ would replace the prototype instead of adding a key
      if (key.value === '__proto__') throw parseError(`Reserved key ${key.value}`, key.position)
      if (Object.hasOwn(fields, key.value)) {
        throw parseError(`Duplicate key ${key.value}`, key.position)
      }
      this.expectPunct('=')
      fields[key.value] = this.parseValue()
      if (!this.isPunct(',') && !this.isPunct(';')) break
      this.next()
    }
    this.expectPunct('}')
    return fields
  }
}

export function parseTrackExpression(source: string): TrackExpression {
  return new Parser(tokenize(source)).parseDocument()
}
