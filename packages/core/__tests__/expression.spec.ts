import { tokenize } from '@tagtree/lexer'
import { describe, expect, test } from 'vitest'
import { ParseError, TokenCursor, defaultExpressionParser } from '../src'

const cursorOf = (source: string) => TokenCursor.from(tokenize(source))

describe('defaultExpressionParser', () => {
  test('parses one expression and stops before the next', () => {
    const cursor = cursorOf('a.b(c)[0] + -1 x')
    expect(defaultExpressionParser.parseExpression(cursor)).toBeNull()
    expect(cursor.position).toBe(8)
    expect(cursor.peekIdent()).toMatchObject({ name: 'x' })
  })

  test('path access', () => {
    const cursor = cursorOf('std::mem::take(x) y')
    defaultExpressionParser.parseExpression(cursor)
    expect(cursor.peekIdent()).toMatchObject({ name: 'y' })
  })

  test('blocks must be consumed entirely', () => {
    const cursor = cursorOf('a; b, c && !d')
    expect(defaultExpressionParser.parseBlock(cursor)).toBeNull()
    expect(cursor.isEmpty()).toBe(true)
  })

  test('syntax errors are thrown as parse errors', () => {
    const parseIncomplete = () =>
      defaultExpressionParser.parseExpression(cursorOf('a =='))
    expect(parseIncomplete).toThrowError(ParseError)
    expect(parseIncomplete).toThrowError(
      'invalid embedded expression: expected an expression',
    )
    expect(() =>
      defaultExpressionParser.parseBlock(cursorOf('x.')),
    ).toThrowError('invalid embedded expression: expected an identifier')
  })
})
