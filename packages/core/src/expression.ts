import { TokenCursor } from './cursor'
import { ErrorCodes, createParseError } from './errors'
import type { ExpressionParser } from './options'
import {
  Delimiters,
  type PunctToken,
  type TokenTree,
  TokenTypes,
  isPunct,
} from './tokens'

const operatorChars = new Set('+-*/%=<>!&|^?:')

function fail(cursor: TokenCursor, expected: string): never {
  throw createParseError(
    ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION,
    cursor.loc,
    undefined,
    `: expected ${expected}`,
  )
}

function isOperator(token: TokenTree | undefined): token is PunctToken {
  return isPunct(token) && operatorChars.has(token.char)
}

// Consumes a run of joint operator characters such as `==` or `&&`.
function eatOperator(cursor: TokenCursor): boolean {
  const first = cursor.peek()
  if (!isOperator(first)) return false
  cursor.next()
  let last: PunctToken = first
  let next = cursor.peek()
  while (last.spacing === 'joint' && isOperator(next)) {
    cursor.next()
    last = next
    next = cursor.peek()
  }
  return true
}

function parsePrimary(cursor: TokenCursor): void {
  const token = cursor.next()
  if (!token) fail(cursor, 'an expression')
  switch (token.type) {
    case TokenTypes.IDENT:
    case TokenTypes.LITERAL:
      return
    case TokenTypes.GROUP:
      parseSequence(TokenCursor.ofGroup(token))
      return
    case TokenTypes.PUNCT:
      fail(cursor, `an expression, found '${token.char}'`)
  }
}

function parsePostfix(cursor: TokenCursor): void {
  parsePrimary(cursor)
  for (;;) {
    const group = cursor.peekGroup()
    if (group && group.delimiter !== Delimiters.BRACE) {
      cursor.next()
      parseSequence(TokenCursor.ofGroup(group))
    } else if (cursor.peekJointPunct('::') || cursor.peekPunct('.')) {
      cursor.eatPunct(cursor.peekPunct('.') ? '.' : '::')
      if (!cursor.eatIdent()) fail(cursor, 'an identifier')
    } else {
      return
    }
  }
}

function parseBinary(cursor: TokenCursor): void {
  while (cursor.peekPunct('-') || cursor.peekPunct('!')) cursor.next()
  parsePostfix(cursor)
  while (eatOperator(cursor)) {
    while (cursor.peekPunct('-') || cursor.peekPunct('!')) cursor.next()
    parsePostfix(cursor)
  }
}

// Expressions separated by `,` or `;`, all the way to the end.
function parseSequence(cursor: TokenCursor): void {
  while (!cursor.isEmpty()) {
    parseBinary(cursor)
    // separators are optional between statements
    if (!cursor.eatPunct(',')) cursor.eatPunct(';')
  }
}

/**
 * Accepts a small expression grammar over tokens: unary `-` and `!`,
 * identifiers, literals and groups, calls, indexing, `.` and `::` member
 * access, and operators between operands. It produces no AST.
 */
export const defaultExpressionParser: ExpressionParser = {
  parseExpression(cursor) {
    parseBinary(cursor)
    return null
  },
  parseBlock(cursor) {
    parseSequence(cursor)
    return null
  },
}
