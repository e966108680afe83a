import { type SourceLocation, locStub } from './ast'

// The parser consumes token trees produced by a host lexer. A token tree is
// an identifier, a single punctuation character, a literal, or a delimited
// group holding nested token trees.
export enum TokenTypes {
  IDENT,
  PUNCT,
  LITERAL,
  GROUP,
}

export enum Delimiters {
  PAREN,
  BRACKET,
  BRACE,
}

export const delimiterChars: Record<Delimiters, [open: string, close: string]> =
  {
    [Delimiters.PAREN]: ['(', ')'],
    [Delimiters.BRACKET]: ['[', ']'],
    [Delimiters.BRACE]: ['{', '}'],
  }

/**
 * `joint` means the next token is a punctuation character written directly
 * after this one, so `</` is `<` (joint) followed by `/`.
 */
export type Spacing = 'alone' | 'joint'

export type LiteralKind = 'string' | 'number'

export interface IdentToken {
  type: TokenTypes.IDENT
  name: string
  loc: SourceLocation
}

export interface PunctToken {
  type: TokenTypes.PUNCT
  char: string
  spacing: Spacing
  loc: SourceLocation
}

export interface LiteralToken {
  type: TokenTypes.LITERAL
  kind: LiteralKind
  // text as written, quotes included
  raw: string
  // cooked value
  value: string
  loc: SourceLocation
}

export interface GroupToken {
  type: TokenTypes.GROUP
  delimiter: Delimiters
  tokens: TokenTree[]
  loc: SourceLocation
  openLoc: SourceLocation
  closeLoc: SourceLocation
}

export type TokenTree = IdentToken | PunctToken | LiteralToken | GroupToken

export function createIdent(
  name: string,
  loc: SourceLocation = locStub,
): IdentToken {
  return { type: TokenTypes.IDENT, name, loc }
}

export function createPunct(
  char: string,
  spacing: Spacing = 'alone',
  loc: SourceLocation = locStub,
): PunctToken {
  return { type: TokenTypes.PUNCT, char, spacing, loc }
}

export function createLiteral(
  kind: LiteralKind,
  raw: string,
  value: string,
  loc: SourceLocation = locStub,
): LiteralToken {
  return { type: TokenTypes.LITERAL, kind, raw, value, loc }
}

export function createGroup(
  delimiter: Delimiters,
  tokens: TokenTree[],
  loc: SourceLocation = locStub,
  openLoc: SourceLocation = loc,
  closeLoc: SourceLocation = loc,
): GroupToken {
  return { type: TokenTypes.GROUP, delimiter, tokens, loc, openLoc, closeLoc }
}

/**
 * Splits an operator such as `</` or `-->` into punctuation tokens, every
 * one but the last joint with its successor.
 */
export function createPuncts(
  chars: string,
  loc: SourceLocation = locStub,
): PunctToken[] {
  const last = chars.length - 1
  return Array.from(chars, (char, i) =>
    createPunct(char, i < last ? 'joint' : 'alone', loc),
  )
}

export function isIdent(token: TokenTree | undefined): token is IdentToken {
  return token !== undefined && token.type === TokenTypes.IDENT
}

export function isPunct(
  token: TokenTree | undefined,
  char?: string,
): token is PunctToken {
  return (
    token !== undefined &&
    token.type === TokenTypes.PUNCT &&
    (char === undefined || token.char === char)
  )
}

export function isGroup(
  token: TokenTree | undefined,
  delimiter?: Delimiters,
): token is GroupToken {
  return (
    token !== undefined &&
    token.type === TokenTypes.GROUP &&
    (delimiter === undefined || token.delimiter === delimiter)
  )
}

export function isStringLiteral(
  token: TokenTree | undefined,
): token is LiteralToken {
  return (
    token !== undefined &&
    token.type === TokenTypes.LITERAL &&
    token.kind === 'string'
  )
}

function tokenText(token: TokenTree): string {
  switch (token.type) {
    case TokenTypes.IDENT:
      return token.name
    case TokenTypes.PUNCT:
      return token.char
    case TokenTypes.LITERAL:
      return token.raw
    case TokenTypes.GROUP: {
      const [open, close] = delimiterChars[token.delimiter]
      return open + tokensToString(token.tokens) + close
    }
  }
}

/**
 * Canonical text of a token run: tokens are separated by one space, except
 * after a joint punctuation character. Original whitespace is not kept.
 */
export function tokensToString(tokens: readonly TokenTree[]): string {
  let out = ''
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]
    out += tokenText(token)
    if (
      i < tokens.length - 1 &&
      !(token.type === TokenTypes.PUNCT && token.spacing === 'joint')
    ) {
      out += ' '
    }
  }
  return out
}
