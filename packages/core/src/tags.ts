import {
  type AttributeNode,
  type CloseTag,
  type ExpressionNode,
  NameTypes,
  type NodeName,
  NodeTypes,
  type OpenTag,
  type PathName,
  type PunctuatedName,
  type SourceLocation,
  createExpression,
  mergeLocs,
  tokensLoc,
} from './ast'
import { parseBlockGroup } from './block'
import type { ParserContext } from './context'
import { TokenCursor, collectUntil } from './cursor'
import { ErrorCodes, toParseError } from './errors'
import { tokensToSourceText } from './rawText'
import { Delimiters, type IdentToken, type PunctToken, isPunct } from './tokens'

// `a::b::c` or `a.b.c`
function parsePathName(
  cursor: TokenCursor,
  separator: PathName['separator'],
): PathName | undefined {
  const segments: IdentToken[] = []
  const peekSeparator = () =>
    separator === '::'
      ? cursor.peekJointPunct('::')
      : cursor.peekPunct('.')
  let ident = cursor.eatIdent()
  while (ident) {
    segments.push(ident)
    if (!peekSeparator() || !cursor.peekIdent(separator.length)) break
    cursor.eatPunct(separator)
    ident = cursor.eatIdent()
  }
  if (!segments.length) return
  return {
    type: NameTypes.PATH,
    segments,
    separator,
    loc: tokensLoc(segments),
  }
}

// `data-foo`, `on:click`, `xlink:href-x`: `-` and `:` may be mixed
function parsePunctuatedName(cursor: TokenCursor): PunctuatedName | undefined {
  const segments: IdentToken[] = []
  const separators: PunctToken[] = []
  let ident = cursor.eatIdent()
  while (ident) {
    segments.push(ident)
    const punct = cursor.peek()
    const isSeparator =
      isPunct(punct, '-') ||
      (isPunct(punct, ':') && !cursor.peekJointPunct('::'))
    if (!isSeparator || !isPunct(punct) || !cursor.peekIdent(1)) break
    cursor.next()
    separators.push(punct)
    ident = cursor.eatIdent()
  }
  if (segments.length < 2) return
  return {
    type: NameTypes.PUNCTUATED,
    segments,
    separators,
    loc: mergeLocs(segments[0].loc, segments[segments.length - 1].loc),
  }
}

/**
 * Reads an identifier based name without reporting anything; the cursor
 * is left alone when no name is found.
 */
export function tryParseNodeName(cursor: TokenCursor): NodeName | undefined {
  if (!cursor.peekIdent()) return
  if (cursor.peekJointPunct('::', 1) && cursor.peekIdent(3)) {
    return parsePathName(cursor, '::')
  }
  if (cursor.peekPunct('.', 1) && cursor.peekIdent(2)) {
    return parsePathName(cursor, '.')
  }
  if (
    (cursor.peekPunct('-', 1) || cursor.peekPunct(':', 1)) &&
    cursor.peekIdent(2)
  ) {
    return parsePunctuatedName(cursor)
  }
  return parsePathName(cursor, '::')
}

export function parseNodeName(
  context: ParserContext,
  cursor: TokenCursor,
): NodeName | undefined {
  const name = tryParseNodeName(cursor)
  if (name) return name
  const group = cursor.peekGroup(Delimiters.BRACE)
  if (group) {
    cursor.next()
    const block = parseBlockGroup(context, group)
    return { type: NameTypes.BLOCK, block, loc: group.loc }
  }
  return context.emitExpected(cursor, ErrorCodes.X_INVALID_NODE_NAME)
}

function parseAttribute(
  context: ParserContext,
  cursor: TokenCursor,
): AttributeNode | undefined {
  const group = cursor.peekGroup(Delimiters.BRACE)
  if (group) {
    cursor.next()
    return {
      type: NodeTypes.DYNAMIC_ATTRIBUTE,
      block: parseBlockGroup(context, group),
      loc: group.loc,
    }
  }

  const key = parseNodeName(context, cursor)
  if (!key) return
  const eq = cursor.eatPunct('=')
  if (!eq) {
    return { type: NodeTypes.ATTRIBUTE, key, value: null, loc: key.loc }
  }
  if (cursor.isEmpty()) {
    context.emitError(ErrorCodes.X_MISSING_ATTRIBUTE_VALUE, key.loc)
    return {
      type: NodeTypes.ATTRIBUTE,
      key,
      value: null,
      loc: mergeLocs(key.loc, eq),
    }
  }

  const valueGroup = cursor.peekGroup(Delimiters.BRACE)
  if (valueGroup) {
    cursor.next()
    const block = parseBlockGroup(context, valueGroup)
    return {
      type: NodeTypes.ATTRIBUTE,
      key,
      value: block,
      loc: mergeLocs(key.loc, block.loc),
    }
  }

  const value = parseValueExpression(context, cursor)
  return {
    type: NodeTypes.ATTRIBUTE,
    key,
    value: value || null,
    loc: mergeLocs(key.loc, value ? value.loc : eq),
  }
}

function parseValueExpression(
  context: ParserContext,
  cursor: TokenCursor,
): ExpressionNode | undefined {
  const start = cursor.position
  const fork = cursor.fork()
  try {
    const ast = context.options.expressionParser.parseExpression(fork)
    if (fork.position === start) {
      return context.emitError(
        ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION,
        cursor.loc,
        undefined,
        `: expected an expression`,
      )
    }
    cursor.commit(fork)
    const tokens = cursor.since(start)
    return createExpression(
      tokens,
      tokensToSourceText(tokens, context.options.sourceText),
      ast,
    )
  } catch (e: unknown) {
    context.pushDiagnostic(
      toParseError(e, ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION, cursor.loc),
    )
  }
}

/**
 * Second phase of the open tag: the tokens collected before the tag end
 * are read as a list of attributes. Tokens no attribute could use are
 * reported once and dropped, unless `skipInvalidPunctuation` lets the loop
 * step over a stray punctuation character.
 */
function parseAttributes(
  context: ParserContext,
  cursor: TokenCursor,
): AttributeNode[] {
  const attributes: AttributeNode[] = []
  while (!cursor.isEmpty()) {
    const before = cursor.position
    const attribute = parseAttribute(context, cursor)
    if (attribute) attributes.push(attribute)
    if (cursor.position === before && !context.skipPunctuation(cursor)) break
  }
  if (!cursor.isEmpty()) {
    context.emitError(ErrorCodes.X_IGNORED_TOKENS, tokensLoc(cursor.rest()))
  }
  return attributes
}

interface TagEnd {
  selfClosing: boolean
  loc: SourceLocation
}

function parseTagEnd(cursor: TokenCursor): TagEnd | undefined {
  const selfClosing = cursor.eatPunct('/>')
  if (selfClosing) return { selfClosing: true, loc: selfClosing }
  const end = cursor.eatPunct('>')
  if (end) return { selfClosing: false, loc: end }
}

/**
 * `<name attr=value {dynamic} ...>` or `.../>`. The attribute tokens are
 * first collected up to the tag end, then parsed on their own.
 */
export function parseOpenTag(
  context: ParserContext,
  cursor: TokenCursor,
): OpenTag | undefined {
  const startLoc = cursor.eatPunct('<')
  if (!startLoc) {
    return context.emitError(
      ErrorCodes.X_UNEXPECTED_TOKEN,
      cursor.loc,
      undefined,
      `: expected '<'`,
    )
  }
  const name = parseNodeName(context, cursor)
  if (!name) return

  const collected = collectUntil(cursor, fork => !!parseTagEnd(fork))
  const end = parseTagEnd(cursor)
  if (!end) {
    return context.emitExpected(cursor, ErrorCodes.X_MISSING_TAG_END)
  }

  const attributes = parseAttributes(
    context,
    TokenCursor.from(collected, end.loc),
  )
  return {
    name,
    attributes,
    selfClosing: end.selfClosing,
    loc: mergeLocs(startLoc, end.loc),
    endLoc: end.loc,
  }
}

/** The rest of a close tag, after its `</`. */
export function parseCloseTag(
  context: ParserContext,
  cursor: TokenCursor,
  startLoc: SourceLocation,
): CloseTag | undefined {
  const name = parseNodeName(context, cursor)
  if (!name) return
  const end = cursor.eatPunct('>')
  if (!end) {
    return context.emitExpected(cursor, ErrorCodes.X_MISSING_TAG_END)
  }
  return { name, loc: mergeLocs(startLoc, end), startLoc }
}
