import { extend } from '@vue/shared'
import {
  type ChildNode,
  type CloseTag,
  type CommentNode,
  type DoctypeNode,
  type ElementNode,
  type FragmentClose,
  type FragmentNode,
  NodeTypes,
  type OpenTag,
  type SourceLocation,
  type TextNode,
  createElement,
  createRawText,
  isSameNodeName,
  locStub,
  NameTypes,
  type NodeName,
  mergeLocs,
  nodeNameToString,
  tokensLoc,
} from './ast'
import { parseBlock } from './block'
import { ParserContext, isParseAbort } from './context'
import { NodeStart, TokenCursor, classifyNode, collectUntil } from './cursor'
import { ErrorCodes, WarningCodes } from './errors'
import { defaultExpressionParser } from './expression'
import {
  type MergedParserOptions,
  type ParserOptions,
  defaultParserOptions,
} from './options'
import {
  collectRawText,
  setRawTextContext,
  tokensToSourceText,
} from './rawText'
import { type ParseOutcome, outcomeFromParts, unwrapOutcome } from './result'
import { parseCloseTag, parseOpenTag, tryParseNodeName } from './tags'
import { Delimiters, type TokenTree, tokensToString } from './tokens'
import { flattenNodes } from './utils'

export function resolveOptions(options: ParserOptions): MergedParserOptions {
  const d = defaultParserOptions
  return {
    flattenTree: options.flattenTree ?? d.flattenTree,
    topLevelCount: options.topLevelCount ?? d.topLevelCount,
    topLevelType: options.topLevelType ?? d.topLevelType,
    isSelfClosingTag: options.isSelfClosingTag ?? d.isSelfClosingTag,
    isRawTextTag: options.isRawTextTag ?? d.isRawTextTag,
    recoverInvalidBlocks:
      options.recoverInvalidBlocks ?? d.recoverInvalidBlocks,
    strict: options.strict ?? d.strict,
    transformBlock: options.transformBlock,
    expressionParser: options.expressionParser ?? defaultExpressionParser,
    sourceText: options.sourceText,
    skipInvalidPunctuation:
      options.skipInvalidPunctuation ?? d.skipInvalidPunctuation,
    maxNestingDepth: options.maxNestingDepth ?? d.maxNestingDepth,
    onError: options.onError ?? d.onError,
    onWarn: options.onWarn ?? d.onWarn,
  }
}

function parseNode(
  context: ParserContext,
  cursor: TokenCursor,
): ChildNode | undefined {
  switch (classifyNode(cursor)) {
    case NodeStart.DOCTYPE:
      return parseDoctype(context, cursor)
    case NodeStart.COMMENT:
      return parseComment(context, cursor)
    case NodeStart.FRAGMENT:
      return parseFragment(context, cursor)
    case NodeStart.ELEMENT:
      return parseElement(context, cursor)
    case NodeStart.CLOSE_TAG:
      return skipStrayCloseTag(context, cursor)
    case NodeStart.BLOCK:
      return parseBlock(context, cursor)
    case NodeStart.TEXT:
      return parseText(cursor)
    case NodeStart.RAW_TEXT:
      return parseRawText(cursor)
    case NodeStart.END:
      return context.emitError(ErrorCodes.X_UNEXPECTED_EOF, cursor.loc)
  }
}

// Called when a node parse consumed nothing. Returns whether the loop may
// go on.
function recoverProgress(context: ParserContext, cursor: TokenCursor) {
  if (context.skipPunctuation(cursor)) return true
  context.emitError(ErrorCodes.X_UNEXPECTED_TOKEN, cursor.loc)
  return false
}

/**
 * Parses sibling nodes until the end of input or, when `untilCloseTag` is
 * set, until a `</`.
 */
function parseChildren(
  context: ParserContext,
  cursor: TokenCursor,
  untilCloseTag: boolean,
  nodes: ChildNode[] = [],
): ChildNode[] {
  while (!cursor.isEmpty() && !(untilCloseTag && cursor.peekPunct('</'))) {
    const before = cursor.position
    const node = parseNode(context, cursor)
    if (node) nodes.push(node)
    if (cursor.position === before && !recoverProgress(context, cursor)) {
      break
    }
  }
  return nodes
}

function parseElement(
  context: ParserContext,
  cursor: TokenCursor,
): ElementNode | undefined {
  const openTag = parseOpenTag(context, cursor)
  if (!openTag) return

  const { options } = context
  const name = nodeNameToString(openTag.name)
  if (openTag.selfClosing || options.isSelfClosingTag(name)) {
    const closeTag = openTag.selfClosing
      ? null
      : parseVoidCloseTag(context, cursor, openTag)
    return createElement(openTag, [], closeTag)
  }

  let children: ChildNode[]
  if (options.isRawTextTag(name)) {
    children = parseRawTextBody(cursor, openTag.name)
  } else {
    children = context.nested(openTag.loc, () =>
      parseChildren(context, cursor, true),
    )
  }

  const closeTag = parseElementClose(context, cursor, openTag)
  setRawTextContext(
    children,
    openTag.endLoc,
    closeTag ? closeTag.startLoc : null,
    options.sourceText,
  )
  return createElement(openTag, children, closeTag)
}

// Body of a raw text element or fragment: one node holding everything up
// to the close tag matching `name` (`</>` for a fragment). Other close tags
// are part of the text.
function parseRawTextBody(
  cursor: TokenCursor,
  name: NodeName | null,
): ChildNode[] {
  const tokens = collectUntil(cursor, fork => isCloseOf(fork, name))
  return tokens.length ? [createRawText(tokens)] : []
}

function isCloseOf(fork: TokenCursor, name: NodeName | null): boolean {
  if (!fork.eatPunct('</')) return false
  if (!name) return fork.peekPunct('>')
  if (name.type === NameTypes.BLOCK) {
    const group = fork.peekGroup(Delimiters.BRACE)
    return (
      !!group &&
      tokensToString(group.tokens) ===
        tokensToString(name.block.payload.group.tokens)
    )
  }
  const found = tryParseNodeName(fork)
  return !!found && isSameNodeName(found, name)
}

function parseElementClose(
  context: ParserContext,
  cursor: TokenCursor,
  openTag: OpenTag,
): CloseTag | null {
  const startLoc = cursor.eatPunct('</')
  if (!startLoc) {
    context.emitError(ErrorCodes.X_UNTERMINATED_OPEN_TAG, openTag.loc)
    return null
  }
  const closeTag = parseCloseTag(context, cursor, startLoc)
  if (!closeTag) return null
  if (!isSameNodeName(openTag.name, closeTag.name)) {
    context.emitError(ErrorCodes.X_MISMATCHED_CLOSE_TAG, closeTag.loc, [
      {
        loc: openTag.loc,
        message: "open tag that should be closed; it's started here",
      },
    ])
  }
  return closeTag
}

/**
 * `<br></br>`: a matching close tag right after a self-closing element is
 * consumed with a warning instead of being reported as stray.
 */
function parseVoidCloseTag(
  context: ParserContext,
  cursor: TokenCursor,
  openTag: OpenTag,
): CloseTag | null {
  const fork = cursor.fork()
  const startLoc = fork.eatPunct('</')
  if (!startLoc) return null
  const name = tryParseNodeName(fork)
  const end = fork.eatPunct('>')
  if (!name || !end || !isSameNodeName(name, openTag.name)) return null
  cursor.commit(fork)
  const closeTag = { name, loc: mergeLocs(startLoc, end), startLoc }
  context.warn(
    WarningCodes.W_VOID_ELEMENT_CLOSE_TAG,
    closeTag.loc,
    `: </${nodeNameToString(name)}>`,
  )
  return closeTag
}

function parseFragment(
  context: ParserContext,
  cursor: TokenCursor,
): FragmentNode {
  const openLoc = cursor.eatPunct('<>') || cursor.loc
  const { options } = context

  let children: ChildNode[]
  if (options.isRawTextTag('')) {
    children = parseRawTextBody(cursor, null)
  } else {
    children = context.nested(openLoc, () =>
      parseChildren(context, cursor, true),
    )
  }

  const close = parseFragmentClose(context, cursor, openLoc)
  setRawTextContext(
    children,
    openLoc,
    close ? close.startLoc : null,
    options.sourceText,
  )
  return {
    type: NodeTypes.FRAGMENT,
    openLoc,
    children,
    close,
    loc: close ? mergeLocs(openLoc, close.loc) : openLoc,
  }
}

function parseFragmentClose(
  context: ParserContext,
  cursor: TokenCursor,
  openLoc: SourceLocation,
): FragmentClose | null {
  const startLoc = cursor.eatPunct('</')
  if (!startLoc) {
    context.emitError(ErrorCodes.X_UNTERMINATED_FRAGMENT, openLoc)
    return null
  }
  if (cursor.peekIdent()) {
    const name = tryParseNodeName(cursor)
    context.emitError(
      ErrorCodes.X_FRAGMENT_CLOSED_BY_ELEMENT,
      name ? name.loc : cursor.loc,
    )
  }
  const end = cursor.eatPunct('>')
  if (!end) {
    context.emitExpected(cursor, ErrorCodes.X_MISSING_TAG_END)
    return null
  }
  return { loc: mergeLocs(startLoc, end), startLoc }
}

// `<!DOCTYPE html>`; the value is everything up to `>`
function parseDoctype(
  context: ParserContext,
  cursor: TokenCursor,
): DoctypeNode | undefined {
  const startLoc = cursor.eatPunct('<!') || cursor.loc
  const keyword = cursor.eatIdent()
  if (!keyword || keyword.name.toLowerCase() !== 'doctype') {
    return context.emitError(
      ErrorCodes.X_INVALID_DOCTYPE,
      keyword ? keyword.loc : cursor.loc,
    )
  }
  const tokens = collectUntil(cursor, fork => fork.peekPunct('>'))
  const end = cursor.eatPunct('>')
  if (!end) {
    return context.emitExpected(cursor, ErrorCodes.X_MISSING_TAG_END)
  }
  return {
    type: NodeTypes.DOCTYPE,
    tokens,
    content: tokensToSourceText(tokens, context.options.sourceText),
    loc: mergeLocs(startLoc, end),
  }
}

// `<!-- "text" -->`
function parseComment(
  context: ParserContext,
  cursor: TokenCursor,
): CommentNode | undefined {
  const startLoc = cursor.eatPunct('<!--')
  const literal = startLoc && cursor.peekStringLiteral()
  if (!startLoc || !literal) {
    return context.emitExpected(cursor, ErrorCodes.X_MALFORMED_COMMENT)
  }
  cursor.next()
  const end = cursor.eatPunct('-->')
  if (!end) {
    return context.emitExpected(cursor, ErrorCodes.X_MALFORMED_COMMENT)
  }
  return {
    type: NodeTypes.COMMENT,
    content: literal.value,
    literal,
    loc: mergeLocs(startLoc, end),
  }
}

function parseText(cursor: TokenCursor): TextNode | undefined {
  const literal = cursor.peekStringLiteral()
  if (!literal) return
  cursor.next()
  return {
    type: NodeTypes.TEXT,
    content: literal.value,
    literal,
    loc: literal.loc,
  }
}

function parseRawText(cursor: TokenCursor): ChildNode | undefined {
  const tokens = collectRawText(cursor)
  if (!tokens.length) return
  // content is settled by the parent once the siblings are known
  return createRawText(tokens)
}

// A `</...>` with nothing open: reported, then skipped through its `>`.
function skipStrayCloseTag(
  context: ParserContext,
  cursor: TokenCursor,
): undefined {
  const start = cursor.position
  cursor.eatPunct('</')
  collectUntil(cursor, fork => fork.peekPunct('>') || fork.peekPunct('<'))
  cursor.eatPunct('>')
  return context.emitError(
    ErrorCodes.X_UNEXPECTED_CLOSE_TAG,
    tokensLoc(cursor.since(start)),
  )
}

function checkTopLevel(context: ParserContext, nodes: ChildNode[]) {
  const { topLevelType, topLevelCount } = context.options
  if (topLevelType != null) {
    for (const node of nodes) {
      if (node.type !== topLevelType) {
        const expected = nodeTypeName(topLevelType)
        const found = nodeTypeName(node.type)
        context.emitError(
          ErrorCodes.X_TOP_LEVEL_TYPE,
          node.loc,
          undefined,
          `: expected ${expected}, found ${found}`,
        )
      }
    }
  }
  if (topLevelCount != null && nodes.length !== topLevelCount) {
    context.emitError(
      ErrorCodes.X_TOP_LEVEL_COUNT,
      nodes.length ? spanOf(nodes) : locStub,
      undefined,
      ` (saw ${nodes.length}, exactly ${topLevelCount} required)`,
    )
  }
}

function nodeTypeName(type: NodeTypes): string {
  return NodeTypes[type].toLowerCase().replace('_', ' ')
}

function spanOf(nodes: ChildNode[]): SourceLocation {
  return mergeLocs(nodes[0].loc, nodes[nodes.length - 1].loc)
}

/**
 * Parses a token sequence into nodes, recording every problem found on the
 * way. Parsing only stops early when a block fails without
 * `recoverInvalidBlocks` or the nesting limit is hit; the top level nodes
 * completed before that are kept.
 */
export function parseRecoverable(
  tokens: readonly TokenTree[],
  options: ParserOptions = {},
): ParseOutcome<ChildNode[]> {
  const context = new ParserContext(resolveOptions(options))
  const cursor = TokenCursor.from(tokens)

  const nodes: ChildNode[] = []
  try {
    parseChildren(context, cursor, false, nodes)
  } catch (e: unknown) {
    if (!isParseAbort(e)) throw e
  }

  const { diagnostics, options: merged } = context
  setRawTextContext(nodes, null, null, merged.sourceText)
  checkTopLevel(context, nodes)
  const value = merged.flattenTree ? flattenNodes(nodes) : nodes

  if (merged.strict) {
    return diagnostics.length
      ? { type: 'failed', diagnostics: diagnostics.slice(0, 1) }
      : { type: 'ok', value }
  }
  return outcomeFromParts(
    nodes.length || !diagnostics.length ? value : undefined,
    diagnostics,
  )
}

/** Parses well-formed input, throwing the first diagnostic otherwise. */
export function parseStrict(
  tokens: readonly TokenTree[],
  options: ParserOptions = {},
): ChildNode[] {
  return unwrapOutcome(
    parseRecoverable(tokens, extend({}, options, { strict: true })),
  )
}
