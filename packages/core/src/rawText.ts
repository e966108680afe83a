import {
  type ChildNode,
  NodeTypes,
  type RawTextNode,
  type SourceLocation,
  tokensLoc,
} from './ast'
import type { TokenCursor } from './cursor'
import type { SourceTextProvider } from './options'
import { Delimiters, type TokenTree, tokensToString } from './tokens'

/**
 * Takes tokens until something that starts another node: `<`, a brace
 * group, a string literal or the end of input.
 */
export function collectRawText(cursor: TokenCursor): TokenTree[] {
  const start = cursor.position
  while (
    !cursor.isEmpty() &&
    !cursor.peekPunct('<') &&
    !cursor.peekGroup(Delimiters.BRACE) &&
    !cursor.peekStringLiteral()
  ) {
    cursor.next()
  }
  return cursor.since(start)
}

export function rawTextToTokenString(node: RawTextNode): string {
  return tokensToString(node.tokens)
}

/**
 * Source text of the run. With `withWhitespace`, the text between the two
 * boundaries around the run is returned, so leading and trailing whitespace
 * survive; this needs the boundaries to be known.
 */
export function rawTextToSourceText(
  node: RawTextNode,
  provider: SourceTextProvider | null | undefined,
  withWhitespace: boolean,
): string | undefined {
  if (!provider) return
  if (!withWhitespace) {
    return node.tokens.length ? provider.textOf(node.loc) : undefined
  }
  if (!node.contextLocs) return
  const [before, after] = node.contextLocs
  if (!before || !after) return
  const full = provider.join(before, after)
  if (!full) return
  const fullText = provider.textOf(full)
  const startText = provider.textOf(before)
  const endText = provider.textOf(after)
  if (
    fullText === undefined ||
    startText === undefined ||
    endText === undefined ||
    fullText.length < startText.length + endText.length ||
    !fullText.startsWith(startText) ||
    !fullText.endsWith(endText)
  ) {
    return
  }
  return fullText.slice(startText.length, fullText.length - endText.length)
}

export function rawTextToStringBest(
  node: RawTextNode,
  provider?: SourceTextProvider | null,
): string {
  return (
    rawTextToSourceText(node, provider, true) ??
    rawTextToSourceText(node, provider, false) ??
    rawTextToTokenString(node)
  )
}

/** Source text of a token run, or its canonical form. */
export function tokensToSourceText(
  tokens: readonly TokenTree[],
  provider?: SourceTextProvider | null,
): string {
  const text =
    tokens.length && provider ? provider.textOf(tokensLoc(tokens)) : undefined
  return text ?? tokensToString(tokens)
}

/**
 * Assigns the boundaries of every raw text child from the sliding window
 * (previous boundary, child, next boundary) and settles its content.
 */
export function setRawTextContext(
  children: ChildNode[],
  before: SourceLocation | null,
  after: SourceLocation | null,
  provider?: SourceTextProvider | null,
): ChildNode[] {
  const bounds: (SourceLocation | null)[] = [
    before,
    ...children.map(child => child.loc),
    after,
  ]
  children.forEach((child, i) => {
    if (child.type === NodeTypes.RAW_TEXT) {
      child.contextLocs = [bounds[i], bounds[i + 2]]
      child.content = rawTextToStringBest(child, provider)
    }
  })
  return children
}
