import { type BlockNode, NodeTypes } from './ast'
import type { ParserContext } from './context'
import { TokenCursor } from './cursor'
import { ErrorCodes, createParseError, toParseError } from './errors'
import { tokensToSourceText } from './rawText'
import {
  Delimiters,
  type GroupToken,
  type TokenTree,
  tokensToString,
} from './tokens'

export function parseBlock(
  context: ParserContext,
  cursor: TokenCursor,
): BlockNode | undefined {
  const group = cursor.peekGroup(Delimiters.BRACE)
  if (!group) {
    return context.emitError(
      ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION,
      cursor.loc,
      undefined,
      `: expected a block`,
    )
  }
  cursor.next()
  return parseBlockGroup(context, group)
}

/**
 * Parses the content of a brace group with the host expression parser,
 * after running the block transform hook if one is configured.
 *
 * A block that fails to parse becomes an invalid payload when
 * `recoverInvalidBlocks` is set, and aborts the parse otherwise.
 */
export function parseBlockGroup(
  context: ParserContext,
  group: GroupToken,
): BlockNode {
  const { options } = context
  try {
    let tokens: TokenTree[] = group.tokens
    let transformed = false
    if (options.transformBlock) {
      const fork = TokenCursor.ofGroup(group)
      const replacement = options.transformBlock(fork)
      if (replacement) {
        if (!fork.isEmpty()) {
          throw createParseError(
            ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION,
            fork.loc,
            undefined,
            `: block transform left tokens unconsumed`,
          )
        }
        tokens = replacement
        transformed = true
      }
    }

    const inner = TokenCursor.from(tokens, group.closeLoc)
    const ast = options.expressionParser.parseBlock(inner)
    if (!inner.isEmpty()) {
      throw createParseError(
        ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION,
        inner.loc,
        undefined,
        `: unexpected token in block`,
      )
    }
    return {
      type: NodeTypes.BLOCK,
      payload: {
        type: 'valid',
        group,
        tokens,
        content: transformed
          ? tokensToString(tokens)
          : tokensToSourceText(tokens, options.sourceText),
        ast,
      },
      loc: group.loc,
    }
  } catch (e: unknown) {
    const error = toParseError(
      e,
      ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION,
      group.loc,
    )
    if (!options.recoverInvalidBlocks) {
      return context.abort(error)
    }
    context.pushDiagnostic(error)
    return {
      type: NodeTypes.BLOCK,
      payload: { type: 'invalid', group, tokens: group.tokens },
      loc: group.loc,
    }
  }
}
