import type { ParserPlugin } from '@babel/parser'
import {
  type ChildNode,
  ErrorCodes,
  type ParseOutcome,
  type ParserOptions,
  type TokenTree,
  createParseError,
  parseRecoverable,
  unwrapOutcome,
} from '@tagtree/core'
import { LexError, createSourceText, tokenize } from '@tagtree/lexer'
import { extend } from '@vue/shared'
import {
  type BabelExpressionParserOptions,
  createBabelExpressionParser,
} from './babelExpression'
import { htmlParserOptions } from './parserOptions'

export { htmlParserOptions, isRawTextTag } from './parserOptions'
export {
  type BabelExpressionParserOptions,
  createBabelExpressionParser,
} from './babelExpression'

export interface HTMLParserOptions extends ParserOptions {
  expressionPlugins?: ParserPlugin[]
  blockMode?: BabelExpressionParserOptions['blockMode']
}

/**
 * Lexes and parses markup with the HTML defaults: void elements, raw text
 * `<script>` and `<style>`, JavaScript blocks and attribute values, and
 * whitespace-exact raw text.
 */
export function parse(
  source: string,
  options: HTMLParserOptions = {},
): ParseOutcome<ChildNode[]> {
  let tokens: TokenTree[]
  try {
    tokens = tokenize(source)
  } catch (e: unknown) {
    if (!(e instanceof LexError)) throw e
    const error = createParseError(
      ErrorCodes.X_UNEXPECTED_TOKEN,
      e.loc,
      undefined,
      `: ${e.message}`,
    )
    if (options.onError) options.onError(error)
    return { type: 'failed', diagnostics: [error] }
  }

  const { expressionPlugins, blockMode, ...rest } = options
  return parseRecoverable(
    tokens,
    extend(
      {},
      htmlParserOptions,
      {
        expressionParser: createBabelExpressionParser({
          plugins: expressionPlugins,
          blockMode,
        }),
        sourceText: createSourceText(source),
      },
      rest,
    ),
  )
}

export function parseHTMLStrict(
  source: string,
  options: HTMLParserOptions = {},
): ChildNode[] {
  return unwrapOutcome(parse(source, extend({}, options, { strict: true })))
}
