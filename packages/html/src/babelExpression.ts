import {
  type ParserOptions as BabelOptions,
  type ParserPlugin,
  parse,
  parseExpression,
} from '@babel/parser'
import type { Expression, Program } from '@babel/types'
import {
  type ExpressionParser,
  type TokenCursor,
  tokensToString,
} from '@tagtree/core'

export interface BabelExpressionParserOptions {
  plugins?: ParserPlugin[]
  /**
   * How block content is read: as one expression, or as statements like
   * `count++; emit(count)`.
   * @default 'expression'
   */
  blockMode?: 'expression' | 'statements'
}

/**
 * Host expression parser for JavaScript (and TypeScript) expressions. The
 * tokens are turned back into text and handed to `@babel/parser`.
 */
export function createBabelExpressionParser(
  options: BabelExpressionParserOptions = {},
): ExpressionParser {
  const { plugins, blockMode = 'expression' } = options
  const babelOptions: BabelOptions = {
    plugins: plugins ? [...plugins, 'typescript'] : ['typescript'],
  }
  const parseJs = (content: string): Expression =>
    parseExpression(`(${content})`, babelOptions)

  return {
    // An attribute value ends where the next attribute starts, which only
    // the expression grammar knows: take the longest token prefix that
    // parses.
    parseExpression(cursor: TokenCursor) {
      const rest = cursor.rest()
      let lastError: unknown
      for (let n = rest.length; n > 0; n--) {
        let ast: Expression
        try {
          ast = parseJs(tokensToString(rest.slice(0, n)))
        } catch (e: unknown) {
          lastError = lastError || e
          continue
        }
        for (let i = 0; i < n; i++) cursor.next()
        return ast
      }
      throw lastError ?? new SyntaxError('expected an expression')
    },
    parseBlock(cursor: TokenCursor): Expression | Program | null {
      const content = tokensToString(cursor.rest())
      cursor.skipToEnd()
      if (blockMode === 'statements') {
        // pad 1 char like inline handlers with multiple statements
        return parse(` ${content} `, babelOptions).program
      }
      return content.trim() ? parseJs(content) : null
    },
  }
}
