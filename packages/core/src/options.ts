import { NO } from '@vue/shared'
import type { NodeTypes, SourceLocation } from './ast'
import type { TokenCursor } from './cursor'
import {
  type ParseError,
  type ParseWarning,
  defaultOnError,
  defaultOnWarn,
} from './errors'
import type { TokenTree } from './tokens'

/**
 * Parses embedded host-language code. Both methods advance the cursor past
 * what they parsed and throw on a syntax error; the returned value is kept
 * on the node as its `ast`.
 */
export interface ExpressionParser {
  /** Parses one expression, leaving the rest of the cursor untouched. */
  parseExpression(cursor: TokenCursor): object | null
  /** Parses the whole content of a block; must consume every token. */
  parseBlock(cursor: TokenCursor): object | null
}

/** Access to the original source behind token locations, when available. */
export interface SourceTextProvider {
  textOf(loc: SourceLocation): string | undefined
  join(a: SourceLocation, b: SourceLocation): SourceLocation | undefined
}

/**
 * Runs on a fork of the block content before it is handed to the
 * expression parser. Returning tokens replaces the content (the hook must
 * then consume every token of the block); returning `null` or `undefined`
 * leaves the block alone.
 */
export type BlockTransform = (
  cursor: TokenCursor,
) => TokenTree[] | null | undefined

export interface ParserOptions {
  /**
   * Return the pre-order flattening of the tree instead of the tree.
   * @default false
   */
  flattenTree?: boolean
  /**
   * Exact number of top level nodes the input must have.
   */
  topLevelCount?: number | null
  /**
   * Type every top level node must have.
   */
  topLevelType?: NodeTypes | null
  /**
   * e.g. void elements like `<img>`, which never have children.
   */
  isSelfClosingTag?: (name: string) => boolean
  /**
   * Elements whose content is kept as one raw text node. The empty name
   * stands for fragments.
   */
  isRawTextTag?: (name: string) => boolean
  /**
   * Keep blocks that fail to parse as invalid payloads instead of aborting.
   * @default false
   */
  recoverInvalidBlocks?: boolean
  /**
   * Stop at the first diagnostic and discard the tree.
   * @default false
   */
  strict?: boolean
  transformBlock?: BlockTransform | null
  expressionParser?: ExpressionParser
  sourceText?: SourceTextProvider | null
  /**
   * Skip one stray punctuation character when a child fails to parse
   * without consuming anything.
   * @default false
   */
  skipInvalidPunctuation?: boolean
  /**
   * @default 512
   */
  maxNestingDepth?: number
  onError?: (error: ParseError) => void
  onWarn?: (warning: ParseWarning) => void
}

type OptionalOptions = 'transformBlock' | 'sourceText'

export type MergedParserOptions = Omit<
  Required<ParserOptions>,
  OptionalOptions
> &
  Pick<ParserOptions, OptionalOptions>

export const defaultParserOptions: Omit<
  MergedParserOptions,
  'expressionParser'
> = {
  flattenTree: false,
  topLevelCount: null,
  topLevelType: null,
  isSelfClosingTag: NO,
  isRawTextTag: NO,
  recoverInvalidBlocks: false,
  strict: false,
  skipInvalidPunctuation: false,
  maxNestingDepth: 512,
  onError: defaultOnError,
  onWarn: defaultOnWarn,
}
