export { parseRecoverable, parseStrict, resolveOptions } from './parser'
export {
  type ParserOptions,
  type MergedParserOptions,
  type ExpressionParser,
  type SourceTextProvider,
  type BlockTransform,
  defaultParserOptions,
} from './options'
export * from './ast'
export * from './tokens'
export * from './errors'
export * from './result'
export { TokenCursor, NodeStart, classifyNode, collectUntil } from './cursor'
export { ParserContext } from './context'
export { defaultExpressionParser } from './expression'
export {
  rawTextToTokenString,
  rawTextToSourceText,
  rawTextToStringBest,
  setRawTextContext,
  tokensToSourceText,
} from './rawText'
export { flattenNodes, traverseNodes } from './utils'
