export {
  default as Tokenizer,
  CharCodes,
  LexError,
  State,
  isWhitespace,
  tokenize,
} from './tokenizer'
export { createSourceText } from './sourceText'
