import type { SourceLocation } from './ast'

export interface ParseErrorNote {
  loc: SourceLocation
  message: string
}

export class ParseError extends SyntaxError {
  constructor(
    readonly code: ErrorCodes,
    readonly loc: SourceLocation,
    message: string,
    readonly notes: ParseErrorNote[] = [],
  ) {
    super(message)
    this.name = 'ParseError'
  }
}

export interface ParseWarning {
  code: WarningCodes
  loc: SourceLocation
  message: string
}

export function defaultOnError(_error: ParseError): void {}

export function defaultOnWarn(msg: ParseWarning): void {
  console.warn(`[tagtree warn] ${msg.message}`)
}

export function createParseError(
  code: ErrorCodes,
  loc: SourceLocation,
  notes?: ParseErrorNote[],
  additionalMessage?: string,
): ParseError {
  return new ParseError(
    code,
    loc,
    errorMessages[code] + (additionalMessage || ``),
    notes,
  )
}

/**
 * Wraps anything thrown by a collaborator, such as the expression parser or
 * a block transform, into a diagnostic.
 */
export function toParseError(
  e: unknown,
  code: ErrorCodes,
  loc: SourceLocation,
): ParseError {
  if (e instanceof ParseError) return e
  const message = e instanceof Error ? e.message : String(e)
  return createParseError(code, loc, undefined, `: ${message}`)
}

export function createParseWarning(
  code: WarningCodes,
  loc: SourceLocation,
  additionalMessage?: string,
): ParseWarning {
  return {
    code,
    loc,
    message: warningMessages[code] + (additionalMessage || ``),
  }
}

export enum ErrorCodes {
  // tags
  X_UNTERMINATED_OPEN_TAG,
  X_MISMATCHED_CLOSE_TAG,
  X_UNEXPECTED_CLOSE_TAG,
  X_MISSING_TAG_END,
  X_INVALID_NODE_NAME,
  X_IGNORED_TOKENS,

  // attributes & blocks
  X_MISSING_ATTRIBUTE_VALUE,
  X_INVALID_EMBEDDED_EXPRESSION,

  // fragments
  X_UNTERMINATED_FRAGMENT,
  X_FRAGMENT_CLOSED_BY_ELEMENT,

  // doctype & comments
  X_INVALID_DOCTYPE,
  X_MALFORMED_COMMENT,

  // top level
  X_TOP_LEVEL_COUNT,
  X_TOP_LEVEL_TYPE,

  // recovery
  X_UNEXPECTED_EOF,
  X_UNEXPECTED_TOKEN,
  X_NESTING_TOO_DEEP,
}

export const errorMessages: Record<ErrorCodes, string> = {
  [ErrorCodes.X_UNTERMINATED_OPEN_TAG]:
    'open tag has no corresponding close tag',
  [ErrorCodes.X_MISMATCHED_CLOSE_TAG]: 'wrong close tag found',
  [ErrorCodes.X_UNEXPECTED_CLOSE_TAG]:
    'close tag has no corresponding open tag',
  [ErrorCodes.X_MISSING_TAG_END]: "expected end of tag '>'",
  [ErrorCodes.X_INVALID_NODE_NAME]: 'invalid tag name or attribute key',
  [ErrorCodes.X_IGNORED_TOKENS]: 'tokens were ignored during parsing',
  [ErrorCodes.X_MISSING_ATTRIBUTE_VALUE]: 'missing attribute value',
  [ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION]: 'invalid embedded expression',
  [ErrorCodes.X_UNTERMINATED_FRAGMENT]:
    'fragment has no corresponding close tag',
  [ErrorCodes.X_FRAGMENT_CLOSED_BY_ELEMENT]:
    'expected fragment closing, found element closing tag',
  [ErrorCodes.X_INVALID_DOCTYPE]: 'expected DOCTYPE keyword',
  [ErrorCodes.X_MALFORMED_COMMENT]:
    "comment must be a string literal between '<!--' and '-->'",
  [ErrorCodes.X_TOP_LEVEL_COUNT]: 'wrong number of top level nodes',
  [ErrorCodes.X_TOP_LEVEL_TYPE]: 'top level node has the wrong type',
  [ErrorCodes.X_UNEXPECTED_EOF]: 'unexpected end of input',
  [ErrorCodes.X_UNEXPECTED_TOKEN]: 'unexpected token',
  [ErrorCodes.X_NESTING_TOO_DEEP]: 'maximum nesting depth exceeded',
}

export enum WarningCodes {
  W_VOID_ELEMENT_CLOSE_TAG,
}

export const warningMessages: Record<WarningCodes, string> = {
  [WarningCodes.W_VOID_ELEMENT_CLOSE_TAG]:
    'close tag of a self-closing element is ignored',
}
