import type { SourceLocation } from './ast'
import type { TokenCursor } from './cursor'
import {
  ErrorCodes,
  type ParseError,
  type ParseErrorNote,
  type WarningCodes,
  createParseError,
  createParseWarning,
} from './errors'
import type { MergedParserOptions } from './options'
import { isPunct } from './tokens'

// Thrown to unwind the whole parse. The diagnostic explaining it has already
// been recorded when this is raised.
class ParseAbort extends Error {
  constructor(readonly error: ParseError) {
    super(error.message)
  }
}

export function isParseAbort(e: unknown): e is ParseAbort {
  return e instanceof ParseAbort
}

/**
 * State of one parse call: the resolved options, the diagnostics recorded so
 * far and the current nesting depth. Nothing here outlives the call.
 */
export class ParserContext {
  readonly diagnostics: ParseError[] = []
  private depth = 0

  constructor(readonly options: MergedParserOptions) {}

  /** Records a diagnostic and lets the caller continue. */
  emitError(
    code: ErrorCodes,
    loc: SourceLocation,
    notes?: ParseErrorNote[],
    additionalMessage?: string,
  ): undefined {
    this.pushDiagnostic(createParseError(code, loc, notes, additionalMessage))
    return undefined
  }

  /**
   * Reports `code` at the cursor, or `X_UNEXPECTED_EOF` when the input ran
   * out before the expected token.
   */
  emitExpected(cursor: TokenCursor, code: ErrorCodes): undefined {
    return this.emitError(
      cursor.isEmpty() ? ErrorCodes.X_UNEXPECTED_EOF : code,
      cursor.loc,
    )
  }

  pushDiagnostic(error: ParseError): void {
    this.diagnostics.push(error)
    this.options.onError(error)
  }

  /** Records a diagnostic and unwinds to the entry point. */
  abort(error: ParseError): never {
    this.pushDiagnostic(error)
    throw new ParseAbort(error)
  }

  warn(code: WarningCodes, loc: SourceLocation, additionalMessage?: string) {
    this.options.onWarn(createParseWarning(code, loc, additionalMessage))
  }

  /**
   * With `skipInvalidPunctuation`, consumes one stray punctuation character
   * other than `<` and reports it. Returns whether anything was skipped.
   */
  skipPunctuation(cursor: TokenCursor): boolean {
    const token = cursor.peek()
    if (
      !this.options.skipInvalidPunctuation ||
      !isPunct(token) ||
      token.char === '<'
    ) {
      return false
    }
    cursor.next()
    this.emitError(
      ErrorCodes.X_UNEXPECTED_TOKEN,
      token.loc,
      undefined,
      `: skipped '${token.char}'`,
    )
    return true
  }

  /**
   * Runs `fn` one nesting level deeper. Exceeding `maxNestingDepth` aborts
   * the parse instead of exhausting the call stack.
   */
  nested<T>(loc: SourceLocation, fn: () => T): T {
    if (this.depth >= this.options.maxNestingDepth) {
      this.abort(
        createParseError(
          ErrorCodes.X_NESTING_TOO_DEEP,
          loc,
          undefined,
          ` (limit is ${this.options.maxNestingDepth})`,
        ),
      )
    }
    this.depth++
    try {
      return fn()
    } finally {
      this.depth--
    }
  }
}
