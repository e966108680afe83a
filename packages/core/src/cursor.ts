import { type SourceLocation, locStub, tokensLoc } from './ast'
import {
  Delimiters,
  type GroupToken,
  type IdentToken,
  type LiteralToken,
  type TokenTree,
  isGroup,
  isIdent,
  isPunct,
  isStringLiteral,
} from './tokens'

/**
 * A position in a token sequence. Forking copies the position only, so
 * speculative parses never disturb the cursor they were forked from; a
 * successful fork is adopted with `commit`.
 */
export class TokenCursor {
  private constructor(
    private readonly tokens: readonly TokenTree[],
    private index: number,
    // reported as the location of the next token once input is exhausted
    readonly endLoc: SourceLocation,
  ) {}

  static from(
    tokens: readonly TokenTree[],
    endLoc: SourceLocation = endOf(tokensLoc(tokens)),
  ): TokenCursor {
    return new TokenCursor(tokens, 0, endLoc)
  }

  /** Cursor over the content of a delimited group. */
  static ofGroup(group: GroupToken): TokenCursor {
    return TokenCursor.from(group.tokens, group.closeLoc)
  }

  get position(): number {
    return this.index
  }

  isEmpty(): boolean {
    return this.index >= this.tokens.length
  }

  peek(k = 0): TokenTree | undefined {
    return this.tokens[this.index + k]
  }

  /**
   * Checks for consecutive punctuation characters starting `k` tokens
   * ahead. Spacing is not considered, so `<` `/` written apart still
   * counts as `</`.
   */
  peekPunct(chars: string, k = 0): boolean {
    for (let i = 0; i < chars.length; i++) {
      if (!isPunct(this.peek(k + i), chars[i])) return false
    }
    return true
  }

  /** Like `peekPunct`, but every character but the last must be joint. */
  peekJointPunct(chars: string, k = 0): boolean {
    for (let i = 0; i < chars.length; i++) {
      const token = this.peek(k + i)
      if (!isPunct(token, chars[i])) return false
      if (i < chars.length - 1 && token.spacing !== 'joint') return false
    }
    return true
  }

  peekIdent(k = 0): IdentToken | undefined {
    const token = this.peek(k)
    return isIdent(token) ? token : undefined
  }

  peekGroup(delimiter?: Delimiters, k = 0): GroupToken | undefined {
    const token = this.peek(k)
    return isGroup(token, delimiter) ? token : undefined
  }

  peekStringLiteral(k = 0): LiteralToken | undefined {
    const token = this.peek(k)
    return isStringLiteral(token) ? token : undefined
  }

  next(): TokenTree | undefined {
    const token = this.tokens[this.index]
    if (token) this.index++
    return token
  }

  /** Consumes the given punctuation characters if they are next. */
  eatPunct(chars: string): SourceLocation | undefined {
    if (!this.peekPunct(chars)) return
    const start = this.index
    this.index += chars.length
    return tokensLoc(this.tokens.slice(start, this.index))
  }

  eatIdent(): IdentToken | undefined {
    const token = this.peekIdent()
    if (token) this.index++
    return token
  }

  fork(): TokenCursor {
    return new TokenCursor(this.tokens, this.index, this.endLoc)
  }

  commit(fork: TokenCursor): void {
    if (fork.tokens !== this.tokens) {
      throw new Error('cannot commit a cursor over a different token stream')
    }
    this.index = fork.index
  }

  /** Location of the next token, or of the end of input. */
  get loc(): SourceLocation {
    const token = this.peek()
    return token ? token.loc : this.endLoc
  }

  /** Location of the most recently consumed token. */
  get prevLoc(): SourceLocation {
    return this.index > 0 ? this.tokens[this.index - 1].loc : locStub
  }

  /** Tokens consumed since `position`. */
  since(position: number): TokenTree[] {
    return this.tokens.slice(position, this.index)
  }

  rest(): TokenTree[] {
    return this.tokens.slice(this.index)
  }

  skipToEnd(): void {
    this.index = this.tokens.length
  }
}

function endOf(loc: SourceLocation): SourceLocation {
  return loc === locStub ? loc : { start: loc.end, end: loc.end }
}

export enum NodeStart {
  END,
  DOCTYPE,
  COMMENT,
  FRAGMENT,
  CLOSE_TAG,
  ELEMENT,
  BLOCK,
  TEXT,
  RAW_TEXT,
}

/**
 * Decides which construct starts at the cursor from at most three tokens of
 * lookahead.
 */
export function classifyNode(cursor: TokenCursor): NodeStart {
  if (cursor.isEmpty()) return NodeStart.END
  if (cursor.peekPunct('<')) {
    if (cursor.peekPunct('!', 1)) {
      return cursor.peekIdent(2) ? NodeStart.DOCTYPE : NodeStart.COMMENT
    }
    if (cursor.peekPunct('>', 1)) return NodeStart.FRAGMENT
    if (cursor.peekPunct('/', 1)) return NodeStart.CLOSE_TAG
    return NodeStart.ELEMENT
  }
  if (cursor.peekGroup(Delimiters.BRACE)) return NodeStart.BLOCK
  if (cursor.peekStringLiteral()) return NodeStart.TEXT
  return NodeStart.RAW_TEXT
}

/**
 * First phase of two-phase parsing: copies tokens one at a time until
 * `isEnd` recognizes a terminator on a fork of the cursor. The terminator is
 * left in place, so it always wins over any reading of the copied tokens.
 */
export function collectUntil(
  cursor: TokenCursor,
  isEnd: (fork: TokenCursor) => boolean,
): TokenTree[] {
  const start = cursor.position
  while (!cursor.isEmpty() && !isEnd(cursor.fork())) {
    cursor.next()
  }
  return cursor.since(start)
}
