import {
  Delimiters,
  type Position,
  type SourceLocation,
  type TokenTree,
  createGroup,
  createIdent,
  createLiteral,
  createPunct,
  delimiterChars,
} from '@tagtree/core'

export enum CharCodes {
  Tab = 0x9, // "\t"
  NewLine = 0xa, // "\n"
  VerticalTab = 0xb, // "\v"
  FormFeed = 0xc, // "\f"
  CarriageReturn = 0xd, // "\r"
  Space = 0x20, // " "
  DoubleQuote = 0x22, // '"'
  Dollar = 0x24, // "$"
  SingleQuote = 0x27, // "'"
  LeftParen = 0x28, // "("
  RightParen = 0x29, // ")"
  Asterisk = 0x2a, // "*"
  Dot = 0x2e, // "."
  Slash = 0x2f, // "/"
  Zero = 0x30, // "0"
  Nine = 0x39, // "9"
  UpperA = 0x41, // "A"
  UpperZ = 0x5a, // "Z"
  LeftSquare = 0x5b, // "["
  Backslash = 0x5c, // "\"
  RightSquare = 0x5d, // "]"
  Underscore = 0x5f, // "_"
  GraveAccent = 0x60, // "`"
  LowerA = 0x61, // "a"
  LowerB = 0x62, // "b"
  LowerF = 0x66, // "f"
  LowerN = 0x6e, // "n"
  LowerR = 0x72, // "r"
  LowerT = 0x74, // "t"
  LowerU = 0x75, // "u"
  LowerV = 0x76, // "v"
  LowerX = 0x78, // "x"
  LowerZ = 0x7a, // "z"
  LeftBrace = 0x7b, // "{"
  RightBrace = 0x7d, // "}"
}

/** All the states the tokenizer can be in. */
export enum State {
  Default = 1,
  InIdent,
  InNumber,
  InString,
  InStringEscape,
  InLineComment,
  InBlockComment,
}

export class LexError extends SyntaxError {
  constructor(
    message: string,
    readonly loc: SourceLocation,
  ) {
    super(message)
    this.name = 'LexError'
  }
}

export function isWhitespace(c: number): boolean {
  return (
    c === CharCodes.Space ||
    c === CharCodes.NewLine ||
    c === CharCodes.Tab ||
    c === CharCodes.VerticalTab ||
    c === CharCodes.FormFeed ||
    c === CharCodes.CarriageReturn
  )
}

function isDigit(c: number): boolean {
  return c >= CharCodes.Zero && c <= CharCodes.Nine
}

function isIdentStart(c: number): boolean {
  return (
    (c >= CharCodes.LowerA && c <= CharCodes.LowerZ) ||
    (c >= CharCodes.UpperA && c <= CharCodes.UpperZ) ||
    c === CharCodes.Underscore ||
    c === CharCodes.Dollar ||
    // non-ASCII letters are accepted as is
    c > 0x7f
  )
}

function isIdentPart(c: number): boolean {
  return isIdentStart(c) || isDigit(c)
}

function isQuote(c: number): boolean {
  return (
    c === CharCodes.DoubleQuote ||
    c === CharCodes.SingleQuote ||
    c === CharCodes.GraveAccent
  )
}

function openDelimiter(c: number): Delimiters | undefined {
  switch (c) {
    case CharCodes.LeftParen:
      return Delimiters.PAREN
    case CharCodes.LeftSquare:
      return Delimiters.BRACKET
    case CharCodes.LeftBrace:
      return Delimiters.BRACE
  }
}

function closeDelimiter(c: number): Delimiters | undefined {
  switch (c) {
    case CharCodes.RightParen:
      return Delimiters.PAREN
    case CharCodes.RightSquare:
      return Delimiters.BRACKET
    case CharCodes.RightBrace:
      return Delimiters.BRACE
  }
}

// Anything that is not whitespace and does not start another kind of token.
function isPunctChar(c: number): boolean {
  return (
    !Number.isNaN(c) &&
    !isWhitespace(c) &&
    !isIdentPart(c) &&
    !isQuote(c) &&
    openDelimiter(c) === undefined &&
    closeDelimiter(c) === undefined
  )
}

const simpleEscapes: Record<number, string> = {
  [CharCodes.LowerN]: '\n',
  [CharCodes.LowerR]: '\r',
  [CharCodes.LowerT]: '\t',
  [CharCodes.LowerB]: '\b',
  [CharCodes.LowerF]: '\f',
  [CharCodes.LowerV]: '\v',
  [CharCodes.Zero]: '\0',
}

interface GroupFrame {
  delimiter: Delimiters
  tokens: TokenTree[]
  start: number
}

/**
 * Turns source text into token trees: identifiers, numbers, quoted strings,
 * single punctuation characters and nested `()`, `[]` and `{}` groups.
 * `//` and `/* *\/` comments are skipped.
 */
export default class Tokenizer {
  /** The current state the tokenizer is in. */
  public state: State = State.Default
  private buffer = ''
  /** The read index within the buffer. */
  private index = 0
  /** The beginning of the token being read. */
  private sectionStart = 0
  private quote = 0
  /** Cooked value of the string literal being read. */
  private cooked = ''
  /** Record newline positions for fast line / column calculation */
  private newlines: number[] = []
  private root: TokenTree[] = []
  private stack: GroupFrame[] = []

  public reset(): void {
    this.state = State.Default
    this.buffer = ''
    this.index = 0
    this.sectionStart = 0
    this.quote = 0
    this.cooked = ''
    this.newlines.length = 0
    this.root = []
    this.stack.length = 0
  }

  /**
   * Generate Position object with line / column information using recorded
   * newline positions. We know the index is always going to be an already
   * processed index, so all the newlines up to this index should have been
   * recorded.
   */
  public getPos(index: number): Position {
    let line = 1
    let column = index + 1
    for (let i = this.newlines.length - 1; i >= 0; i--) {
      const newlineIndex = this.newlines[i]
      if (index > newlineIndex) {
        line = i + 2
        column = index - newlineIndex
        break
      }
    }
    return { column, line, offset: index }
  }

  private getLoc(start: number, end: number): SourceLocation {
    return { start: this.getPos(start), end: this.getPos(end) }
  }

  private peek(k = 1): number {
    return this.buffer.charCodeAt(this.index + k)
  }

  private emit(token: TokenTree): void {
    const frame = this.stack[this.stack.length - 1]
    if (frame) {
      frame.tokens.push(token)
    } else {
      this.root.push(token)
    }
  }

  private startsComment(index: number): boolean {
    return (
      this.buffer.charCodeAt(index) === CharCodes.Slash &&
      (this.buffer.charCodeAt(index + 1) === CharCodes.Slash ||
        this.buffer.charCodeAt(index + 1) === CharCodes.Asterisk)
    )
  }

  private stateDefault(c: number): void {
    if (isWhitespace(c)) {
      return
    }
    if (this.startsComment(this.index)) {
      if (this.peek() === CharCodes.Slash) {
        this.state = State.InLineComment
      } else {
        this.state = State.InBlockComment
        this.sectionStart = this.index
        // skip the `*` so that `/*/` does not close itself
        this.index++
      }
    } else if (isQuote(c)) {
      this.state = State.InString
      this.sectionStart = this.index
      this.quote = c
      this.cooked = ''
    } else if (isDigit(c)) {
      this.state = State.InNumber
      this.sectionStart = this.index
    } else if (isIdentStart(c)) {
      this.state = State.InIdent
      this.sectionStart = this.index
    } else {
      this.handleDelimiterOrPunct(c)
    }
  }

  private handleDelimiterOrPunct(c: number): void {
    const open = openDelimiter(c)
    if (open !== undefined) {
      this.stack.push({ delimiter: open, tokens: [], start: this.index })
      return
    }

    const close = closeDelimiter(c)
    if (close !== undefined) {
      const frame = this.stack.pop()
      const char = delimiterChars[close][1]
      if (!frame) {
        throw new LexError(
          `unexpected closing delimiter '${char}'`,
          this.getLoc(this.index, this.index + 1),
        )
      }
      if (frame.delimiter !== close) {
        const expected = delimiterChars[frame.delimiter][1]
        throw new LexError(
          `mismatched closing delimiter '${char}', expected '${expected}'`,
          this.getLoc(this.index, this.index + 1),
        )
      }
      this.emit(
        createGroup(
          frame.delimiter,
          frame.tokens,
          this.getLoc(frame.start, this.index + 1),
          this.getLoc(frame.start, frame.start + 1),
          this.getLoc(this.index, this.index + 1),
        ),
      )
      return
    }

    const next = this.index + 1
    const joint = isPunctChar(this.peek()) && !this.startsComment(next)
    this.emit(
      createPunct(
        String.fromCharCode(c),
        joint ? 'joint' : 'alone',
        this.getLoc(this.index, next),
      ),
    )
  }

  private stateInIdent(c: number): void {
    if (isIdentPart(c)) return
    this.emitIdent()
    this.state = State.Default
    this.stateDefault(c)
  }

  private emitIdent(): void {
    this.emit(
      createIdent(
        this.buffer.slice(this.sectionStart, this.index),
        this.getLoc(this.sectionStart, this.index),
      ),
    )
  }

  private stateInNumber(c: number): void {
    // 1_000, 0xff, 1e3, 1.5
    if (isIdentPart(c) || (c === CharCodes.Dot && isDigit(this.peek()))) {
      return
    }
    this.emitNumber()
    this.state = State.Default
    this.stateDefault(c)
  }

  private emitNumber(): void {
    const raw = this.buffer.slice(this.sectionStart, this.index)
    this.emit(
      createLiteral(
        'number',
        raw,
        raw,
        this.getLoc(this.sectionStart, this.index),
      ),
    )
  }

  private stateInString(c: number): void {
    if (c === CharCodes.Backslash) {
      this.state = State.InStringEscape
    } else if (c === this.quote) {
      const end = this.index + 1
      this.emit(
        createLiteral(
          'string',
          this.buffer.slice(this.sectionStart, end),
          this.cooked,
          this.getLoc(this.sectionStart, end),
        ),
      )
      this.state = State.Default
    } else {
      this.cooked += String.fromCharCode(c)
    }
  }

  private stateInStringEscape(c: number): void {
    this.state = State.InString
    const simple = simpleEscapes[c]
    if (simple !== undefined) {
      this.cooked += simple
    } else if (c === CharCodes.LowerU || c === CharCodes.LowerX) {
      const length = c === CharCodes.LowerU ? 4 : 2
      const hex = this.buffer.slice(this.index + 1, this.index + 1 + length)
      if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length !== length) {
        throw new LexError(
          'invalid escape sequence',
          this.getLoc(this.index - 1, this.index + 1),
        )
      }
      this.cooked += String.fromCharCode(parseInt(hex, 16))
      this.index += length
    } else if (c === CharCodes.NewLine) {
      // line continuation
    } else {
      this.cooked += String.fromCharCode(c)
    }
  }

  private stateInLineComment(c: number): void {
    if (c === CharCodes.NewLine) {
      this.state = State.Default
    }
  }

  private stateInBlockComment(c: number): void {
    if (c === CharCodes.Asterisk && this.peek() === CharCodes.Slash) {
      this.index++
      this.state = State.Default
    }
  }

  /**
   * Iterates through the buffer, calling the function corresponding to the
   * current state.
   */
  public tokenize(input: string): TokenTree[] {
    this.reset()
    this.buffer = input
    while (this.index < this.buffer.length) {
      const c = this.buffer.charCodeAt(this.index)
      if (c === CharCodes.NewLine) {
        this.newlines.push(this.index)
      }
      switch (this.state) {
        case State.Default: {
          this.stateDefault(c)
          break
        }
        case State.InIdent: {
          this.stateInIdent(c)
          break
        }
        case State.InNumber: {
          this.stateInNumber(c)
          break
        }
        case State.InString: {
          this.stateInString(c)
          break
        }
        case State.InStringEscape: {
          this.stateInStringEscape(c)
          break
        }
        case State.InLineComment: {
          this.stateInLineComment(c)
          break
        }
        case State.InBlockComment: {
          this.stateInBlockComment(c)
          break
        }
      }
      this.index++
    }
    this.cleanup()
    return this.root
  }

  /** Finishes whatever the end of input interrupted. */
  private cleanup(): void {
    const end = this.buffer.length
    switch (this.state) {
      case State.InIdent:
        this.emitIdent()
        break
      case State.InNumber:
        this.emitNumber()
        break
      case State.InString:
      case State.InStringEscape:
        throw new LexError(
          'unterminated string literal',
          this.getLoc(this.sectionStart, end),
        )
      case State.InBlockComment:
        throw new LexError(
          'unterminated block comment',
          this.getLoc(this.sectionStart, end),
        )
    }
    const frame = this.stack[this.stack.length - 1]
    if (frame) {
      throw new LexError(
        `unclosed delimiter '${delimiterChars[frame.delimiter][0]}'`,
        this.getLoc(frame.start, frame.start + 1),
      )
    }
  }
}

export function tokenize(source: string): TokenTree[] {
  return new Tokenizer().tokenize(source)
}
