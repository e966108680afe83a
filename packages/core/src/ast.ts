import {
  type GroupToken,
  type IdentToken,
  type LiteralToken,
  type PunctToken,
  type TokenTree,
  tokensToString,
} from './tokens'

export enum NodeTypes {
  ELEMENT,
  FRAGMENT,
  TEXT,
  RAW_TEXT,
  COMMENT,
  DOCTYPE,
  BLOCK,
  ATTRIBUTE,
  DYNAMIC_ATTRIBUTE,
  EXPRESSION,
}

export enum NameTypes {
  PATH,
  PUNCTUATED,
  BLOCK,
}

export interface Node {
  type: NodeTypes
  loc: SourceLocation
}

// The node's range in the source. `start` is inclusive and `end` exclusive.
export interface SourceLocation {
  start: Position
  end: Position
}

export interface Position {
  offset: number // from start of file
  line: number
  column: number
}

export type ChildNode =
  | ElementNode
  | FragmentNode
  | TextNode
  | RawTextNode
  | CommentNode
  | DoctypeNode
  | BlockNode

export interface ElementNode extends Node {
  type: NodeTypes.ELEMENT
  openTag: OpenTag
  children: ChildNode[]
  closeTag: CloseTag | null
}

export interface OpenTag {
  name: NodeName
  attributes: AttributeNode[]
  selfClosing: boolean
  loc: SourceLocation
  // location of the `>` or `/>` ending the tag
  endLoc: SourceLocation
}

export interface CloseTag {
  name: NodeName
  loc: SourceLocation
  // location of the `</` starting the tag
  startLoc: SourceLocation
}

export interface FragmentNode extends Node {
  type: NodeTypes.FRAGMENT
  openLoc: SourceLocation
  children: ChildNode[]
  close: FragmentClose | null
}

export interface FragmentClose {
  loc: SourceLocation
  // location of the `</`
  startLoc: SourceLocation
}

export interface TextNode extends Node {
  type: NodeTypes.TEXT
  content: string
  literal: LiteralToken
}

export interface RawTextNode extends Node {
  type: NodeTypes.RAW_TEXT
  tokens: TokenTree[]
  /**
   * Locations of the boundaries around the run, assigned by the parent once
   * all siblings are known. A boundary is `null` at the edge of the input.
   */
  contextLocs: RawTextContext | null
  content: string
}

export type RawTextContext = [
  before: SourceLocation | null,
  after: SourceLocation | null,
]

export interface CommentNode extends Node {
  type: NodeTypes.COMMENT
  content: string
  literal: LiteralToken
}

export interface DoctypeNode extends Node {
  type: NodeTypes.DOCTYPE
  tokens: TokenTree[]
  content: string
}

export interface BlockNode extends Node {
  type: NodeTypes.BLOCK
  payload: ValidBlock | InvalidBlock
}

export interface ValidBlock {
  type: 'valid'
  group: GroupToken
  // block content handed to the expression parser, after any transform
  tokens: TokenTree[]
  content: string
  ast: object | null
}

export interface InvalidBlock {
  type: 'invalid'
  group: GroupToken
  tokens: TokenTree[]
}

export type NodeName = PathName | PunctuatedName | BlockName

export interface PathName {
  type: NameTypes.PATH
  segments: IdentToken[]
  separator: '::' | '.'
  loc: SourceLocation
}

export interface PunctuatedName {
  type: NameTypes.PUNCTUATED
  segments: IdentToken[]
  separators: PunctToken[]
  loc: SourceLocation
}

export interface BlockName {
  type: NameTypes.BLOCK
  block: BlockNode
  loc: SourceLocation
}

export type AttributeNode = KeyedAttributeNode | DynamicAttributeNode

export interface KeyedAttributeNode extends Node {
  type: NodeTypes.ATTRIBUTE
  key: NodeName
  value: ExpressionNode | BlockNode | null
}

export interface DynamicAttributeNode extends Node {
  type: NodeTypes.DYNAMIC_ATTRIBUTE
  block: BlockNode
}

export interface ExpressionNode extends Node {
  type: NodeTypes.EXPRESSION
  tokens: TokenTree[]
  content: string
  ast: object | null
}

export const locStub: SourceLocation = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
}

export function isStubLoc(loc: SourceLocation): boolean {
  return loc === locStub || loc.end.offset <= loc.start.offset
}

export function mergeLocs(
  start: SourceLocation,
  end: SourceLocation,
): SourceLocation {
  if (start === locStub) return end
  if (end === locStub) return start
  return { start: start.start, end: end.end }
}

export function tokensLoc(tokens: readonly TokenTree[]): SourceLocation {
  return tokens.length
    ? mergeLocs(tokens[0].loc, tokens[tokens.length - 1].loc)
    : locStub
}

export function createElement(
  openTag: OpenTag,
  children: ChildNode[],
  closeTag: CloseTag | null,
): ElementNode {
  return {
    type: NodeTypes.ELEMENT,
    openTag,
    children,
    closeTag,
    loc: closeTag ? mergeLocs(openTag.loc, closeTag.loc) : openTag.loc,
  }
}

// `content` is filled in by `setRawTextContext` once the siblings are known.
export function createRawText(tokens: TokenTree[]): RawTextNode {
  return {
    type: NodeTypes.RAW_TEXT,
    tokens,
    contextLocs: null,
    content: '',
    loc: tokensLoc(tokens),
  }
}

export function createExpression(
  tokens: TokenTree[],
  content: string,
  ast: object | null,
): ExpressionNode {
  return {
    type: NodeTypes.EXPRESSION,
    tokens,
    content,
    ast,
    loc: tokensLoc(tokens),
  }
}

export function nodeNameToString(name: NodeName): string {
  switch (name.type) {
    case NameTypes.PATH:
      return name.segments.map(s => s.name).join(name.separator)
    case NameTypes.PUNCTUATED: {
      let out = name.segments[0].name
      for (let i = 1; i < name.segments.length; i++) {
        out += name.separators[i - 1].char + name.segments[i].name
      }
      return out
    }
    case NameTypes.BLOCK:
      return '{}'
  }
}

/**
 * Structural equality. Block names compare by the canonical text of their
 * content, so `<{a}>` is closed by `</{a}>`.
 */
export function isSameNodeName(a: NodeName, b: NodeName): boolean {
  if (a.type === NameTypes.BLOCK || b.type === NameTypes.BLOCK) {
    return (
      a.type === NameTypes.BLOCK &&
      b.type === NameTypes.BLOCK &&
      tokensToString(a.block.payload.tokens) ===
        tokensToString(b.block.payload.tokens)
    )
  }
  return a.type === b.type && nodeNameToString(a) === nodeNameToString(b)
}
