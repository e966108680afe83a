import { createSourceText, tokenize } from '@tagtree/lexer'
import { extend } from '@vue/shared'
import {
  type ChildNode,
  type ElementNode,
  NodeTypes,
  type ParseOutcome,
  type ParserOptions,
  nodeNameToString,
  parseRecoverable,
  splitOutcome,
} from '../src'

export function parse(
  source: string,
  options: ParserOptions = {},
): ParseOutcome<ChildNode[]> {
  return parseRecoverable(
    tokenize(source),
    extend({ sourceText: createSourceText(source) }, options),
  )
}

export function nodesOf(outcome: ParseOutcome<ChildNode[]>): ChildNode[] {
  const [value, diagnostics] = splitOutcome(outcome)
  if (!value) {
    throw new Error(
      `parse failed: ${diagnostics.map(d => d.message).join(', ')}`,
    )
  }
  return value
}

export function codesOf(outcome: ParseOutcome<ChildNode[]>): number[] {
  return splitOutcome(outcome)[1].map(d => d.code)
}

export function asElement(node: ChildNode | undefined): ElementNode {
  if (!node || node.type !== NodeTypes.ELEMENT) {
    throw new Error(`expected an element`)
  }
  return node
}

export type Outline =
  | { element: string; children: Outline[] }
  | { fragment: Outline[] }
  | { text: string }
  | { raw: string }
  | { comment: string }
  | { doctype: string }
  | { block: string | null }

// Location free view of a tree, for comparing structure.
export function outline(nodes: ChildNode[]): Outline[] {
  return nodes.map((node): Outline => {
    switch (node.type) {
      case NodeTypes.ELEMENT:
        return {
          element: nodeNameToString(node.openTag.name),
          children: outline(node.children),
        }
      case NodeTypes.FRAGMENT:
        return { fragment: outline(node.children) }
      case NodeTypes.TEXT:
        return { text: node.content }
      case NodeTypes.RAW_TEXT:
        return { raw: node.content }
      case NodeTypes.COMMENT:
        return { comment: node.content }
      case NodeTypes.DOCTYPE:
        return { doctype: node.content }
      case NodeTypes.BLOCK:
        return {
          block:
            node.payload.type === 'valid' ? node.payload.content : null,
        }
    }
  })
}
