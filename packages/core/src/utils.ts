import { type ChildNode, NodeTypes } from './ast'

/**
 * Pre-order flattening: every element and fragment is followed by its
 * descendants and left with no children of its own.
 */
export function flattenNodes(nodes: ChildNode[]): ChildNode[] {
  const flat: ChildNode[] = []
  for (const node of nodes) {
    flat.push(node)
    if (node.type === NodeTypes.ELEMENT || node.type === NodeTypes.FRAGMENT) {
      const children = node.children
      node.children = []
      flat.push(...flattenNodes(children))
    }
  }
  return flat
}

/**
 * Visits nodes depth-first in document order. Returning `false` from the
 * visitor skips the children of that node.
 */
export function traverseNodes(
  nodes: readonly ChildNode[],
  visitor: (node: ChildNode, depth: number) => boolean | void,
  depth = 0,
): void {
  for (const node of nodes) {
    const descend = visitor(node, depth)
    if (
      descend !== false &&
      (node.type === NodeTypes.ELEMENT || node.type === NodeTypes.FRAGMENT)
    ) {
      traverseNodes(node.children, visitor, depth + 1)
    }
  }
}
