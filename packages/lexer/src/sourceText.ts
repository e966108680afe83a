import {
  type SourceLocation,
  type SourceTextProvider,
  isStubLoc,
} from '@tagtree/core'

/**
 * Source text lookups over the string the tokens were read from. Locations
 * that do not point into it, such as those of synthesized tokens, have no
 * text.
 */
export function createSourceText(source: string): SourceTextProvider {
  const inRange = (loc: SourceLocation) =>
    !isStubLoc(loc) && loc.end.offset <= source.length

  return {
    textOf(loc) {
      if (!inRange(loc)) return
      return source.slice(loc.start.offset, loc.end.offset)
    },
    join(a, b) {
      if (!inRange(a) || !inRange(b) || b.end.offset < a.start.offset) return
      return { start: a.start, end: b.end }
    },
  }
}
