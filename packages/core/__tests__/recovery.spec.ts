import { tokenize } from '@tagtree/lexer'
import { describe, expect, test, vi } from 'vitest'
import {
  ErrorCodes,
  NodeTypes,
  ParseError,
  parseRecoverable,
  parseStrict,
} from '../src'
import { asElement, codesOf, nodesOf, outline, parse } from './utils'

describe('recovery', () => {
  test('mismatched close tag', () => {
    const source = `<div><open></close><foo></foo></div>`
    expect(() => parseStrict(tokenize(source))).toThrowError(
      'wrong close tag found',
    )

    const result = parse(source)
    expect(result.type).toBe('partial')
    if (result.type !== 'partial') return
    expect(outline(result.value)).toEqual([
      {
        element: 'div',
        children: [
          { element: 'open', children: [] },
          { element: 'foo', children: [] },
        ],
      },
    ])

    const [error] = result.diagnostics
    expect(result.diagnostics).toHaveLength(1)
    expect(error).toBeInstanceOf(ParseError)
    expect(error).toBeInstanceOf(SyntaxError)
    expect(error.code).toBe(ErrorCodes.X_MISMATCHED_CLOSE_TAG)
    expect(error.loc.start.offset).toBe(11)
    expect(error.loc.end.offset).toBe(19)
    expect(error.notes).toEqual([
      {
        loc: expect.objectContaining({
          start: expect.objectContaining({ offset: 5 }),
          end: expect.objectContaining({ offset: 11 }),
        }),
        message: "open tag that should be closed; it's started here",
      },
    ])

    // the mismatched close tag stays attached
    const open = asElement(asElement(result.value[0]).children[0])
    expect(open.closeTag).not.toBeNull()
  })

  test('unterminated open tag', () => {
    const result = parse(`<a>"x"`)
    expect(result.type).toBe('partial')
    if (result.type !== 'partial') return
    expect(codesOf(result)).toEqual([ErrorCodes.X_UNTERMINATED_OPEN_TAG])
    expect(result.diagnostics[0].loc.start.offset).toBe(0)
    expect(result.diagnostics[0].loc.end.offset).toBe(3)
    const el = asElement(result.value[0])
    expect(el.closeTag).toBeNull()
    expect(outline(el.children)).toEqual([{ text: 'x' }])
  })

  test('missing tag end', () => {
    const result = parse(`<a></a b>`)
    expect(codesOf(result)).toEqual([ErrorCodes.X_MISSING_TAG_END])
    expect(asElement(nodesOf(result)[0]).closeTag).toBeNull()
  })

  test('open tag cut off by the end of input', () => {
    const result = parse(`<a b`)
    expect(result.type).toBe('failed')
    expect(codesOf(result)).toEqual([ErrorCodes.X_UNEXPECTED_EOF])
    if (result.type !== 'failed') return
    expect(result.diagnostics[0].message).toBe('unexpected end of input')
    expect(result.diagnostics[0].loc.start.offset).toBe(4)
    expect(result.diagnostics[0].loc.end.offset).toBe(4)

    expect(codesOf(parse(`<`))).toEqual([ErrorCodes.X_UNEXPECTED_EOF])
    expect(codesOf(parse(`<a b=`))).toEqual([ErrorCodes.X_UNEXPECTED_EOF])
  })

  test('comment and doctype cut off by the end of input', () => {
    expect(codesOf(parse(`<!--`))).toEqual([ErrorCodes.X_UNEXPECTED_EOF])
    expect(codesOf(parse(`<!-- "x"`))).toEqual([ErrorCodes.X_UNEXPECTED_EOF])
    expect(codesOf(parse(`<!DOCTYPE html`))).toEqual([
      ErrorCodes.X_UNEXPECTED_EOF,
    ])
  })

  test('close tag cut off by the end of input', () => {
    const element = parse(`<a></a`)
    expect(element.type).toBe('partial')
    expect(codesOf(element)).toEqual([ErrorCodes.X_UNEXPECTED_EOF])
    expect(outline(nodesOf(element))).toEqual([{ element: 'a', children: [] }])
    expect(asElement(nodesOf(element)[0]).closeTag).toBeNull()

    const fragment = parse(`<></`)
    expect(codesOf(fragment)).toEqual([ErrorCodes.X_UNEXPECTED_EOF])
    expect(outline(nodesOf(fragment))).toEqual([{ fragment: [] }])
  })

  test('missing attribute value', () => {
    const result = parse(`<a b= />`)
    expect(codesOf(result)).toEqual([ErrorCodes.X_MISSING_ATTRIBUTE_VALUE])
    const [node] = nodesOf(result)
    expect(asElement(node).openTag.attributes).toMatchObject([
      { type: NodeTypes.ATTRIBUTE, value: null },
    ])
  })

  test('unusable attribute tokens are reported once', () => {
    const result = parse(`<a b="x" , c="y" />`)
    expect(codesOf(result)).toEqual([
      ErrorCodes.X_INVALID_NODE_NAME,
      ErrorCodes.X_IGNORED_TOKENS,
    ])
    expect(asElement(nodesOf(result)[0]).openTag.attributes).toHaveLength(1)
  })

  test('skipInvalidPunctuation steps over stray punctuation', () => {
    const result = parse(`<a b="x" , c="y" />`, {
      skipInvalidPunctuation: true,
    })
    expect(codesOf(result)).toEqual([
      ErrorCodes.X_INVALID_NODE_NAME,
      ErrorCodes.X_UNEXPECTED_TOKEN,
    ])
    if (result.type !== 'partial') return
    expect(result.diagnostics[1].message).toBe(`unexpected token: skipped ','`)
    expect(asElement(result.value[0]).openTag.attributes).toHaveLength(2)
  })

  test('a child that consumes nothing ends the loop', () => {
    const result = parse(`<!>`)
    expect(result.type).toBe('failed')
    expect(codesOf(result)).toEqual([
      ErrorCodes.X_MALFORMED_COMMENT,
      ErrorCodes.X_UNEXPECTED_TOKEN,
    ])
  })

  test('invalid doctype keyword', () => {
    expect(codesOf(parse(`<!FOO>`))).toEqual([ErrorCodes.X_INVALID_DOCTYPE])
  })

  test('fragment closed by an element close tag', () => {
    const result = parse(`<>"a"</div>`)
    expect(codesOf(result)).toEqual([ErrorCodes.X_FRAGMENT_CLOSED_BY_ELEMENT])
    expect(outline(nodesOf(result))).toEqual([{ fragment: [{ text: 'a' }] }])
  })

  test('unterminated fragment', () => {
    expect(codesOf(parse(`<>"a"`))).toEqual([
      ErrorCodes.X_UNTERMINATED_FRAGMENT,
    ])
  })

  test('stray close tag is skipped', () => {
    const result = parse(`<a></a></b><c/>`)
    expect(codesOf(result)).toEqual([ErrorCodes.X_UNEXPECTED_CLOSE_TAG])
    if (result.type !== 'partial') return
    expect(result.diagnostics[0].loc.start.offset).toBe(7)
    expect(result.diagnostics[0].loc.end.offset).toBe(11)

    // reparsing without the offending input gives the same tree
    const clean = parse(`<a></a><c/>`)
    expect(clean.type).toBe('ok')
    expect(outline(nodesOf(clean))).toEqual(outline(result.value))
  })

  test('nesting depth is bounded', () => {
    const source = `<a><b><c></c></b></a>`
    const result = parse(source, { maxNestingDepth: 2 })
    expect(result.type).toBe('failed')
    if (result.type !== 'failed') return
    expect(result.diagnostics[0].code).toBe(ErrorCodes.X_NESTING_TOO_DEEP)
    expect(result.diagnostics[0].message).toBe(
      'maximum nesting depth exceeded (limit is 2)',
    )

    expect(parse(`<a><b></b></a>`, { maxNestingDepth: 2 }).type).toBe('ok')
    expect(parse(source).type).toBe('ok')
  })

  test('deep nesting is reported instead of overflowing the stack', () => {
    const depth = 2000
    const source = '<a>'.repeat(depth) + '</a>'.repeat(depth)
    const result = parse(source)
    expect(result.type).toBe('failed')
    expect(codesOf(result)).toEqual([ErrorCodes.X_NESTING_TOO_DEEP])
  })

  test('onError sees every diagnostic', () => {
    const onError = vi.fn()
    parse(`<a b= /><c>`, { onError })
    expect(onError).toHaveBeenCalledTimes(2)
    expect(onError.mock.calls.map(([e]) => e.code)).toEqual([
      ErrorCodes.X_MISSING_ATTRIBUTE_VALUE,
      ErrorCodes.X_UNTERMINATED_OPEN_TAG,
    ])
  })

  test('strict mode keeps only the first diagnostic', () => {
    const result = parse(`<a b= /><c>`, { strict: true })
    expect(result).toEqual({
      type: 'failed',
      diagnostics: [expect.any(ParseError)],
    })
    expect(codesOf(result)).toEqual([ErrorCodes.X_MISSING_ATTRIBUTE_VALUE])
    expect(() => parseStrict(tokenize(`<a b= /><c>`))).toThrowError(
      'missing attribute value',
    )
  })

  test('empty input', () => {
    expect(parseRecoverable([])).toEqual({ type: 'ok', value: [] })
  })
})

describe('top level checks', () => {
  test('topLevelCount', () => {
    const options = { topLevelCount: 2 }
    expect(parse(`<a/><b/>`, options).type).toBe('ok')

    const three = parse(`<a/><b/><c/>`, options)
    expect(three.type).toBe('partial')
    if (three.type !== 'partial') return
    expect(three.diagnostics[0].message).toBe(
      'wrong number of top level nodes (saw 3, exactly 2 required)',
    )
    expect(three.value).toHaveLength(3)

    expect(codesOf(parse(`<a/>`, options))).toEqual([
      ErrorCodes.X_TOP_LEVEL_COUNT,
    ])
  })

  test('topLevelType', () => {
    const result = parse(`<a/>"x"`, { topLevelType: NodeTypes.ELEMENT })
    expect(result.type).toBe('partial')
    if (result.type !== 'partial') return
    expect(result.diagnostics.map(d => d.message)).toEqual([
      'top level node has the wrong type: expected element, found text',
    ])
  })
})
