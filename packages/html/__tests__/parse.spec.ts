import {
  type ChildNode,
  ErrorCodes,
  NodeTypes,
  type ParseOutcome,
  ParseError,
  WarningCodes,
  nodeNameToString,
  splitOutcome,
} from '@tagtree/core'
import { describe, expect, test, vi } from 'vitest'
import { parse, parseHTMLStrict } from '../src'

function nodesOf(outcome: ParseOutcome<ChildNode[]>): ChildNode[] {
  const [value] = splitOutcome(outcome)
  if (!value) throw new Error('parse failed')
  return value
}

function names(nodes: ChildNode[]): string[] {
  return nodes.map(node =>
    node.type === NodeTypes.ELEMENT
      ? nodeNameToString(node.openTag.name)
      : NodeTypes[node.type],
  )
}

describe('html parse', () => {
  test('void elements', () => {
    const result = parse(`<div class="a"><br><img src="x.png"></div>`)
    expect(result.type).toBe('ok')
    const [div] = nodesOf(result)
    expect(div).toMatchObject({
      type: NodeTypes.ELEMENT,
      openTag: {
        attributes: [
          {
            value: {
              type: NodeTypes.EXPRESSION,
              content: '"a"',
              ast: { type: 'StringLiteral', value: 'a' },
            },
          },
        ],
      },
      children: [
        { type: NodeTypes.ELEMENT, children: [], closeTag: null },
        { type: NodeTypes.ELEMENT, children: [], closeTag: null },
      ],
    })
  })

  test('void element close tags are dropped with a warning', () => {
    const onWarn = vi.fn()
    const result = parse(`<br></br>`, { onWarn })
    expect(result.type).toBe('ok')
    expect(onWarn).toHaveBeenCalledWith(
      expect.objectContaining({ code: WarningCodes.W_VOID_ELEMENT_CLOSE_TAG }),
    )
  })

  test('script and style bodies are raw text', () => {
    const [script, style] = nodesOf(
      parse(`<script>const a = 1 < 2</script><style>p { color: red }</style>`),
    )
    expect(script).toMatchObject({
      children: [{ type: NodeTypes.RAW_TEXT, content: 'const a = 1 < 2' }],
    })
    expect(style).toMatchObject({
      children: [{ type: NodeTypes.RAW_TEXT, content: 'p { color: red }' }],
    })
  })

  test('document', () => {
    const source = `<!DOCTYPE html>
<html>
  <head><title>"Hi"</title></head>
  <!-- "body follows" -->
  <body>{greeting}</body>
</html>`
    const nodes = nodesOf(parse(source))
    expect(names(nodes)).toEqual(['DOCTYPE', 'html'])
    const html = nodes[1]
    if (html.type !== NodeTypes.ELEMENT) throw new Error('expected html')
    expect(names(html.children)).toEqual(['head', 'COMMENT', 'body'])
  })

  test('blocks hold a babel AST', () => {
    const [p] = nodesOf(parse(`<p>{count + 1}</p>`))
    expect(p).toMatchObject({
      children: [
        {
          type: NodeTypes.BLOCK,
          payload: {
            type: 'valid',
            content: 'count + 1',
            ast: { type: 'BinaryExpression', operator: '+' },
          },
        },
      ],
    })
  })

  test('attribute values take the longest valid expression', () => {
    const [a] = nodesOf(parse(`<a x=foo.bar(1) y="z" />`))
    expect(a).toMatchObject({
      openTag: {
        attributes: [
          { value: { content: 'foo.bar(1)', ast: { type: 'CallExpression' } } },
          { value: { content: '"z"', ast: { type: 'StringLiteral' } } },
        ],
      },
    })
  })

  test('invalid javascript in a block', () => {
    expect(parse(`{a +}`).type).toBe('failed')

    const result = parse(`{a +}`, { recoverInvalidBlocks: true })
    expect(result.type).toBe('partial')
    if (result.type !== 'partial') return
    expect(result.value).toMatchObject([
      { type: NodeTypes.BLOCK, payload: { type: 'invalid' } },
    ])
    expect(result.diagnostics[0].code).toBe(
      ErrorCodes.X_INVALID_EMBEDDED_EXPRESSION,
    )
    expect(result.diagnostics[0].message).toMatch(
      /^invalid embedded expression: /,
    )
  })

  test('statement blocks', () => {
    const source = `<button on:click={count++; emit(count)} />`
    expect(parse(source).type).toBe('failed')

    const [button] = nodesOf(parse(source, { blockMode: 'statements' }))
    expect(button).toMatchObject({
      openTag: {
        attributes: [
          {
            value: {
              type: NodeTypes.BLOCK,
              payload: {
                type: 'valid',
                ast: {
                  type: 'Program',
                  body: [
                    { type: 'ExpressionStatement' },
                    { type: 'ExpressionStatement' },
                  ],
                },
              },
            },
          },
        ],
      },
    })
  })

  test('lexical errors become a failed outcome', () => {
    const onError = vi.fn()
    const result = parse(`<a title="x></a>`, { onError })
    expect(result.type).toBe('failed')
    const [, diagnostics] = splitOutcome(result)
    expect(diagnostics.map(d => d.message)).toEqual([
      'unexpected token: unterminated string literal',
    ])
    expect(onError).toHaveBeenCalledTimes(1)
  })
})

describe('parseHTMLStrict', () => {
  test('returns the nodes of well-formed input', () => {
    const nodes = parseHTMLStrict(`<ul><li>"a"</li><li>"b"</li></ul>`)
    expect(names(nodes)).toEqual(['ul'])
  })

  test('throws the first diagnostic', () => {
    expect(() => parseHTMLStrict(`<div></span>`)).toThrowError(ParseError)
    expect(() => parseHTMLStrict(`<div></span>`)).toThrowError(
      'wrong close tag found',
    )
  })
})
