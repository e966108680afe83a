import type { ParseError } from './errors'

export type ParseOutcome<T> =
  | { type: 'ok'; value: T }
  | { type: 'partial'; value: T; diagnostics: ParseError[] }
  | { type: 'failed'; diagnostics: ParseError[] }

export function outcomeFromParts<T>(
  value: T | undefined,
  diagnostics: ParseError[],
): ParseOutcome<T> {
  if (value === undefined) {
    return { type: 'failed', diagnostics }
  }
  return diagnostics.length
    ? { type: 'partial', value, diagnostics }
    : { type: 'ok', value }
}

/**
 * Returns the value of a diagnostic-free outcome and throws the first
 * diagnostic otherwise.
 */
export function unwrapOutcome<T>(outcome: ParseOutcome<T>): T {
  if (outcome.type === 'ok') {
    return outcome.value
  }
  const [first] = outcome.diagnostics
  if (first) throw first
  throw new Error('parse failed without diagnostics')
}

export function splitOutcome<T>(
  outcome: ParseOutcome<T>,
): [value: T | undefined, diagnostics: ParseError[]] {
  switch (outcome.type) {
    case 'ok':
      return [outcome.value, []]
    case 'partial':
      return [outcome.value, outcome.diagnostics]
    case 'failed':
      return [undefined, outcome.diagnostics]
  }
}
