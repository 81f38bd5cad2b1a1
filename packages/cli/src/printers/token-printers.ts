/**
 * Printers for the token stream.
 */

import { Fmt, Printer } from '@sift/core'
import { Position, type Token } from '@sift/filter'

/** `L:C-L:C`, or the one position a token has */
function span(token: Token): string {
  if (Position.isNone(token.start)) return Position.format(token.end)
  if (Position.isNone(token.end)) return Position.format(token.start)
  return `${Position.format(token.start)}-${Position.format(token.end)}`
}

export const TokenTablePrinter = Printer.define<readonly Token[]>((tokens, fmt: Fmt) => {
  const rows = tokens.map((t) => [span(t), t.kind, t.literal === '' ? '' : `'${t.literal}'`] as const)
  const spanWidth = Math.max(0, ...rows.map(([s]) => s.length))
  const kindWidth = Math.max(0, ...rows.map(([, k]) => k.length))
  return Printer.lines(
    rows.map(([s, kind, literal]) => {
      const shown = kind === 'ERROR' ? fmt.red(kind.padEnd(kindWidth)) : fmt.cyan(kind.padEnd(kindWidth))
      return `${fmt.dim(s.padEnd(spanWidth))}  ${shown}  ${literal}`.trimEnd()
    }),
  )
})

export const TokenJsonPrinter = Printer.define<readonly Token[]>((tokens) =>
  JSON.stringify(
    tokens.map((t) => ({
      kind: t.kind,
      literal: t.literal,
      start: Position.format(t.start),
      end: Position.format(t.end),
    })),
    null,
    2,
  ),
)
