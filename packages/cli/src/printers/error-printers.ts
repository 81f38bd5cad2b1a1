/**
 * Rendering of errors raised by a command.
 *
 * Parse errors carry the source text and a position; for those the offending
 * line is shown with a caret under the position:
 *
 *   SiftError: filter.ParseFailed: ParseFailed: unexpected end of input at 1:5
 *     └ data: {...}
 *
 *       a ==
 *           ^
 */

import { Fmt, HasExpression, Printer, SiftError } from '@sift/core'
import { HasPosition, Position } from '@sift/filter'

export interface ErrorView {
  readonly error: SiftError
  readonly includeStackTrace: boolean
}

function excerpt(expression: string, position: Position, fmt: Fmt): string[] {
  const line = expression.split('\n')[position.line - 1]
  if (line === undefined || Position.isNone(position)) return []
  return ['', `    ${line}`, `    ${' '.repeat(position.column - 1)}${fmt.red('^')}`]
}

export const ErrorPrinter = Printer.define<ErrorView>(({ error, includeStackTrace }, fmt) => {
  const lines = [error.prettyPrint({ color: fmt.isColor, includeStackTrace })]
  if (SiftError.has(error, HasExpression) && SiftError.has(error, HasPosition)) {
    lines.push(...excerpt(error.data.expression, error.data.position, fmt))
  }
  return Printer.lines(lines)
})
