/**
 * Source positions.
 *
 * Lines and columns are 1-based and count code points. `NoPosition` (0:0)
 * marks nodes built in code and collapsed ranges (ERROR token ends, EOF starts).
 */

import { StaticTypeCompanion } from '@sift/core'

export interface Position {
  readonly line: number
  readonly column: number
}

export const NoPosition: Position = Object.freeze({ line: 0, column: 0 })

export const Position = StaticTypeCompanion({
  of(line: number, column: number): Position {
    return Object.freeze({ line, column })
  },

  /** The first position of any input */
  start(): Position {
    return Position.of(1, 1)
  },

  isNone(pos: Position): boolean {
    return pos.line === 0 && pos.column === 0
  },

  /** Lexicographic order: line first, then column */
  compare(a: Position, b: Position): number {
    return a.line !== b.line ? a.line - b.line : a.column - b.column
  },

  equals(a: Position, b: Position): boolean {
    return a.line === b.line && a.column === b.column
  },

  /** Step over one character. A newline moves to column 1 of the next line. */
  advance(pos: Position, char: string): Position {
    return char === '\n' ? Position.of(pos.line + 1, 1) : Position.of(pos.line, pos.column + 1)
  },

  format(pos: Position): string {
    return `${pos.line}:${pos.column}`
  },
})
