/**
 * Tokens: the unit the lexer produces and the AST keeps for positions.
 */

import { StaticTypeCompanion } from '@sift/core'
import { Kind } from './kind.js'
import { normalizeNumber } from './number.js'
import { NoPosition, Position } from './position.js'

export interface Token {
  readonly kind: Kind
  readonly literal: string
  /** Position of the first character */
  readonly start: Position
  /** Position of the last character */
  readonly end: Position
}

export const Token = StaticTypeCompanion({
  of(kind: Kind, literal: string, start: Position, end: Position): Token {
    return Object.freeze({ kind, literal, start, end })
  },

  /** A token spelled with the kind's canonical literal */
  ofKind(kind: Kind, start: Position = NoPosition, end: Position = NoPosition): Token {
    return Token.of(kind, Kind.literal(kind), start, end)
  },

  ofIdent(name: string, start: Position = NoPosition, end: Position = NoPosition): Token {
    return Token.of('IDENT', name, start, end)
  },

  /** End of input; the range collapses to the position after the last character */
  ofEOF(pos: Position): Token {
    return Token.of('EOF', '', NoPosition, pos)
  },

  ofError(err: Error | string, pos: Position): Token {
    return Token.of('ERROR', typeof err === 'string' ? err : err.message, pos, NoPosition)
  },

  ofIllegal(char: string, pos: Position): Token {
    return Token.ofError(`illegal character '${char}' at ${Position.format(pos)}`, pos)
  },

  /**
   * A literal token. NUMBER text is normalized, TRUE/FALSE take their
   * canonical spelling; any other kind (or an invalid number) yields ERROR.
   */
  ofLiteral(kind: Kind, literal: string, start: Position = NoPosition, end: Position = NoPosition): Token {
    switch (kind) {
      case 'STRING':
        return Token.of(kind, literal, start, end)
      case 'NUMBER': {
        const normalized = normalizeNumber(literal)
        return normalized === undefined
          ? Token.ofError(`invalid number literal '${literal}'`, start)
          : Token.of(kind, normalized, start, end)
      }
      case 'TRUE':
      case 'FALSE':
        return Token.ofKind(kind, start, end)
      default:
        return Token.ofError(`unsupported literal kind ${Kind.name(kind)}`, start)
    }
  },

  format(token: Token): string {
    return `${token.kind} '${token.literal}' ${Position.format(token.start)}-${Position.format(token.end)}`
  },
})
