/**
 * Token kinds: a closed set of operators, keywords, literals and punctuation.
 *
 * Lookups on a value outside the set throw `InvalidKind`: that is a defect
 * in the caller, not bad input.
 */

import { StaticTypeCompanion } from '@sift/core'
import { ErrInvalidKind } from './errors.js'

export const KINDS = [
  'ERROR', 'EOF', 'IDENT', 'NUMBER', 'STRING', 'TRUE', 'FALSE',
  'EQ', 'NE', 'LT', 'LE', 'GT', 'GE',
  'AND', 'OR', 'NOT', 'IN', 'LIKE',
  'LPAREN', 'RPAREN', 'LBRACK', 'RBRACK', 'COMMA',
] as const

export type Kind = (typeof KINDS)[number]

export type KeywordKind = 'TRUE' | 'FALSE' | 'AND' | 'OR' | 'NOT' | 'IN' | 'LIKE'
export type LiteralKind = 'STRING' | 'NUMBER' | 'TRUE' | 'FALSE'
export type LogicalKind = 'AND' | 'OR'
export type EqualityKind = 'EQ' | 'NE'
export type OrderingKind = 'LT' | 'LE' | 'GT' | 'GE'
export type BinaryOperatorKind = LogicalKind | EqualityKind | OrderingKind | 'IN' | 'LIKE'
export type UnaryOperatorKind = 'NOT'

const LITERALS: Readonly<Partial<Record<Kind, string>>> = {
  TRUE: 'true',
  FALSE: 'false',
  EQ: '==',
  NE: '!=',
  LT: '<',
  LE: '<=',
  GT: '>',
  GE: '>=',
  AND: 'and',
  OR: 'or',
  NOT: 'not',
  IN: 'in',
  LIKE: 'like',
  LPAREN: '(',
  RPAREN: ')',
  LBRACK: '[',
  RBRACK: ']',
  COMMA: ',',
}

const PRECEDENCE: Readonly<Partial<Record<Kind, number>>> = {
  OR: 1,
  AND: 2,
  NOT: 3,
  EQ: 4,
  NE: 4,
  LT: 5,
  LE: 5,
  GT: 5,
  GE: 5,
  IN: 6,
  LIKE: 6,
}

const KEYWORDS: ReadonlyMap<string, KeywordKind> = new Map<string, KeywordKind>([
  ['true', 'TRUE'],
  ['false', 'FALSE'],
  ['and', 'AND'],
  ['or', 'OR'],
  ['not', 'NOT'],
  ['in', 'IN'],
  ['like', 'LIKE'],
])

const kindSet: ReadonlySet<string> = new Set(KINDS)

function ensureValid(kind: Kind): Kind {
  if (!kindSet.has(kind)) throw ErrInvalidKind.create({ kind: String(kind) })
  return kind
}

export const Kind = StaticTypeCompanion({
  /** True when the value belongs to the closed kind set */
  isValid(kind: unknown): kind is Kind {
    return typeof kind === 'string' && kindSet.has(kind)
  },

  name(kind: Kind): string {
    return ensureValid(kind)
  },

  /** Canonical source text; empty for kinds without a fixed spelling (IDENT, NUMBER, ...) */
  literal(kind: Kind): string {
    return LITERALS[ensureValid(kind)] ?? ''
  },

  is(kind: Kind, other: Kind): boolean {
    return ensureValid(kind) === other
  },

  isKeyword(kind: Kind): kind is KeywordKind {
    const literal = Kind.literal(kind)
    return KEYWORDS.get(literal) === kind
  },

  isBinaryOperator(kind: Kind): kind is BinaryOperatorKind {
    switch (ensureValid(kind)) {
      case 'EQ': case 'NE': case 'LT': case 'LE': case 'GT': case 'GE':
      case 'AND': case 'OR': case 'IN': case 'LIKE':
        return true
      default:
        return false
    }
  },

  isUnaryOperator(kind: Kind): kind is UnaryOperatorKind {
    return ensureValid(kind) === 'NOT'
  },

  isOperator(kind: Kind): kind is BinaryOperatorKind | UnaryOperatorKind {
    return Kind.isBinaryOperator(kind) || Kind.isUnaryOperator(kind)
  },

  isLogicalOperator(kind: Kind): kind is LogicalKind {
    const k = ensureValid(kind)
    return k === 'AND' || k === 'OR'
  },

  isEqualityOperator(kind: Kind): kind is EqualityKind {
    const k = ensureValid(kind)
    return k === 'EQ' || k === 'NE'
  },

  isOrderingOperator(kind: Kind): kind is OrderingKind {
    const k = ensureValid(kind)
    return k === 'LT' || k === 'LE' || k === 'GT' || k === 'GE'
  },

  isLiteral(kind: Kind): kind is LiteralKind {
    const k = ensureValid(kind)
    return k === 'STRING' || k === 'NUMBER' || k === 'TRUE' || k === 'FALSE'
  },

  /** 1 (OR) to 6 (IN, LIKE); 0 for non-operators */
  precedence(kind: Kind): number {
    return PRECEDENCE[ensureValid(kind)] ?? 0
  },

  /** Keyword kind of a word, case-insensitively; IDENT for anything else */
  of(word: string): Kind {
    return KEYWORDS.get(word.toLowerCase()) ?? 'IDENT'
  },
})

/** Case-insensitive keyword check on source text */
export function isKeyword(word: string): boolean {
  return KEYWORDS.has(word.toLowerCase())
}

const IDENTIFIER_CHARS = /^[\p{L}\p{Nd}_]+$/u

/** Non-empty, not a keyword, only letters, digits and `_` */
export function isIdentifier(word: string): boolean {
  return word !== '' && !isKeyword(word) && IDENTIFIER_CHARS.test(word)
}
