/**
 * AST for filter expressions.
 *
 * Nodes are frozen plain objects discriminated by `type`. Identifiers and
 * literals (scalar or list) are atomic; unary, binary, index and paren nodes
 * are computed. Every node keeps the tokens it was built from, so its source
 * span can be recovered with `Expr.start` / `Expr.end`.
 */

import { StaticTypeCompanion } from '@sift/core'
import { Kind } from './kind.js'
import { parseNumber } from './number.js'
import type { Position } from './position.js'
import type { Token } from './token.js'

// ============================================================================
// Nodes
// ============================================================================

/** A field name: `age`, `status` */
export interface Ident {
  readonly type: 'ident'
  readonly token: Token
  readonly value: string
}

/** A scalar literal: `'text'`, `42`, `true` */
export interface Literal {
  readonly type: 'literal'
  readonly token: Token
  /** Source form: unquoted string, normalized number, or `true` / `false` */
  readonly value: string
}

/** A parenthesised list of literals: `('a','b')` */
export interface ListLiteral {
  readonly type: 'list'
  readonly lparen: Token
  readonly values: readonly Literal[]
  readonly rparen: Token
}

/** `not <computed>` */
export interface UnaryExpr {
  readonly type: 'unary'
  readonly op: Token
  readonly right: ComputedExpr
}

/** `left <op> right` for comparisons and logical connectives */
export interface BinaryExpr {
  readonly type: 'binary'
  readonly left: Expr
  readonly op: Token
  readonly right: Expr
}

/** `left[index]`; chains lean left: `a['b'][0]` */
export interface IndexExpr {
  readonly type: 'index'
  readonly left: Expr
  readonly lbrack: Token
  readonly index: Expr
  readonly rbrack: Token
}

/** `( inner )` */
export interface ParenExpr {
  readonly type: 'paren'
  readonly lparen: Token
  readonly inner: ComputedExpr
  readonly rparen: Token
}

export type AtomicExpr = Ident | Literal | ListLiteral
export type ComputedExpr = UnaryExpr | BinaryExpr | IndexExpr | ParenExpr
export type Expr = AtomicExpr | ComputedExpr

export type ExprType = Expr['type']

/** Uniform element kind of a literal, as lists and comparisons see it */
export type ScalarKind = 'string' | 'number' | 'bool'

// ============================================================================
// Expr companion
// ============================================================================

const NODE_TYPE_NAMES: Record<ExprType, string> = {
  ident: 'identifier',
  literal: 'literal',
  list: 'list literal',
  unary: 'unary expression',
  binary: 'binary expression',
  index: 'index expression',
  paren: 'parenthesized expression',
}

export const Expr = StaticTypeCompanion({
  ident(token: Token): Ident {
    return Object.freeze({ type: 'ident' as const, token, value: token.literal })
  },

  literal(token: Token, value: string = token.literal): Literal {
    return Object.freeze({ type: 'literal' as const, token, value })
  },

  list(lparen: Token, values: readonly Literal[], rparen: Token): ListLiteral {
    return Object.freeze({ type: 'list' as const, lparen, values: Object.freeze([...values]), rparen })
  },

  unary(op: Token, right: ComputedExpr): UnaryExpr {
    return Object.freeze({ type: 'unary' as const, op, right })
  },

  binary(left: Expr, op: Token, right: Expr): BinaryExpr {
    return Object.freeze({ type: 'binary' as const, left, op, right })
  },

  index(left: Expr, lbrack: Token, index: Expr, rbrack: Token): IndexExpr {
    return Object.freeze({ type: 'index' as const, left, lbrack, index, rbrack })
  },

  paren(lparen: Token, inner: ComputedExpr, rparen: Token): ParenExpr {
    return Object.freeze({ type: 'paren' as const, lparen, inner, rparen })
  },

  isAtomic(expr: Expr): expr is AtomicExpr {
    return expr.type === 'ident' || expr.type === 'literal' || expr.type === 'list'
  },

  isComputed(expr: Expr): expr is ComputedExpr {
    return !Expr.isAtomic(expr)
  },

  /** Human-readable node type, used in error messages */
  describe(expr: Expr): string {
    if (expr.type === 'literal') {
      const kind = Literal.scalarKind(expr)
      return kind ? `${kind} literal` : `${expr.token.kind} literal`
    }
    return NODE_TYPE_NAMES[expr.type]
  },

  start(expr: Expr): Position {
    switch (expr.type) {
      case 'ident':
      case 'literal':
        return expr.token.start
      case 'list':
      case 'paren':
        return expr.lparen.start
      case 'unary':
        return expr.op.start
      case 'binary':
      case 'index':
        return Expr.start(expr.left)
    }
  },

  end(expr: Expr): Position {
    switch (expr.type) {
      case 'ident':
      case 'literal':
        return expr.token.end
      case 'list':
      case 'paren':
        return expr.rparen.end
      case 'unary':
      case 'binary':
        return Expr.end(expr.right)
      case 'index':
        return expr.rbrack.end
    }
  },

  /** Operator precedence of unary and binary nodes; 0 for everything else */
  precedence(expr: Expr): number {
    return expr.type === 'unary' || expr.type === 'binary' ? Kind.precedence(expr.op.kind) : 0
  },

  /** The left operand binds looser than this node and needs parentheses */
  isLeftLower(expr: BinaryExpr): boolean {
    return isLower(expr.left, expr)
  },

  /** The right operand binds looser than this node and needs parentheses */
  isRightLower(expr: BinaryExpr | UnaryExpr): boolean {
    return isLower(expr.right, expr)
  },

  /** Structurally equal copy sharing no node objects with the source */
  clone<E extends Expr>(expr: E): E {
    return cloneNode(expr)
  },
})

function isLower(operand: Expr, parent: BinaryExpr | UnaryExpr): boolean {
  if (operand.type !== 'unary' && operand.type !== 'binary') return false
  return Expr.precedence(operand) < Expr.precedence(parent)
}

function cloneNode<E extends Expr>(expr: E): E
function cloneNode(expr: Expr): Expr {
  switch (expr.type) {
    case 'ident':
      return Expr.ident(expr.token)
    case 'literal':
      return Expr.literal(expr.token, expr.value)
    case 'list':
      return Expr.list(expr.lparen, expr.values.map((v) => cloneNode(v)), expr.rparen)
    case 'unary':
      return Expr.unary(expr.op, cloneNode(expr.right))
    case 'binary':
      return Expr.binary(cloneNode(expr.left), expr.op, cloneNode(expr.right))
    case 'index':
      return Expr.index(cloneNode(expr.left), expr.lbrack, cloneNode(expr.index), expr.rbrack)
    case 'paren':
      return Expr.paren(expr.lparen, cloneNode(expr.inner), expr.rparen)
  }
}

// ============================================================================
// Literal companion
// ============================================================================

export const Literal = StaticTypeCompanion({
  isString(lit: Literal): boolean {
    return lit.token.kind === 'STRING'
  },

  isNumber(lit: Literal): boolean {
    return lit.token.kind === 'NUMBER'
  },

  isBool(lit: Literal): boolean {
    return lit.token.kind === 'TRUE' || lit.token.kind === 'FALSE'
  },

  scalarKind(lit: Literal): ScalarKind | undefined {
    if (Literal.isString(lit)) return 'string'
    if (Literal.isNumber(lit)) return 'number'
    if (Literal.isBool(lit)) return 'bool'
    return undefined
  },

  sameKind(a: Literal, b: Literal): boolean {
    const kind = Literal.scalarKind(a)
    return kind !== undefined && kind === Literal.scalarKind(b)
  },

  /** Float value of a NUMBER literal; `undefined` when the text does not parse */
  asNumber(lit: Literal): number | undefined {
    return Literal.isNumber(lit) ? parseNumber(lit.value) : undefined
  },

  /** Boolean value of a TRUE / FALSE literal; `undefined` when it does not coerce */
  asBool(lit: Literal): boolean | undefined {
    if (!Literal.isBool(lit)) return undefined
    switch (lit.value.toLowerCase()) {
      case 'true':
        return true
      case 'false':
        return false
      default:
        return undefined
    }
  },
})

// ============================================================================
// Helpers
// ============================================================================

/** `type` of whatever was passed in where a node was expected */
export function nodeTypeOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'type' in value) return String(value.type)
  return value === null ? 'null' : typeof value
}

/** Spelling of an operator for messages: `==`, `and`, or the kind name */
export function operatorText(op: { kind: Kind; literal: string }): string {
  return Kind.isValid(op.kind) ? Kind.literal(op.kind) || op.kind : op.literal || String(op.kind)
}

/** Identifier or index chain: the only shapes that name a field */
export function isFieldRef(expr: Expr): expr is Ident | IndexExpr {
  return expr.type === 'ident' || expr.type === 'index'
}
