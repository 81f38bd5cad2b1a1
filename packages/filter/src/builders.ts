/**
 * Builders for constructing filter ASTs in code.
 *
 * @example
 * ```ts
 * import { and, eq, gt, inList } from '@sift/filter'
 *
 * const where = and(gt('age', 18), inList('status', ['active', 'pending']))
 * ```
 *
 * Built nodes carry `NoPosition`. Type parameters keep obviously wrong
 * operands out (an ordering against a string, a logical operand that is a
 * bare literal); anything that still slips through is caught by `analyze`.
 */

import type { ComputedExpr, Expr, Ident, IndexExpr, ListLiteral, Literal, UnaryExpr, BinaryExpr, ParenExpr } from './ast.js'
import { Expr as Node } from './ast.js'
import type { Kind } from './kind.js'
import { formatNumber } from './number.js'
import { Token } from './token.js'

export type Scalar = number | bigint | string | boolean
export type Numeric = number | bigint

/** Where a field name is expected: a bare name or any expression */
export type FieldOperand = string | Expr

function isNode(value: unknown): value is Expr {
  return typeof value === 'object' && value !== null && 'type' in value
}

function operand(left: FieldOperand): Expr {
  return typeof left === 'string' ? ident(left) : left
}

// ============================================================================
// Atoms
// ============================================================================

export function ident(name: string | Ident): Ident {
  return typeof name === 'string' ? Node.ident(Token.ofIdent(name)) : name
}

export function literal(value: Scalar | Literal): Literal {
  if (isNode(value)) return value
  if (typeof value === 'string') return Node.literal(Token.ofLiteral('STRING', value))
  if (typeof value === 'boolean') return Node.literal(Token.ofKind(value ? 'TRUE' : 'FALSE'))
  const text = typeof value === 'number' ? formatNumber(value) : value.toString()
  const token = Token.ofLiteral('NUMBER', text)
  // An ERROR token keeps the text it was given so the analyzer can report it.
  return Node.literal(token, token.kind === 'ERROR' ? text : token.literal)
}

export function list(values: ListLiteral | readonly (Scalar | Literal)[]): ListLiteral {
  if (isNode(values)) return values
  return Node.list(Token.ofKind('LPAREN'), values.map((v) => literal(v)), Token.ofKind('RPAREN'))
}

// ============================================================================
// Comparisons
// ============================================================================

export function eq(left: FieldOperand, right: Scalar | Literal): BinaryExpr {
  return binary(operand(left), 'EQ', literal(right))
}

export function ne(left: FieldOperand, right: Scalar | Literal): BinaryExpr {
  return binary(operand(left), 'NE', literal(right))
}

export function lt(left: FieldOperand, right: Numeric | Literal): BinaryExpr {
  return binary(operand(left), 'LT', literal(right))
}

export function le(left: FieldOperand, right: Numeric | Literal): BinaryExpr {
  return binary(operand(left), 'LE', literal(right))
}

export function gt(left: FieldOperand, right: Numeric | Literal): BinaryExpr {
  return binary(operand(left), 'GT', literal(right))
}

export function ge(left: FieldOperand, right: Numeric | Literal): BinaryExpr {
  return binary(operand(left), 'GE', literal(right))
}

export function inList(left: FieldOperand, values: ListLiteral | readonly (Scalar | Literal)[]): BinaryExpr {
  return binary(operand(left), 'IN', list(values))
}

export function like(left: FieldOperand, pattern: string | Literal): BinaryExpr {
  return binary(operand(left), 'LIKE', literal(pattern))
}

// ============================================================================
// Logical
// ============================================================================

export function and(left: ComputedExpr, right: ComputedExpr): BinaryExpr {
  return binary(left, 'AND', right)
}

export function or(left: ComputedExpr, right: ComputedExpr): BinaryExpr {
  return binary(left, 'OR', right)
}

export function not(operand: ComputedExpr): UnaryExpr {
  return unary('NOT', operand)
}

// ============================================================================
// Structure
// ============================================================================

/** `index(index('user', 'profile'), 'name')` is the path `user.profile.name` */
export function index(base: string | Ident | IndexExpr, key: string | Numeric | Literal): IndexExpr {
  return Node.index(operand(base), Token.ofKind('LBRACK'), literal(key), Token.ofKind('RBRACK'))
}

export function paren(inner: ComputedExpr): ParenExpr {
  return Node.paren(Token.ofKind('LPAREN'), inner, Token.ofKind('RPAREN'))
}

/** Any operator between any operands; shapes are only checked by `analyze` */
export function binary(left: Expr, op: Kind, right: Expr): BinaryExpr {
  return Node.binary(left, Token.ofKind(op), right)
}

export function unary(op: Kind, right: ComputedExpr): UnaryExpr {
  return Node.unary(Token.ofKind(op), right)
}
