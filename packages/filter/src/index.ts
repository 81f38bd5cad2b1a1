/**
 * @sift/filter: filter expressions for vector-store queries.
 *
 * @example
 * ```ts
 * import { parseAndAnalyze, format } from '@sift/filter'
 *
 * const ast = parseAndAnalyze("status == 'active' and (age >= 18 or verified == true)")
 * format(ast) // "status == 'active' and (age >= 18 or verified == true)"
 * ```
 */

export { Position, NoPosition } from './position.js'
export { Kind, KINDS, isKeyword, isIdentifier } from './kind.js'
export type {
  KeywordKind,
  LiteralKind,
  LogicalKind,
  EqualityKind,
  OrderingKind,
  BinaryOperatorKind,
  UnaryOperatorKind,
} from './kind.js'
export { Token } from './token.js'
export { parseNumber, formatNumber, normalizeNumber } from './number.js'

export { Expr, Literal, isFieldRef, nodeTypeOf, operatorText } from './ast.js'
export type {
  Ident,
  ListLiteral,
  UnaryExpr,
  BinaryExpr,
  IndexExpr,
  ParenExpr,
  AtomicExpr,
  ComputedExpr,
  ExprType,
  ScalarKind,
} from './ast.js'

export {
  ident,
  literal,
  list,
  eq,
  ne,
  lt,
  le,
  gt,
  ge,
  inList,
  like,
  and,
  or,
  not,
  index,
  paren,
  binary,
  unary,
} from './builders.js'
export type { Scalar, Numeric, FieldOperand } from './builders.js'

export { walk, children, type Visitor } from './walk.js'
export { Analyzer } from './analyzer.js'
export { FilterBuilder } from './filter-builder.js'
export { SqlLikePrinter } from './sql-like-printer.js'
export { Lexer, tokenize } from './lexer.js'
export { parse, analyze, parseAndAnalyze, format } from './facade.js'

export * from './errors.js'
