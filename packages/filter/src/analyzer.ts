/**
 * Semantic analyzer.
 *
 * Walks a tree once and latches the first rule violation. The tree is never
 * modified; a fresh analyzer is needed per tree.
 */

import { SiftError } from '@sift/core'
import { Expr, Literal, isFieldRef, nodeTypeOf, operatorText, type BinaryExpr, type IndexExpr, type ListLiteral, type UnaryExpr, type Ident } from './ast.js'
import {
  ErrComparisonLeftShape,
  ErrEmptyList,
  ErrEqualityRightNotLiteral,
  ErrHeterogeneousList,
  ErrIdentTokenMismatch,
  ErrInRightNotList,
  ErrIndexLeftShape,
  ErrIndexNotScalar,
  ErrInvalidBooleanLiteral,
  ErrInvalidIdentifier,
  ErrInvalidNumberLiteral,
  ErrLikeRightNotString,
  ErrLogicalOperandNotComputed,
  ErrNilExpression,
  ErrOrderingRightNotNumeric,
  ErrUnsupportedBinaryOperator,
  ErrUnsupportedExpression,
  ErrUnsupportedLiteralKind,
  ErrUnsupportedUnaryOperator,
} from './errors.js'
import { Kind, isIdentifier } from './kind.js'
import { walk, type Visitor } from './walk.js'

export class Analyzer implements Visitor {
  private err: SiftError | undefined

  /** The first violation found, if any */
  get error(): SiftError | undefined {
    return this.err
  }

  /** Analyze a whole tree with a fresh analyzer */
  static check(expr: Expr | null | undefined): SiftError | undefined {
    if (expr == null) return ErrNilExpression.create({})
    const analyzer = new Analyzer()
    walk(analyzer, expr)
    return analyzer.error
  }

  visit(expr: Expr): Visitor | undefined {
    if (this.err) return undefined
    try {
      this.checkNode(expr)
      return this
    } catch (e) {
      if (!SiftError.isSiftError(e)) throw e
      this.err = e
      return undefined
    }
  }

  // --------------------------------------------------------------------------

  private checkNode(expr: Expr): void {
    switch (expr.type) {
      case 'ident':
        return this.checkIdent(expr)
      case 'literal':
        return this.checkLiteral(expr)
      case 'list':
        return this.checkList(expr)
      case 'unary':
        return this.checkUnary(expr)
      case 'binary':
        return this.checkBinary(expr)
      case 'index':
        return this.checkIndex(expr)
      case 'paren':
        return
      default:
        throw ErrUnsupportedExpression.create({ nodeType: nodeTypeOf(expr) })
    }
  }

  private checkIdent(expr: Ident): void {
    const position = expr.token.start
    if (expr.token.kind !== 'IDENT') {
      throw ErrIdentTokenMismatch.create({ kind: String(expr.token.kind), position })
    }
    if (!isIdentifier(expr.value)) {
      throw ErrInvalidIdentifier.create({ value: expr.value, position })
    }
  }

  private checkLiteral(expr: Literal): void {
    const position = expr.token.start
    switch (expr.token.kind) {
      case 'STRING':
        return
      case 'NUMBER':
        if (Literal.asNumber(expr) === undefined) {
          throw ErrInvalidNumberLiteral.create({ value: expr.value, position })
        }
        return
      case 'TRUE':
      case 'FALSE':
        if (Literal.asBool(expr) === undefined) {
          throw ErrInvalidBooleanLiteral.create({ value: expr.value, position })
        }
        return
      default:
        throw ErrUnsupportedLiteralKind.create({ kind: String(expr.token.kind), position })
    }
  }

  private checkList(expr: ListLiteral): void {
    const [first, ...rest] = expr.values
    if (!first) {
      throw ErrEmptyList.create({ position: expr.lparen.start })
    }
    const expected = Literal.scalarKind(first)
    rest.forEach((value, i) => {
      if (Literal.scalarKind(value) !== expected) {
        throw ErrHeterogeneousList.create({
          index: i + 1,
          expected: Expr.describe(first),
          actual: Expr.describe(value),
          position: value.token.start,
        })
      }
    })
  }

  private checkUnary(expr: UnaryExpr): void {
    if (!Kind.isUnaryOperator(expr.op.kind)) {
      throw ErrUnsupportedUnaryOperator.create({ operator: operatorText(expr.op), position: expr.op.start })
    }
  }

  private checkBinary(expr: BinaryExpr): void {
    const { left, op, right } = expr
    const operator = operatorText(op)

    if (Kind.isLogicalOperator(op.kind)) {
      if (!Expr.isComputed(left)) {
        throw ErrLogicalOperandNotComputed.create({
          operator, side: 'left', nodeType: Expr.describe(left), position: Expr.start(left),
        })
      }
      if (!Expr.isComputed(right)) {
        throw ErrLogicalOperandNotComputed.create({
          operator, side: 'right', nodeType: Expr.describe(right), position: Expr.start(right),
        })
      }
      return
    }

    if (!Kind.isBinaryOperator(op.kind)) {
      throw ErrUnsupportedBinaryOperator.create({ operator, position: op.start })
    }

    if (!isFieldRef(left)) {
      throw ErrComparisonLeftShape.create({ operator, nodeType: Expr.describe(left), position: Expr.start(left) })
    }

    const rightShape = { operator, nodeType: Expr.describe(right), position: Expr.start(right) }

    if (Kind.isEqualityOperator(op.kind)) {
      if (right.type !== 'literal') throw ErrEqualityRightNotLiteral.create(rightShape)
      return
    }
    if (Kind.isOrderingOperator(op.kind)) {
      if (right.type !== 'literal' || !Literal.isNumber(right)) throw ErrOrderingRightNotNumeric.create(rightShape)
      return
    }
    if (op.kind === 'IN') {
      if (right.type !== 'list') throw ErrInRightNotList.create(rightShape)
      return
    }
    if (right.type !== 'literal' || !Literal.isString(right)) throw ErrLikeRightNotString.create(rightShape)
  }

  private checkIndex(expr: IndexExpr): void {
    if (!isFieldRef(expr.left)) {
      throw ErrIndexLeftShape.create({ nodeType: Expr.describe(expr.left), position: Expr.start(expr.left) })
    }
    const index = expr.index
    if (index.type !== 'literal' || !(Literal.isNumber(index) || Literal.isString(index))) {
      throw ErrIndexNotScalar.create({ nodeType: Expr.describe(index), position: Expr.start(index) })
    }
  }
}
