/**
 * Lowers an AST into a backend Filter.
 *
 * Conjunctions spread across `must`, disjunctions across `should`, and a
 * change of logical operator nests a fresh Filter at that point:
 *
 *   age > 18 and (s == 'a' or s == 'b')
 *     → must[ range(age > 18), filter{ should[ s == 'a', s == 'b' ] } ]
 *
 * `!=` and `not` land in `must_not` of the enclosing conjunction. Inside a
 * disjunction they become a nested filter holding that `must_not` entry.
 *
 * Like the analyzer, a converter latches the first error and does no more
 * work after it; `filter` then holds whatever was built so far.
 */

import { SiftError } from '@sift/core'
import {
  ErrComparisonLeftShape,
  ErrEmptyInList,
  ErrEqualityRightNotLiteral,
  ErrHeterogeneousList,
  ErrInRightNotList,
  ErrIndexLeftShape,
  ErrIndexNotScalar,
  ErrInvalidBooleanLiteral,
  ErrLikeRightNotString,
  ErrNilExpression,
  ErrNotANumber,
  ErrOrderingRightNotNumeric,
  ErrUnsupportedBinaryOperator,
  ErrUnsupportedExpression,
  ErrUnsupportedLiteralKind,
  ErrUnsupportedUnaryOperator,
  Expr,
  Kind,
  Literal,
  formatNumber,
  isFieldRef,
  nodeTypeOf,
  operatorText,
  walk,
  type BinaryExpr,
  type Ident,
  type IndexExpr,
  type ListLiteral,
  type OrderingKind,
  type Token,
  type Visitor,
} from '@sift/filter'
import { Condition, Filter, Match, type Range } from './types.js'

/** A coerced literal */
export type Scalar = string | number | boolean

/** What the value slot holds: one scalar, or the elements of a list */
export type FieldValue = Scalar | readonly Scalar[]

export class FilterConverter implements Visitor {
  private root: Filter = Filter.empty()
  private err: SiftError | undefined

  /** Dotted key of the field reference read last */
  currentFieldKey: string = ''
  /** Value of the literal or list read last */
  currentFieldValue: FieldValue | undefined = undefined

  get filter(): Filter {
    return this.root
  }

  get error(): SiftError | undefined {
    return this.err
  }

  /** Translate a whole tree with a fresh converter */
  static convert(expr: Expr | null | undefined): FilterConverter {
    const converter = new FilterConverter()
    if (expr == null) {
      converter.err = ErrNilExpression.create({})
    } else {
      walk(converter, expr)
    }
    return converter
  }

  /** Handles the whole subtree itself; children are never walked separately */
  visit(expr: Expr): Visitor | undefined {
    if (this.err) return undefined
    try {
      this.dispatch(expr)
    } catch (e) {
      if (!SiftError.isSiftError(e)) throw e
      this.err = e
    }
    return undefined
  }

  // -- Slots -------------------------------------------------------------------

  /** Dotted key of a field reference. Both slots are left as they were. */
  extractFieldKey(expr: Ident | IndexExpr): string {
    const { currentFieldKey, currentFieldValue } = this
    try {
      this.currentFieldKey = ''
      this.dispatch(expr)
      return this.currentFieldKey
    } finally {
      this.currentFieldKey = currentFieldKey
      this.currentFieldValue = currentFieldValue
    }
  }

  /** Coerced value of a literal or list. Both slots are left as they were. */
  extractFieldValue(expr: Literal | ListLiteral): FieldValue {
    const { currentFieldKey, currentFieldValue } = this
    try {
      this.dispatch(expr)
      return this.currentFieldValue ?? []
    } finally {
      this.currentFieldKey = currentFieldKey
      this.currentFieldValue = currentFieldValue
    }
  }

  // -- Dispatch ----------------------------------------------------------------

  private dispatch(expr: Expr): void {
    switch (expr.type) {
      case 'ident':
        this.currentFieldKey = expr.value
        return
      case 'index':
        this.currentFieldKey = this.pathOf(expr)
        return
      case 'literal':
        this.currentFieldValue = scalarOf(expr)
        return
      case 'list':
        this.currentFieldValue = expr.values.map(scalarOf)
        return
      case 'paren':
        return this.dispatch(expr.inner)
      case 'unary':
      case 'binary':
        return isOr(expr) ? this.placeInOr(this.root, expr) : this.placeInAnd(this.root, expr)
      default:
        throw ErrUnsupportedExpression.create({ nodeType: nodeTypeOf(expr) })
    }
  }

  private pathOf(expr: IndexExpr): string {
    const { left, index } = expr
    let base: string
    if (left.type === 'ident') base = left.value
    else if (left.type === 'index') base = this.pathOf(left)
    else throw ErrIndexLeftShape.create({ nodeType: Expr.describe(left), position: Expr.start(left) })

    if (index.type === 'literal' && Literal.isString(index)) return `${base}.${index.value}`
    if (index.type === 'literal' && Literal.isNumber(index)) return `${base}.${formatNumber(numberOf(index))}`
    throw ErrIndexNotScalar.create({ nodeType: Expr.describe(index), position: Expr.start(index) })
  }

  // -- Placement ---------------------------------------------------------------

  /** Conjoin `expr` into `target` */
  private placeInAnd(target: Filter, expr: Expr): void {
    const node = unwrap(expr)
    if (node.type === 'binary' && node.op.kind === 'AND') {
      this.placeInAnd(target, node.left)
      this.placeInAnd(target, node.right)
    } else if (node.type === 'binary' && node.op.kind === 'OR') {
      target.must.push(this.conditionOf(node))
    } else if (node.type === 'unary') {
      target.mustNot.push(this.negand(node.op, node.right))
    } else if (node.type === 'binary' && node.op.kind === 'NE') {
      target.mustNot.push(this.comparison(node))
    } else if (node.type === 'binary') {
      target.must.push(this.comparison(node))
    } else {
      throw ErrUnsupportedExpression.create({ nodeType: Expr.describe(node) })
    }
  }

  /** Disjoin `expr` into `target` */
  private placeInOr(target: Filter, expr: Expr): void {
    const node = unwrap(expr)
    if (node.type === 'binary' && node.op.kind === 'OR') {
      this.placeInOr(target, node.left)
      this.placeInOr(target, node.right)
    } else {
      target.should.push(this.conditionOf(node))
    }
  }

  /** One condition that stands for `expr` on its own */
  private conditionOf(expr: Expr): Condition {
    const node = unwrap(expr)
    if (node.type === 'binary' && node.op.kind === 'AND') {
      const nested = Filter.empty()
      this.placeInAnd(nested, node)
      return Condition.nested(nested)
    }
    if (node.type === 'binary' && node.op.kind === 'OR') {
      const nested = Filter.empty()
      this.placeInOr(nested, node)
      return Condition.nested(nested)
    }
    if (node.type === 'unary') {
      return Condition.nested(Filter.of({ mustNot: [this.negand(node.op, node.right)] }))
    }
    if (node.type === 'binary' && node.op.kind === 'NE') {
      return Condition.nested(Filter.of({ mustNot: [this.comparison(node)] }))
    }
    if (node.type === 'binary') {
      return this.comparison(node)
    }
    throw ErrUnsupportedExpression.create({ nodeType: Expr.describe(node) })
  }

  /** The `must_not` entry for `not <operand>` */
  private negand(op: Token, operand: Expr): Condition {
    if (op.kind !== 'NOT') {
      throw ErrUnsupportedUnaryOperator.create({ operator: operatorText(op), position: op.start })
    }
    return this.conditionOf(operand)
  }

  // -- Field conditions --------------------------------------------------------

  /** The condition a comparison asserts; `!=` yields the match it excludes */
  private comparison(expr: BinaryExpr): Condition {
    const { left, op, right } = expr
    const operator = operatorText(op)

    if (!Kind.isBinaryOperator(op.kind) || Kind.isLogicalOperator(op.kind)) {
      throw ErrUnsupportedBinaryOperator.create({ operator, position: op.start })
    }
    if (!isFieldRef(left)) {
      throw ErrComparisonLeftShape.create({ operator, nodeType: Expr.describe(left), position: Expr.start(left) })
    }
    const key = this.extractFieldKey(left)
    const rightShape = { operator, nodeType: Expr.describe(right), position: Expr.start(right) }

    switch (op.kind) {
      case 'EQ':
      case 'NE': {
        if (right.type !== 'literal') throw ErrEqualityRightNotLiteral.create(rightShape)
        return Condition.match(key, matchOf(this.scalar(right)))
      }
      case 'LT':
      case 'LE':
      case 'GT':
      case 'GE': {
        if (right.type !== 'literal') throw ErrOrderingRightNotNumeric.create(rightShape)
        const value = this.scalar(right)
        if (typeof value !== 'number') {
          throw ErrNotANumber.create({ value: right.value, position: right.token.start })
        }
        return Condition.range(key, rangeOf(op.kind, value))
      }
      case 'IN': {
        if (right.type !== 'list') throw ErrInRightNotList.create(rightShape)
        return this.membership(key, right)
      }
      case 'LIKE': {
        if (right.type !== 'literal' || !Literal.isString(right)) throw ErrLikeRightNotString.create(rightShape)
        return Condition.match(key, Match.text(right.value))
      }
      default:
        throw ErrUnsupportedBinaryOperator.create({ operator, position: op.start })
    }
  }

  private membership(key: string, list: ListLiteral): Condition {
    const values = this.extractFieldValue(list)
    const elements = typeof values === 'object' ? values : [values]
    const [first] = elements
    if (first === undefined) {
      throw ErrEmptyInList.create({ position: list.lparen.start })
    }

    const strings: string[] = []
    const numbers: number[] = []
    const booleans: boolean[] = []
    elements.forEach((value, i) => {
      if (typeof value !== typeof first) {
        const element = list.values[i]
        throw ErrHeterogeneousList.create({
          index: i,
          expected: `${scalarName(first)} literal`,
          actual: `${scalarName(value)} literal`,
          position: element ? element.token.start : list.lparen.start,
        })
      }
      if (typeof value === 'string') strings.push(value)
      else if (typeof value === 'number') numbers.push(value)
      else booleans.push(value)
    })

    if (typeof first === 'string') return Condition.match(key, Match.keywords(strings))
    if (typeof first === 'number') return Condition.match(key, Match.integers(numbers))
    return Condition.nested(Filter.of({ should: booleans.map((b) => Condition.match(key, Match.boolean(b))) }))
  }

  private scalar(lit: Literal): Scalar {
    const value = this.extractFieldValue(lit)
    if (typeof value === 'object') {
      throw ErrUnsupportedLiteralKind.create({ kind: String(lit.token.kind), position: lit.token.start })
    }
    return value
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isOr(expr: Expr): boolean {
  const node = unwrap(expr)
  return node.type === 'binary' && node.op.kind === 'OR'
}

function unwrap(expr: Expr): Expr {
  return expr.type === 'paren' ? unwrap(expr.inner) : expr
}

function numberOf(lit: Literal): number {
  const value = Literal.asNumber(lit)
  if (value === undefined) throw ErrNotANumber.create({ value: lit.value, position: lit.token.start })
  return value
}

function scalarOf(lit: Literal): Scalar {
  switch (lit.token.kind) {
    case 'STRING':
      return lit.value
    case 'NUMBER':
      return numberOf(lit)
    case 'TRUE':
    case 'FALSE': {
      const value = Literal.asBool(lit)
      if (value === undefined) throw ErrInvalidBooleanLiteral.create({ value: lit.value, position: lit.token.start })
      return value
    }
    default:
      throw ErrUnsupportedLiteralKind.create({ kind: String(lit.token.kind), position: lit.token.start })
  }
}

function matchOf(value: Scalar): Match {
  if (typeof value === 'string') return Match.keyword(value)
  if (typeof value === 'number') return Match.integer(value)
  return Match.boolean(value)
}

function rangeOf(kind: OrderingKind, value: number): Range {
  switch (kind) {
    case 'LT':
      return { lt: value }
    case 'LE':
      return { lte: value }
    case 'GT':
      return { gt: value }
    case 'GE':
      return { gte: value }
  }
}

function scalarName(value: Scalar): string {
  if (typeof value === 'boolean') return 'bool'
  return typeof value
}
